import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TagReaderService } from "./tag-reader.service";

@Module({
  imports: [ConfigModule],
  providers: [TagReaderService],
  exports: [TagReaderService],
})
export class Id3ParserModule {}
