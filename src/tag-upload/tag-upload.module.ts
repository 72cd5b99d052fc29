import { Module } from "@nestjs/common";
import { TagUploadController } from "./tag-upload.controller";
import { TagUploadService } from "./tag-upload.service";
import { TagProcessingService } from "./tag-processing.service";
import { BusboyFactory } from "./busboy-factory.service";
import { Id3ParserModule } from "../id3-parser/id3-parser.module";
import { FileStorageModule } from "../file-storage/file-storage.module";

@Module({
  imports: [Id3ParserModule, FileStorageModule],
  controllers: [TagUploadController],
  providers: [TagUploadService, TagProcessingService, BusboyFactory],
})
export class TagUploadModule {}
