import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { S3Service } from "./s3.service";
import { FileStorageService } from "./file-storage.service";

/**
 * Picture storage. S3 settings come from ConfigService.
 */
@Module({
  imports: [ConfigModule],
  providers: [S3Service, FileStorageService],
  exports: [FileStorageService],
})
export class FileStorageModule {}
