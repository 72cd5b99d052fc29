import {
  Controller,
  Post,
  Req,
  BadRequestException,
  InternalServerErrorException,
} from "@nestjs/common";
import { Request } from "express";
import { TagUploadResponseDto } from "./dto/tag-upload-response.dto";
import { TagUploadService } from "./tag-upload.service";
import { TagProcessingService } from "./tag-processing.service";
import {
  TagNotFoundError,
  TagUploadErrorCode,
  UploadValidationError,
} from "./errors";
import { FrameAllocationError } from "../id3-parser/errors";
import { FileStorageError } from "../file-storage/errors";

@Controller("tag-upload")
export class TagUploadController {
  constructor(
    private readonly tagUploadService: TagUploadService,
    private readonly tagProcessingService: TagProcessingService,
  ) {}

  @Post()
  async uploadFile(@Req() req: Request): Promise<TagUploadResponseDto> {
    try {
      const tag = await this.tagUploadService.processUpload(req);
      const result = await this.tagProcessingService.processTag(tag);

      return {
        version: result.header.version,
        revision: result.header.revision,
        tagSize: result.header.tagSize,
        complete: result.complete,
        frames: result.frames,
        pictures: result.pictures,
      };
    } catch (error) {
      // Convert domain errors to HTTP exceptions
      if (error instanceof UploadValidationError) {
        throw new BadRequestException({
          error: error.message,
          code: TagUploadErrorCode.FILE_REQUIRED,
        });
      }

      if (error instanceof TagNotFoundError) {
        throw new BadRequestException({
          error: error.message,
          code: TagUploadErrorCode.TAG_NOT_FOUND,
        });
      }

      if (error instanceof FrameAllocationError) {
        throw new BadRequestException({
          error: error.message,
          code: TagUploadErrorCode.FRAME_TOO_LARGE,
        });
      }

      if (error instanceof FileStorageError) {
        throw new InternalServerErrorException({
          error: error.message,
          code: TagUploadErrorCode.STORAGE_UPLOAD_ERROR,
        });
      }

      // Re-throw unknown errors (will be handled by exception filter)
      throw error;
    }
  }
}
