import { Injectable, Logger } from "@nestjs/common";
import { FileStorageService } from "../file-storage/file-storage.service";
import { TagReadResult } from "../id3-parser/types";
import { StoredPicture, TagProcessingResult } from "./types";
import { TagNotFoundError } from "./errors";

/**
 * Service responsible for turning a read tag into the upload result.
 * Stores every attached picture and keeps only its storage key.
 */
@Injectable()
export class TagProcessingService {
  private readonly logger = new Logger(TagProcessingService.name);

  constructor(private readonly fileStorageService: FileStorageService) {}

  /**
   * @param tag What was read from the uploaded file
   * @returns Promise resolving to the tag summary with stored picture keys
   * @throws TagNotFoundError when the file has no ID3v2 tag
   * @throws FileStorageError when a picture cannot be stored
   */
  async processTag(tag: TagReadResult): Promise<TagProcessingResult> {
    if (!tag.header) {
      throw new TagNotFoundError();
    }

    if (!tag.complete) {
      this.logger.warn(
        `Tag ended early: ${tag.frames.length} complete frames read`,
      );
    }

    // One at a time, in frame order; the first failure stops the rest
    const pictures: StoredPicture[] = [];
    for (const picture of tag.pictures) {
      const key = await this.fileStorageService.storePicture(
        picture.data,
        picture.mimeType,
      );
      pictures.push({
        frameId: picture.frameId,
        mimeType: picture.mimeType,
        pictureType: picture.pictureType,
        pictureTypeName: picture.pictureTypeName,
        description: picture.description,
        size: picture.data.length,
        key,
      });
    }

    return {
      header: tag.header,
      complete: tag.complete,
      frames: tag.frames,
      pictures,
    };
  }
}
