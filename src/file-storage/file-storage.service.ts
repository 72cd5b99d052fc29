import { Injectable, Logger } from "@nestjs/common";
import { S3Service } from "./s3.service";
import { FileStorageError, UploadError } from "./errors";

/**
 * S3 key prefix for pictures extracted from tags
 */
export const PICTURES_PREFIX = "id3-pictures";

const MIME_EXTENSIONS: ReadonlyMap<string, string> = new Map([
  ["image/jpeg", "jpg"],
  ["image/jpg", "jpg"],
  ["image/png", "png"],
  ["image/gif", "gif"],
  ["image/bmp", "bmp"],
  ["image/webp", "webp"],
]);

/**
 * High-level service for file storage operations.
 * Encapsulates S3 operations and provides a clean interface for storing extracted pictures.
 */
@Injectable()
export class FileStorageService {
  private readonly logger = new Logger(FileStorageService.name);

  constructor(private readonly s3Service: S3Service) {}

  /**
   * Stores picture data taken from an APIC/PIC frame
   *
   * @param data Image bytes
   * @param mimeType MIME type declared by the frame
   * @returns The S3 key where the picture was stored
   * @throws FileStorageError if the upload fails
   */
  async storePicture(data: Buffer, mimeType: string): Promise<string> {
    const key = this.s3Service.generateKey(
      PICTURES_PREFIX,
      MIME_EXTENSIONS.get(mimeType.toLowerCase()),
    );

    try {
      await this.s3Service.putObject(key, data, mimeType || undefined);
      this.logger.debug(`Picture stored with key: ${key}`);
      return key;
    } catch (error: unknown) {
      // If it's already a FileStorageError, re-throw it
      if (error instanceof FileStorageError) {
        throw error;
      }

      throw new UploadError(
        `Failed to store picture: ${error instanceof Error ? error.message : String(error)}`,
        key,
      );
    }
  }
}
