/**
 * Codes carried by picture storage failures
 */
export enum FileStorageErrorCode {
  UPLOAD_ERROR = "UPLOAD_ERROR",
  STORAGE_UNAVAILABLE = "STORAGE_UNAVAILABLE",
}

/**
 * Raised by the storage layer; the API maps every subclass to STORAGE_UPLOAD_ERROR
 */
export class FileStorageError extends Error {
  constructor(
    public readonly code: FileStorageErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "FileStorageError";
    Error.captureStackTrace?.(this, FileStorageError);
  }
}

/**
 * A PutObject for a picture failed; `key` is the key that was attempted
 */
export class UploadError extends FileStorageError {
  constructor(message: string, public readonly key?: string) {
    super(FileStorageErrorCode.UPLOAD_ERROR, message);
    this.name = "UploadError";
  }
}

/**
 * The bucket could neither be found nor created at startup
 */
export class StorageUnavailableError extends FileStorageError {
  constructor(message: string) {
    super(FileStorageErrorCode.STORAGE_UNAVAILABLE, message);
    this.name = "StorageUnavailableError";
  }
}

/**
 * Fields of an AWS SDK service exception that identify a missing resource
 */
type AwsSdkError = {
  name?: string;
  message?: string;
  $metadata?: {
    httpStatusCode?: number;
  };
};

/**
 * True for HeadBucket's "NotFound" error or any 404 response
 */
export function isAWSNotFoundError(error: unknown): error is AwsSdkError {
  if (!error || typeof error !== "object") {
    return false;
  }

  const name = "name" in error ? error.name : undefined;
  const metadata = "$metadata" in error ? error.$metadata : undefined;
  const httpStatusCode =
    metadata && typeof metadata === "object" && "httpStatusCode" in metadata
      ? metadata.httpStatusCode
      : undefined;

  return name === "NotFound" || httpStatusCode === 404;
}
