/**
 * No "ID3" header was found in the uploaded stream
 */
export class TagNotFoundError extends Error {
  constructor() {
    super("No ID3v2 tag found at the start of the file");
    this.name = "TagNotFoundError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TagNotFoundError);
    }
  }
}

/**
 * The request is not a multipart upload with a "file" field
 */
export class UploadValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UploadValidationError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UploadValidationError);
    }
  }
}

/**
 * Error codes returned by the tag upload API.
 * Domain errors are converted to HTTP exceptions with these codes in the controller layer.
 */
export enum TagUploadErrorCode {
  FILE_REQUIRED = "FILE_REQUIRED",
  TAG_NOT_FOUND = "TAG_NOT_FOUND",
  FRAME_TOO_LARGE = "FRAME_TOO_LARGE",
  STORAGE_UPLOAD_ERROR = "STORAGE_UPLOAD_ERROR",
}
