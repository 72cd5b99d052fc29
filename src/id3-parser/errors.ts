/**
 * Error codes specific to ID3 tag parsing
 * This module is framework-agnostic and does not depend on NestJS or web server context
 */
export enum Id3ParserErrorCode {
  FRAME_ALLOCATION_FAILED = "FRAME_ALLOCATION_FAILED",
  REENTRANT_FEED = "REENTRANT_FEED",
  INVALID_PICTURE_FRAME = "INVALID_PICTURE_FRAME",
  UNSUPPORTED_TEXT_ENCODING = "UNSUPPORTED_TEXT_ENCODING",
}

/**
 * Base error class for ID3 parsing errors
 * Framework-agnostic error that can be caught and converted to framework-specific exceptions
 */
export class Id3ParserError extends Error {
  constructor(
    public readonly code: Id3ParserErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "Id3ParserError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, Id3ParserError);
    }
  }
}

/**
 * Returned (not thrown) by the parser when a frame payload buffer cannot be allocated
 */
export class FrameAllocationError extends Id3ParserError {
  constructor(
    public readonly frameId: string,
    public readonly frameSize: number,
  ) {
    super(
      Id3ParserErrorCode.FRAME_ALLOCATION_FAILED,
      `Cannot allocate ${frameSize} bytes for frame ${frameId}`,
    );
    this.name = "FrameAllocationError";
  }
}

/**
 * Thrown when feed() is called from inside the frame callback
 */
export class ReentrantFeedError extends Id3ParserError {
  constructor() {
    super(
      Id3ParserErrorCode.REENTRANT_FEED,
      "feed() must not be called from inside the frame callback",
    );
    this.name = "ReentrantFeedError";
  }
}

/**
 * Error thrown when an attached picture payload is truncated
 */
export class InvalidPictureFrameError extends Id3ParserError {
  constructor(message: string) {
    super(Id3ParserErrorCode.INVALID_PICTURE_FRAME, message);
    this.name = "InvalidPictureFrameError";
  }
}

/**
 * Error thrown when a text encoding byte is not one of the four ID3v2 encodings
 */
export class UnsupportedTextEncodingError extends Id3ParserError {
  constructor(public readonly encoding: number) {
    super(
      Id3ParserErrorCode.UNSUPPORTED_TEXT_ENCODING,
      `Unsupported text encoding: 0x${encoding.toString(16).padStart(2, "0")}`,
    );
    this.name = "UnsupportedTextEncodingError";
  }
}
