import { FrameAllocationError } from "./errors";
import { AttachedPicture } from "./attached-picture";

/**
 * States of the incremental tag parser
 */
export enum ParserState {
  FindHeader = "FIND_HEADER",
  ReadHeader = "READ_HEADER",
  ReadExtendedHeader = "READ_EXTENDED_HEADER",
  ReadFrameHeader = "READ_FRAME_HEADER",
  ReadFrameData = "READ_FRAME_DATA",
  Done = "DONE",
}

/**
 * Outcome of a single feed() call
 */
export enum FeedStatus {
  NeedMoreData = "NEED_MORE_DATA",
  Complete = "COMPLETE",
  Error = "ERROR",
}

export type FeedResult =
  | { status: FeedStatus.NeedMoreData }
  | { status: FeedStatus.Complete }
  | { status: FeedStatus.Error; error: FrameAllocationError };

/**
 * Decoded 10-byte tag header
 */
export interface Id3TagHeader {
  version: number;
  revision: number;
  flags: number;
  /**
   * Declared tag size, excluding the 10 header bytes
   */
  tagSize: number;
}

/**
 * Decoded frame header
 */
export interface Id3FrameHeader {
  id: string;
  size: number;
  /**
   * Always 0 for version 2.2
   */
  flags: number;
}

/**
 * A complete frame as delivered by the frame iterator
 */
export interface Id3Frame {
  id: string;
  payload: Buffer;
}

/**
 * Receives each complete frame, in file order.
 * The payload is only lent for the duration of the call.
 */
export type FrameCallback = (id: string, payload: Buffer, length: number) => void;

export interface Id3ParserOptions {
  /**
   * Largest frame payload the parser will allocate; larger frames fail the parse
   */
  maxFrameSize?: number;
}

/**
 * Interface for iterating through the frames of an ID3v2 tag
 */
export interface IFrameIterator {
  /**
   * Gets the next complete frame
   * @returns Promise that resolves to the frame, or null once the tag is finished
   */
  next(): Promise<Id3Frame | null>;

  /**
   * Checks if there are more frames to iterate
   */
  hasNext(): boolean;
}

/**
 * Id and payload size of a frame read from a tag
 */
export interface FrameSummary {
  id: string;
  size: number;
}

/**
 * Everything read from the tag at the start of a stream
 */
export interface TagReadResult {
  /**
   * Null when no "ID3" header was found
   */
  header: Id3TagHeader | null;
  /**
   * False when the stream ended before the tag did
   */
  complete: boolean;
  frames: FrameSummary[];
  pictures: AttachedPicture[];
}
