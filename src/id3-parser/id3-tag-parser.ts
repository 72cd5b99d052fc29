import { constants } from "buffer";
import { ID3V2_CONSTANTS } from "./consts";
import { FrameAllocationError, ReentrantFeedError } from "./errors";
import { FrameBuffer } from "./frame-buffer";
import { decodeSynchsafe, decodeUInt24BE, decodeUInt32BE } from "./synchsafe";
import {
  FeedResult,
  FeedStatus,
  FrameCallback,
  Id3FrameHeader,
  Id3ParserOptions,
  Id3TagHeader,
  ParserState,
} from "./types";

/**
 * Incremental ID3v2.2 / 2.3 / 2.4 tag parser.
 *
 * Bytes are supplied through {@link Id3TagParser.feed} in chunks of any size and
 * alignment. Every counter needed to resume mid-structure lives on the instance,
 * so a header, extended header or frame payload may be split across any number
 * of calls. Each complete frame is passed to the callback synchronously, before
 * the rest of the chunk is consumed.
 *
 * Malformed tags never produce errors: a missing signature, an early padding
 * byte or a declared size that overruns the tag simply ends the parse. The only
 * error is a frame payload that cannot be allocated.
 */
export class Id3TagParser {
  private state: ParserState = ParserState.FindHeader;
  private readonly scratch: Buffer = Buffer.alloc(ID3V2_CONSTANTS.HEADER_SIZE);
  private scratchFilled: number = 0;

  private tagHeader: Id3TagHeader | null = null;
  private tagSize: number = 0;
  private bytesProcessed: number = 0;

  private extendedHeaderSize: number = 0;
  private extendedBytesRead: number = 0;

  private currentFrame: FrameBuffer | null = null;
  private onFrame: FrameCallback | null = null;
  private failure: FrameAllocationError | null = null;
  private feeding: boolean = false;
  private readonly maxFrameSize: number;

  constructor(onFrame?: FrameCallback | null, options: Id3ParserOptions = {}) {
    this.maxFrameSize = options.maxFrameSize ?? constants.MAX_LENGTH;
    this.initialize(onFrame);
  }

  /**
   * Resets the parser to look for a new tag
   * @param onFrame - Receives each complete frame; null or omitted discards frames
   */
  initialize(onFrame?: FrameCallback | null): void {
    this.cleanup();
    this.state = ParserState.FindHeader;
    this.scratchFilled = 0;
    this.tagHeader = null;
    this.tagSize = 0;
    this.bytesProcessed = 0;
    this.extendedHeaderSize = 0;
    this.extendedBytesRead = 0;
    this.failure = null;
    this.onFrame = onFrame ?? null;
  }

  /**
   * Releases the payload buffer of a frame left incomplete. Safe in any state.
   */
  cleanup(): void {
    if (this.currentFrame) {
      this.currentFrame.release();
      this.currentFrame = null;
    }
  }

  get currentState(): ParserState {
    return this.state;
  }

  /**
   * Decoded tag header, or null until all 10 header bytes have been read
   */
  get header(): Id3TagHeader | null {
    return this.tagHeader;
  }

  /**
   * Tag bytes consumed after the 10-byte header
   */
  get tagBytesProcessed(): number {
    return this.bytesProcessed;
  }

  get hasPendingFrame(): boolean {
    return this.currentFrame !== null;
  }

  /**
   * Consumes as much of `chunk` as belongs to the tag
   * @param chunk - The next slice of the input, in order
   * @returns Complete once the tag has been fully read, NeedMoreData otherwise,
   * or Error when a frame payload could not be allocated
   * @throws ReentrantFeedError when called from inside the frame callback
   */
  feed(chunk: Uint8Array): FeedResult {
    if (this.feeding) {
      throw new ReentrantFeedError();
    }
    if (this.failure) {
      return { status: FeedStatus.Error, error: this.failure };
    }

    this.feeding = true;
    try {
      let position = 0;
      while (this.state !== ParserState.Done) {
        const stateBefore = this.state;
        const next = this.step(chunk, position);

        if (next instanceof FrameAllocationError) {
          this.failure = next;
          return { status: FeedStatus.Error, error: next };
        }

        // Stop once neither the position nor the state moved: input is exhausted
        if (next === position && this.state === stateBefore) {
          break;
        }
        position = next;
      }
    } finally {
      this.feeding = false;
    }

    return this.state === ParserState.Done
      ? { status: FeedStatus.Complete }
      : { status: FeedStatus.NeedMoreData };
  }

  private step(
    chunk: Uint8Array,
    position: number,
  ): number | FrameAllocationError {
    switch (this.state) {
      case ParserState.FindHeader:
        return this.findHeader(chunk, position);
      case ParserState.ReadHeader:
        return this.readHeader(chunk, position);
      case ParserState.ReadExtendedHeader:
        return this.readExtendedHeader(chunk, position);
      case ParserState.ReadFrameHeader:
        return this.readFrameHeader(chunk, position);
      case ParserState.ReadFrameData:
        return this.readFrameData(chunk, position);
      case ParserState.Done:
        return position;
    }
  }

  /**
   * Scans for "ID3". The signature is only recognised when all three bytes are
   * in the same chunk; a signature split across chunks is skipped.
   */
  private findHeader(chunk: Uint8Array, position: number): number {
    const [first, second, third] = ID3V2_CONSTANTS.MAGIC;

    for (let index = position; index < chunk.length; index++) {
      if (
        chunk[index] === first &&
        index + 2 < chunk.length &&
        chunk[index + 1] === second &&
        chunk[index + 2] === third
      ) {
        this.scratch.set(chunk.subarray(index, index + 3), 0);
        this.scratchFilled = 3;
        this.state = ParserState.ReadHeader;
        return index + 3;
      }
    }

    return chunk.length;
  }

  private readHeader(chunk: Uint8Array, position: number): number {
    const next = this.fillScratch(
      chunk,
      position,
      ID3V2_CONSTANTS.HEADER_SIZE,
      Number.POSITIVE_INFINITY,
    );

    if (this.scratchFilled < ID3V2_CONSTANTS.HEADER_SIZE) {
      return next;
    }

    const header: Id3TagHeader = {
      version: this.scratch[3],
      revision: this.scratch[4],
      flags: this.scratch[5],
      tagSize: decodeSynchsafe(this.scratch, 6),
    };
    this.tagHeader = header;
    this.tagSize = header.tagSize;
    this.bytesProcessed = 0;
    this.scratchFilled = 0;

    if (
      (header.flags & ID3V2_CONSTANTS.EXTENDED_HEADER_FLAG) !== 0 &&
      header.version >= ID3V2_CONSTANTS.V23_VERSION
    ) {
      this.extendedHeaderSize = 0;
      this.extendedBytesRead = 0;
      this.state = ParserState.ReadExtendedHeader;
    } else {
      this.state = ParserState.ReadFrameHeader;
    }

    return next;
  }

  /**
   * Reads the 4-byte size field, then skips the rest of the extended header.
   * The size field counts towards the declared extended header size.
   */
  private readExtendedHeader(chunk: Uint8Array, position: number): number {
    let next = position;
    const sizeField = ID3V2_CONSTANTS.EXTENDED_HEADER_SIZE_FIELD;

    if (this.extendedBytesRead < sizeField) {
      const before = this.scratchFilled;
      next = this.fillScratch(chunk, next, sizeField, this.remainingTagBytes);
      this.bytesProcessed += this.scratchFilled - before;

      if (this.scratchFilled === sizeField) {
        this.extendedHeaderSize = this.usesSynchsafeSizes
          ? decodeSynchsafe(this.scratch, 0)
          : decodeUInt32BE(this.scratch, 0);
        this.extendedBytesRead = sizeField;
      }
    }

    if (this.extendedBytesRead >= sizeField) {
      const skip = Math.max(
        0,
        Math.min(
          this.extendedHeaderSize - this.extendedBytesRead,
          chunk.length - next,
          this.remainingTagBytes,
        ),
      );
      next += skip;
      this.extendedBytesRead += skip;
      this.bytesProcessed += skip;

      if (this.extendedBytesRead >= this.extendedHeaderSize) {
        this.scratchFilled = 0;
        this.state = ParserState.ReadFrameHeader;
        return next;
      }
    }

    // The tag ended inside the extended header
    if (this.remainingTagBytes <= 0) {
      this.state = ParserState.Done;
    }

    return next;
  }

  private readFrameHeader(
    chunk: Uint8Array,
    position: number,
  ): number | FrameAllocationError {
    if (this.remainingTagBytes <= 0) {
      this.state = ParserState.Done;
      return position;
    }

    // Padding: a zero where the frame id should start ends the frames.
    // Only that one byte is consumed, whatever the chunking.
    if (
      this.scratchFilled === 0 &&
      position < chunk.length &&
      chunk[position] === ID3V2_CONSTANTS.PADDING_BYTE
    ) {
      this.bytesProcessed += 1;
      this.state = ParserState.Done;
      return position + 1;
    }

    const headerSize = this.frameHeaderSize;
    const before = this.scratchFilled;
    const next = this.fillScratch(
      chunk,
      position,
      headerSize,
      this.remainingTagBytes,
    );
    this.bytesProcessed += this.scratchFilled - before;

    if (this.scratchFilled < headerSize) {
      return next;
    }

    const frame = FrameBuffer.allocate(
      this.decodeFrameHeader(),
      this.maxFrameSize,
    );
    if (frame instanceof FrameAllocationError) {
      return frame;
    }

    this.currentFrame = frame;
    this.scratchFilled = 0;
    this.state = ParserState.ReadFrameData;
    return next;
  }

  private readFrameData(chunk: Uint8Array, position: number): number {
    const frame = this.currentFrame;
    if (!frame) {
      this.state = ParserState.ReadFrameHeader;
      return position;
    }

    const copied = frame.write(chunk, position, this.remainingTagBytes);
    this.bytesProcessed += copied;

    if (frame.isComplete) {
      this.currentFrame = null;
      this.state = ParserState.ReadFrameHeader;
      frame.lend((payload) => {
        if (this.onFrame) {
          this.onFrame(frame.header.id, payload, payload.length);
        }
      });
      return position + copied;
    }

    // The declared frame size runs past the end of the tag; drop the partial frame
    if (this.remainingTagBytes <= 0) {
      this.cleanup();
      this.state = ParserState.Done;
    }

    return position + copied;
  }

  private decodeFrameHeader(): Id3FrameHeader {
    if (this.version < ID3V2_CONSTANTS.V23_VERSION) {
      return {
        id: this.readFrameId(ID3V2_CONSTANTS.FRAME_ID_LENGTH_V22),
        size: decodeUInt24BE(this.scratch, 3),
        flags: 0,
      };
    }

    return {
      id: this.readFrameId(ID3V2_CONSTANTS.FRAME_ID_LENGTH),
      size: this.usesSynchsafeSizes
        ? decodeSynchsafe(this.scratch, 4)
        : decodeUInt32BE(this.scratch, 4),
      flags: this.scratch.readUInt16BE(8),
    };
  }

  /**
   * Frame ids end at the first NUL byte
   */
  private readFrameId(length: number): string {
    const terminator = this.scratch.subarray(0, length).indexOf(0);
    return this.scratch.toString(
      "latin1",
      0,
      terminator === -1 ? length : terminator,
    );
  }

  /**
   * Copies bytes into the scratch buffer until it holds `target` bytes,
   * bounded by the chunk and by `limit`
   * @returns The new position in `chunk`
   */
  private fillScratch(
    chunk: Uint8Array,
    position: number,
    target: number,
    limit: number,
  ): number {
    const count = Math.max(
      0,
      Math.min(target - this.scratchFilled, chunk.length - position, limit),
    );
    if (count === 0) {
      return position;
    }

    this.scratch.set(chunk.subarray(position, position + count), this.scratchFilled);
    this.scratchFilled += count;
    return position + count;
  }

  private get version(): number {
    return this.tagHeader ? this.tagHeader.version : 0;
  }

  private get usesSynchsafeSizes(): boolean {
    return this.version === ID3V2_CONSTANTS.V24_VERSION;
  }

  private get frameHeaderSize(): number {
    return this.version >= ID3V2_CONSTANTS.V23_VERSION
      ? ID3V2_CONSTANTS.FRAME_HEADER_SIZE
      : ID3V2_CONSTANTS.FRAME_HEADER_SIZE_V22;
  }

  private get remainingTagBytes(): number {
    return this.tagSize - this.bytesProcessed;
  }
}
