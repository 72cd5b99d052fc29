import { Readable } from "stream";
import { Id3TagParser } from "./id3-tag-parser";
import {
  FeedStatus,
  IFrameIterator,
  Id3Frame,
  Id3ParserOptions,
  Id3TagHeader,
  ParserState,
} from "./types";

/**
 * Iterator over the frames of the ID3v2 tag at the start of a stream
 * Handles stream traversal: every chunk is fed to an incremental parser as it arrives
 */
export class Id3FrameIterator implements IFrameIterator {
  private readonly parser: Id3TagParser;
  private readonly frames: Id3Frame[] = [];
  private isFinished: boolean = false;
  private error: Error | null = null;
  private pendingResolve: ((value: Id3Frame | null) => void) | null = null;
  private pendingReject: ((reason: Error) => void) | null = null;

  constructor(
    private readonly stream: Readable,
    options: Id3ParserOptions = {},
  ) {
    // Released payloads are never reused by the parser, so they are queued as-is
    this.parser = new Id3TagParser(
      (id, payload) => this.frames.push({ id, payload }),
      options,
    );
    this.setupStreamListeners();
  }

  /**
   * Decoded tag header, or null if no tag header has been read (yet)
   */
  get header(): Id3TagHeader | null {
    return this.parser.header;
  }

  /**
   * True once the whole tag has been read
   */
  get isComplete(): boolean {
    return this.parser.currentState === ParserState.Done;
  }

  private setupStreamListeners(): void {
    this.stream.on("data", this.onData.bind(this));
    this.stream.on("end", this.onEnd.bind(this));
    this.stream.on("error", this.onError.bind(this));

    // Resume stream if it's paused
    if (this.stream.isPaused()) {
      this.stream.resume();
    }
  }

  private onData(chunk: Buffer): void {
    // Bytes after the tag are left to drain
    if (this.isFinished) {
      return;
    }

    const result = this.parser.feed(chunk);
    if (result.status === FeedStatus.Error) {
      this.fail(result.error);
      return;
    }
    if (result.status === FeedStatus.Complete) {
      this.isFinished = true;
    }

    this.settlePending();
  }

  private onEnd(): void {
    if (!this.isFinished) {
      // Stream ended before the tag did: whatever frame was in progress is dropped
      this.isFinished = true;
      this.parser.cleanup();
    }
    this.settlePending();
  }

  private onError(error: Error): void {
    this.fail(error);
  }

  private fail(error: Error): void {
    this.error = error;
    this.isFinished = true;
    this.parser.cleanup();
    this.settlePending();
  }

  private settlePending(): void {
    const resolve = this.pendingResolve;
    const reject = this.pendingReject;
    if (!resolve || !reject) {
      return;
    }

    const frame = this.frames.shift();
    if (frame) {
      this.clearPending();
      resolve(frame);
    } else if (this.error) {
      this.clearPending();
      reject(this.error);
    } else if (this.isFinished) {
      this.clearPending();
      resolve(null);
    }
  }

  private clearPending(): void {
    this.pendingResolve = null;
    this.pendingReject = null;
  }

  /**
   * Checks if there are more frames available
   * @returns true if more frames might be available
   */
  hasNext(): boolean {
    if (this.frames.length > 0) {
      return true;
    }
    return !this.isFinished;
  }

  /**
   * Gets the next frame, in file order
   * @returns Promise that resolves to the next frame, or null once the tag is finished
   */
  async next(): Promise<Id3Frame | null> {
    const queued = this.frames.shift();
    if (queued) {
      return queued;
    }

    if (this.error) {
      throw this.error;
    }

    if (this.isFinished) {
      return null;
    }

    return new Promise<Id3Frame | null>((resolve, reject) => {
      // If there's already a pending promise, that's an error
      if (this.pendingResolve) {
        reject(new Error("Multiple concurrent calls to next() are not supported"));
        return;
      }

      this.pendingResolve = resolve;
      this.pendingReject = reject;
    });
  }
}
