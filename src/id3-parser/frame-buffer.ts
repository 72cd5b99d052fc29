import { Id3FrameHeader } from "./types";
import { FrameAllocationError } from "./errors";

/**
 * Accumulation buffer for the payload of the frame currently being parsed.
 *
 * Exactly one owner holds the payload at a time: the parser while bytes are
 * copied in, then the borrower passed to {@link FrameBuffer.lend} for the
 * duration of that call. After lending or {@link FrameBuffer.release} the
 * buffer holds nothing and every further release is a no-op.
 */
export class FrameBuffer {
  private data: Buffer | null;
  private filled: number = 0;

  private constructor(
    public readonly header: Id3FrameHeader,
    data: Buffer,
  ) {
    this.data = data;
  }

  /**
   * Allocates a payload buffer sized to the frame's declared size
   * @param header - Decoded frame header
   * @param maxSize - Largest payload that may be allocated
   * @returns The buffer, or the allocation error to surface from feed()
   */
  static allocate(
    header: Id3FrameHeader,
    maxSize: number,
  ): FrameBuffer | FrameAllocationError {
    if (header.size > maxSize) {
      return new FrameAllocationError(header.id, header.size);
    }

    try {
      return new FrameBuffer(header, Buffer.alloc(header.size));
    } catch (error) {
      if (error instanceof RangeError) {
        return new FrameAllocationError(header.id, header.size);
      }
      throw error;
    }
  }

  get remaining(): number {
    return this.data === null ? 0 : this.data.length - this.filled;
  }

  get isComplete(): boolean {
    return this.data !== null && this.filled === this.data.length;
  }

  get isReleased(): boolean {
    return this.data === null;
  }

  /**
   * Copies up to `maxBytes` bytes of `source` starting at `start`
   * @returns Number of bytes copied
   */
  write(source: Uint8Array, start: number, maxBytes: number): number {
    if (this.data === null) {
      return 0;
    }

    const count = Math.min(maxBytes, this.remaining, source.length - start);
    if (count <= 0) {
      return 0;
    }

    this.data.set(source.subarray(start, start + count), this.filled);
    this.filled += count;
    return count;
  }

  /**
   * Hands the complete payload to `borrower`, then releases it, even if the borrower throws
   */
  lend(borrower: (payload: Buffer) => void): void {
    const data = this.data;
    if (data === null || !this.isComplete) {
      return;
    }

    try {
      borrower(data);
    } finally {
      this.release();
    }
  }

  release(): void {
    this.data = null;
    this.filled = 0;
  }
}
