import { FrameCallback } from "../../src/id3-parser/types";

export function synchsafeBytes(value: number): number[] {
  return [
    (value >> 21) & 0x7f,
    (value >> 14) & 0x7f,
    (value >> 7) & 0x7f,
    value & 0x7f,
  ];
}

function uint32Bytes(value: number): number[] {
  return [
    (value >>> 24) & 0xff,
    (value >>> 16) & 0xff,
    (value >>> 8) & 0xff,
    value & 0xff,
  ];
}

/**
 * Frame for a v2.3 (plain size) or v2.4 (synchsafe size) tag
 */
export function frame(
  id: string,
  payload: Buffer | number[],
  version: 3 | 4 = 3,
  flags = 0,
): Buffer {
  const data = Buffer.from(payload);
  const size = version === 4 ? synchsafeBytes(data.length) : uint32Bytes(data.length);
  return Buffer.concat([
    Buffer.from(id, "latin1"),
    Buffer.from(size),
    Buffer.from([(flags >> 8) & 0xff, flags & 0xff]),
    data,
  ]);
}

/**
 * Frame for a v2.2 tag: 3-char id, 3-byte size
 */
export function frameV22(id: string, payload: Buffer | number[]): Buffer {
  const data = Buffer.from(payload);
  return Buffer.concat([
    Buffer.from(id, "latin1"),
    Buffer.from([
      (data.length >> 16) & 0xff,
      (data.length >> 8) & 0xff,
      data.length & 0xff,
    ]),
    data,
  ]);
}

export interface TagOptions {
  version?: number;
  revision?: number;
  flags?: number;
  extendedHeader?: Buffer;
  frames?: Buffer[];
  padding?: number;
  /**
   * Declared size; defaults to the size of everything after the header
   */
  tagSize?: number;
}

export function buildTag(options: TagOptions = {}): Buffer {
  const body = Buffer.concat([
    options.extendedHeader ?? Buffer.alloc(0),
    ...(options.frames ?? []),
    Buffer.alloc(options.padding ?? 0),
  ]);
  return Buffer.concat([
    Buffer.from("ID3", "latin1"),
    Buffer.from([options.version ?? 3, options.revision ?? 0, options.flags ?? 0]),
    Buffer.from(synchsafeBytes(options.tagSize ?? body.length)),
    body,
  ]);
}

/**
 * Splits data into a first chunk holding the "ID3" signature, then chunks of `size` bytes
 */
export function chunksOf(data: Buffer, size: number): Buffer[] {
  const chunks = [data.subarray(0, 3)];
  for (let offset = 3; offset < data.length; offset += size) {
    chunks.push(data.subarray(offset, offset + size));
  }
  return chunks;
}

export interface DeliveredFrame {
  id: string;
  payload: Buffer;
  length: number;
}

/**
 * Callback that copies every delivered frame into `frames`
 */
export function recordFrames(): { frames: DeliveredFrame[]; onFrame: FrameCallback } {
  const frames: DeliveredFrame[] = [];
  return {
    frames,
    onFrame: (id, payload, length) => {
      frames.push({ id, payload: Buffer.from(payload), length });
    },
  };
}
