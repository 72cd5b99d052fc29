/**
 * Decodes a 4-byte synchsafe integer: 7 significant bits per byte, most significant first
 */
export function decodeSynchsafe(buffer: Uint8Array, offset = 0): number {
  return (
    (buffer[offset] & 0x7f) * 0x200000 +
    (buffer[offset + 1] & 0x7f) * 0x4000 +
    (buffer[offset + 2] & 0x7f) * 0x80 +
    (buffer[offset + 3] & 0x7f)
  );
}

/**
 * Decodes a plain 4-byte big-endian unsigned integer
 */
export function decodeUInt32BE(buffer: Uint8Array, offset = 0): number {
  return (
    buffer[offset] * 0x1000000 +
    buffer[offset + 1] * 0x10000 +
    buffer[offset + 2] * 0x100 +
    buffer[offset + 3]
  );
}

/**
 * Decodes a plain 3-byte big-endian unsigned integer (ID3v2.2 frame sizes)
 */
export function decodeUInt24BE(buffer: Uint8Array, offset = 0): number {
  return (
    buffer[offset] * 0x10000 + buffer[offset + 1] * 0x100 + buffer[offset + 2]
  );
}
