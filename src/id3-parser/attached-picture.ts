import {
  PICTURE_FRAME_IDS,
  PICTURE_TYPES,
  TextEncoding,
  V22_IMAGE_FORMATS,
} from "./consts";
import {
  InvalidPictureFrameError,
  UnsupportedTextEncodingError,
} from "./errors";

/**
 * Decoded APIC (v2.3/v2.4) or PIC (v2.2) frame
 */
export interface AttachedPicture {
  frameId: string;
  encoding: TextEncoding;
  mimeType: string;
  pictureType: number;
  pictureTypeName: string;
  description: string;
  data: Buffer;
}

const UTF16_LE_BOM = [0xff, 0xfe] as const;
const UTF16_BE_BOM = [0xfe, 0xff] as const;

/**
 * Stateless decoder for attached picture payloads delivered by the tag parser.
 * Layout: encoding byte, MIME type (APIC) or 3-char image format (PIC),
 * picture type byte, encoded description, image data.
 */
export class AttachedPictureDecoder {
  static isPictureFrame(frameId: string): boolean {
    return PICTURE_FRAME_IDS.some((id) => id === frameId);
  }

  /**
   * Splits a picture frame payload into its fields
   * @param frameId - "APIC" or "PIC"
   * @param payload - Complete frame payload
   * @throws InvalidPictureFrameError if the payload is truncated
   * @throws UnsupportedTextEncodingError if the encoding byte is unknown
   */
  static decode(frameId: string, payload: Buffer): AttachedPicture {
    if (payload.length === 0) {
      throw new InvalidPictureFrameError(`Picture frame ${frameId} is empty`);
    }

    const encoding = payload[0];
    if (!this.isTextEncoding(encoding)) {
      throw new UnsupportedTextEncodingError(encoding);
    }

    let offset = 1;
    let mimeType: string;
    if (frameId === "PIC") {
      if (payload.length < offset + 3) {
        throw new InvalidPictureFrameError(
          "Picture frame PIC is missing its image format",
        );
      }
      const format = payload.toString("latin1", offset, offset + 3);
      mimeType =
        V22_IMAGE_FORMATS.get(format.toUpperCase()) ??
        `image/${format.toLowerCase()}`;
      offset += 3;
    } else {
      const mimeEnd = payload.indexOf(0, offset);
      if (mimeEnd === -1) {
        throw new InvalidPictureFrameError(
          `Picture frame ${frameId} has an unterminated MIME type`,
        );
      }
      mimeType = payload.toString("latin1", offset, mimeEnd);
      offset = mimeEnd + 1;
    }

    if (offset >= payload.length) {
      throw new InvalidPictureFrameError(
        `Picture frame ${frameId} is missing its picture type`,
      );
    }
    const pictureType = payload[offset];
    offset += 1;

    const wide = encoding === TextEncoding.Utf16 || encoding === TextEncoding.Utf16BE;
    const descriptionEnd = wide
      ? this.findWideTerminator(payload, offset)
      : payload.indexOf(0, offset);
    if (descriptionEnd === -1) {
      throw new InvalidPictureFrameError(
        `Picture frame ${frameId} has an unterminated description`,
      );
    }

    return {
      frameId,
      encoding,
      mimeType,
      pictureType,
      pictureTypeName:
        pictureType < PICTURE_TYPES.length ? PICTURE_TYPES[pictureType] : "Unknown",
      description: this.decodeText(
        payload.subarray(offset, descriptionEnd),
        encoding,
      ),
      data: payload.subarray(descriptionEnd + (wide ? 2 : 1)),
    };
  }

  private static isTextEncoding(value: number): value is TextEncoding {
    return value >= TextEncoding.Latin1 && value <= TextEncoding.Utf8;
  }

  /**
   * Finds a 00 00 terminator on a 2-byte boundary
   */
  private static findWideTerminator(buffer: Buffer, start: number): number {
    for (let index = start; index + 1 < buffer.length; index += 2) {
      if (buffer[index] === 0 && buffer[index + 1] === 0) {
        return index;
      }
    }
    return -1;
  }

  private static decodeText(bytes: Buffer, encoding: TextEncoding): string {
    switch (encoding) {
      case TextEncoding.Latin1:
        return bytes.toString("latin1");
      case TextEncoding.Utf8:
        return bytes.toString("utf8");
      case TextEncoding.Utf16BE:
        return this.decodeUtf16BE(bytes);
      case TextEncoding.Utf16:
        if (bytes[0] === UTF16_BE_BOM[0] && bytes[1] === UTF16_BE_BOM[1]) {
          return this.decodeUtf16BE(bytes.subarray(2));
        }
        if (bytes[0] === UTF16_LE_BOM[0] && bytes[1] === UTF16_LE_BOM[1]) {
          return bytes.toString("utf16le", 2);
        }
        return bytes.toString("utf16le");
    }
  }

  private static decodeUtf16BE(bytes: Buffer): string {
    const even = bytes.length - (bytes.length % 2);
    return Buffer.from(bytes.subarray(0, even)).swap16().toString("utf16le");
  }
}
