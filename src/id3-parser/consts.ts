/**
 * ID3v2 wire format constants
 */
export const ID3V2_CONSTANTS = {
  MAGIC: [0x49, 0x44, 0x33] as const, // "ID3"
  HEADER_SIZE: 10,
  EXTENDED_HEADER_FLAG: 0x40,
  EXTENDED_HEADER_SIZE_FIELD: 4,
  FRAME_HEADER_SIZE: 10,
  FRAME_HEADER_SIZE_V22: 6,
  FRAME_ID_LENGTH: 4,
  FRAME_ID_LENGTH_V22: 3,
  PADDING_BYTE: 0x00,
  V23_VERSION: 3,
  V24_VERSION: 4,
} as const;

/**
 * Frame payload cap used by TagReaderService when ID3_MAX_FRAME_SIZE is unset or invalid (16 MiB)
 */
export const DEFAULT_MAX_FRAME_SIZE = 16 * 1024 * 1024;

/**
 * Attached picture frame identifiers (v2.3/v2.4 and v2.2)
 */
export const PICTURE_FRAME_IDS = ["APIC", "PIC"] as const;

/**
 * Text encoding bytes used by picture descriptions
 */
export enum TextEncoding {
  Latin1 = 0x00,
  Utf16 = 0x01,
  Utf16BE = 0x02,
  Utf8 = 0x03,
}

/**
 * Picture type names, indexed by the picture type byte
 */
export const PICTURE_TYPES = [
  "Other",
  "32x32 pixels file icon",
  "Other file icon",
  "Cover (front)",
  "Cover (back)",
  "Leaflet page",
  "Media",
  "Lead artist/lead performer/soloist",
  "Artist/performer",
  "Conductor",
  "Band/Orchestra",
  "Composer",
  "Lyricist/text writer",
  "Recording Location",
  "During recording",
  "During performance",
  "Movie/video screen capture",
  "A bright coloured fish",
  "Illustration",
  "Band/artist logotype",
  "Publisher/Studio logotype",
] as const;

/**
 * ID3v2.2 image formats with a well-known MIME type
 */
export const V22_IMAGE_FORMATS: ReadonlyMap<string, string> = new Map([
  ["JPG", "image/jpeg"],
  ["PNG", "image/png"],
]);
