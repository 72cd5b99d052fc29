import { FrameSummary, Id3TagHeader } from "../id3-parser/types";

/**
 * A picture taken from the tag and written to storage
 */
export interface StoredPicture {
  frameId: string;
  mimeType: string;
  pictureType: number;
  pictureTypeName: string;
  description: string;
  size: number;
  key: string;
}

/**
 * Domain result of processing an uploaded file's tag.
 * Framework-agnostic result that can be converted to DTOs in the API layer.
 */
export interface TagProcessingResult {
  header: Id3TagHeader;
  complete: boolean;
  frames: FrameSummary[];
  pictures: StoredPicture[];
}
