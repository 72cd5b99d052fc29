export interface FrameSummaryDto {
  id: string;
  size: number;
}

export interface StoredPictureDto {
  frameId: string;
  mimeType: string;
  pictureType: number;
  pictureTypeName: string;
  description: string;
  size: number;
  key: string;
}

/**
 * Response body of POST /tag-upload
 */
export interface TagUploadResponseDto {
  version: number;
  revision: number;
  tagSize: number;
  complete: boolean;
  frames: FrameSummaryDto[];
  pictures: StoredPictureDto[];
}
