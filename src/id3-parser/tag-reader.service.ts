import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Readable } from "stream";
import { AttachedPicture, AttachedPictureDecoder } from "./attached-picture";
import { DEFAULT_MAX_FRAME_SIZE } from "./consts";
import { Id3ParserError } from "./errors";
import { Id3FrameIterator } from "./id3-frame-iterator";
import { FrameSummary, TagReadResult } from "./types";

/**
 * Reads the ID3v2 tag at the start of a stream without buffering the file.
 * Only picture payloads are kept; other frames are summarised by id and size.
 */
@Injectable()
export class TagReaderService {
  private readonly logger = new Logger(TagReaderService.name);
  private readonly maxFrameSize: number;

  constructor(configService: ConfigService) {
    const configured = Number(configService.get<string>("ID3_MAX_FRAME_SIZE"));
    this.maxFrameSize =
      Number.isInteger(configured) && configured > 0
        ? configured
        : DEFAULT_MAX_FRAME_SIZE;
  }

  /**
   * @param stream - Audio file stream, positioned at the start of the file
   * @throws FrameAllocationError when a frame is larger than the configured maximum
   * @throws Error when the stream fails
   */
  async readTag(stream: Readable): Promise<TagReadResult> {
    const iterator = new Id3FrameIterator(stream, {
      maxFrameSize: this.maxFrameSize,
    });
    const frames: FrameSummary[] = [];
    const pictures: AttachedPicture[] = [];

    for (let frame = await iterator.next(); frame; frame = await iterator.next()) {
      frames.push({ id: frame.id, size: frame.payload.length });

      if (!AttachedPictureDecoder.isPictureFrame(frame.id)) {
        continue;
      }

      try {
        pictures.push(AttachedPictureDecoder.decode(frame.id, frame.payload));
      } catch (error) {
        if (!(error instanceof Id3ParserError)) {
          throw error;
        }
        this.logger.warn(`Skipping ${frame.id} frame: ${error.message}`);
      }
    }

    this.logger.debug(
      `Read ${frames.length} frames (${pictures.length} pictures), tag ${iterator.isComplete ? "complete" : "truncated"}`,
    );

    return {
      header: iterator.header,
      complete: iterator.isComplete,
      frames,
      pictures,
    };
  }
}
