import { Injectable, Logger } from "@nestjs/common";
import { Request } from "express";
import { Readable } from "stream";
import { TagReaderService } from "../id3-parser/tag-reader.service";
import { TagReadResult } from "../id3-parser/types";
import { UploadValidationError } from "./errors";
import { BusboyFactory } from "./busboy-factory.service";

type TagReadOutcome =
  | { ok: true; result: TagReadResult }
  | { ok: false; error: unknown };

/**
 * Service responsible for reading the tag of an uploaded file.
 * The multipart file stream is fed straight into the tag parser; the file is never buffered whole.
 */
@Injectable()
export class TagUploadService {
  private readonly logger = new Logger(TagUploadService.name);

  constructor(
    private readonly tagReaderService: TagReaderService,
    private readonly busboyFactory: BusboyFactory,
  ) {}

  /**
   * Processes a multipart/form-data upload and reads the tag of its "file" field.
   *
   * @param req - Express request object containing multipart/form-data
   * @returns Promise resolving to what was read from the tag
   * @throws UploadValidationError for invalid requests (invalid content type, missing file, etc.)
   * @throws FrameAllocationError when a frame exceeds the configured size limit
   */
  async processUpload(req: Request): Promise<TagReadResult> {
    return new Promise((resolve, reject) => {
      const contentType = req.headers["content-type"] || "";
      if (!contentType.includes("multipart/form-data")) {
        reject(
          new UploadValidationError(
            "Invalid content type. Expected multipart/form-data",
          ),
        );
        return;
      }

      const busboy = this.busboyFactory.create(req.headers);
      let readOutcome: Promise<TagReadOutcome> | null = null;

      busboy.on(
        "file",
        this.handleFileEvent.bind(this, (outcome: Promise<TagReadOutcome>) => {
          readOutcome = outcome;
        }),
      );

      busboy.on(
        "finish",
        this.handleFinishEvent.bind(this, {
          readOutcome: () => readOutcome,
          resolve,
          reject,
        }),
      );

      busboy.on("error", this.handleBusboyError.bind(this, reject));

      req.pipe(busboy);
    });
  }

  /**
   * Handles the "file" event from Busboy.
   * @private
   */
  private handleFileEvent(
    setReadOutcome: (outcome: Promise<TagReadOutcome>) => void,
    name: string,
    stream: Readable,
    info: { filename: string; encoding: string; mimeType: string },
  ): void {
    if (name !== "file") {
      stream.resume(); // Drain non-file fields
      return;
    }

    this.logger.debug(
      `Received file upload: ${info.filename}, type: ${info.mimeType}`,
    );

    // Settled into a value so a failure before "finish" is not an unhandled rejection
    setReadOutcome(
      this.tagReaderService.readTag(stream).then(
        (result): TagReadOutcome => ({ ok: true, result }),
        (error: unknown): TagReadOutcome => ({ ok: false, error }),
      ),
    );
  }

  /**
   * Handles the "finish" event from Busboy.
   * @private
   */
  private async handleFinishEvent(state: {
    readOutcome: () => Promise<TagReadOutcome> | null;
    resolve: (value: TagReadResult) => void;
    reject: (reason?: unknown) => void;
  }): Promise<void> {
    const pending = state.readOutcome();
    if (!pending) {
      state.reject(new UploadValidationError("File is required"));
      return;
    }

    const outcome = await pending;
    if (outcome.ok) {
      state.resolve(outcome.result);
      return;
    }

    const { error } = outcome;
    this.logger.error(
      `Failed to read tag: ${error instanceof Error ? error.message : String(error)}`,
    );
    state.reject(error);
  }

  /**
   * Handles the "error" event from Busboy.
   * @private
   */
  private handleBusboyError(
    reject: (reason?: unknown) => void,
    error: Error,
  ): void {
    this.logger.error(`Busboy error: ${error.message}`, error.stack);
    reject(
      new UploadValidationError(
        `Failed to parse multipart form data: ${error.message}`,
      ),
    );
  }
}
