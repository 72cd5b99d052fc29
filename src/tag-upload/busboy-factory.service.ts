import { Injectable } from "@nestjs/common";
import Busboy from "busboy";
import { IncomingHttpHeaders } from "http";

/**
 * Factory service for creating Busboy instances.
 * Lets tests replace multipart parsing through dependency injection.
 */
@Injectable()
export class BusboyFactory {
  /**
   * Creates a Busboy instance that accepts a single file per request.
   *
   * @param headers - HTTP headers from the request
   */
  create(headers: IncomingHttpHeaders): Busboy.Busboy {
    return Busboy({ headers, limits: { files: 1 } });
  }
}
