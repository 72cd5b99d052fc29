import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { Response } from "express";
import { ErrorResponseDto } from "../dto/error-response.dto";

/**
 * Global exception filter that formats all errors as { error, code }.
 * Only HttpExceptions carrying that shape reach the client; anything else is
 * logged and answered with a generic 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      const body = exception.getResponse();
      if (this.isErrorResponse(body)) {
        response.status(exception.getStatus()).json(body);
        return;
      }
    }

    this.logger.error("Unexpected error format", exception);
    const body: ErrorResponseDto = {
      error: "Internal server error",
      code: HttpStatus[HttpStatus.INTERNAL_SERVER_ERROR],
    };
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json(body);
  }

  private isErrorResponse(body: unknown): body is ErrorResponseDto {
    return (
      typeof body === "object" &&
      body !== null &&
      "code" in body &&
      "error" in body &&
      typeof body.code === "string" &&
      typeof body.error === "string"
    );
  }
}
