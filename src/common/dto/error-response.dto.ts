/**
 * Body of every error response
 */
export interface ErrorResponseDto {
  error: string;
  code: string;
}
