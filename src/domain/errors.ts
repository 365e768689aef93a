export const ErrorCode = {
  // Input
  PDF_NOT_FOUND: 'PDF_NOT_FOUND',
  UNSUPPORTED_FILE_TYPE: 'UNSUPPORTED_FILE_TYPE',
  CONVERSION_FAILED: 'CONVERSION_FAILED',

  // Configuration
  CONFIG_MISSING_API_KEY: 'CONFIG_MISSING_API_KEY',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',

  // OCR service
  OCR_REQUEST_FAILED: 'OCR_REQUEST_FAILED',
  OCR_AUTH_ERROR: 'OCR_AUTH_ERROR',
  OCR_RATE_LIMITED: 'OCR_RATE_LIMITED',
  OCR_MALFORMED_RESPONSE: 'OCR_MALFORMED_RESPONSE',

  // Output
  IMAGE_DECODE_FAILED: 'IMAGE_DECODE_FAILED',
  INVALID_IMAGE_ID: 'INVALID_IMAGE_ID',
  OUTPUT_WRITE_FAILED: 'OUTPUT_WRITE_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
