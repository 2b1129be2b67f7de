/**
 * Payload posted to the runtime error endpoint for every unhandled fault.
 */
export interface ErrorReport {
  boardId: string;
  timestamp: string;
  file: string | null;
  line: number | null;
  stackTrace: string;
  message: string;
  exceptionType: string;
  requestPath: string;
  requestMethod: string;
  userAgent: string | null;
}

export interface ErrorResponse {
  error: string;
  message?: string;
}
