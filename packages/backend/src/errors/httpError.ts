/**
 * An expected condition with a caller-facing status.
 * The error middleware renders these as-is and never reports them.
 */
export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Project not found') {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = 'ValidationError';
  }
}

export class DatabaseConnectionError extends HttpError {
  constructor(cause: unknown) {
    super(503, `Database connection error: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'DatabaseConnectionError';
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}
