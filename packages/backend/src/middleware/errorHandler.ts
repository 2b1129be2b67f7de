import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ErrorResponse } from '@testprojects/shared';
import { AppConfig } from '../config/env';
import { isHttpError } from '../errors/httpError';
import { resolveBoardId } from '../reporting/boardId';
import { buildErrorReport, errorMessage } from '../reporting/errorReport';
import { ErrorReporter } from '../reporting/errorReporter';
import { getRouteParams } from '../utils/asyncHandler';

export const GENERIC_ERROR_MESSAGE = 'An error occurred while processing your request';

// body-parser and friends tag client errors (malformed JSON, oversized body) with a 4xx status
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) {
    return null;
  }
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * The one place unhandled faults are intercepted. Expected HTTP errors are
 * rendered as they are; everything else is reported out-of-band and
 * answered with a generic 500.
 */
export function createErrorHandler(
  reporter: ErrorReporter,
  config: Pick<AppConfig, 'boardId' | 'runtimeErrorEndpointUrl'>
): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    if (isHttpError(err)) {
      const body: ErrorResponse = { error: err.message };
      return res.status(err.status).json(body);
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      const body: ErrorResponse = { error: errorMessage(err) };
      return res.status(clientStatus).json(body);
    }

    console.error('[ErrorReporter] Unhandled exception occurred:', err);

    const boardId = resolveBoardId(
      { params: getRouteParams(res), query: req.query, headers: req.headers },
      config
    );
    reporter.report(
      buildErrorReport(err, {
        boardId,
        requestPath: req.path,
        requestMethod: req.method,
        userAgent: req.get('user-agent') || null,
      })
    );

    const body: ErrorResponse = { error: GENERIC_ERROR_MESSAGE, message: errorMessage(err) };
    res.status(500).json(body);
  };
}
