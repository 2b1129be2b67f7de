import { ErrorReport } from '@testprojects/shared';

export interface ReportContext {
  boardId: string | null;
  requestPath: string;
  requestMethod: string;
  userAgent: string | null;
}

export interface StackLocation {
  file: string | null;
  line: number | null;
}

// "    at fn (/srv/app/file.js:12:7)" or "    at /srv/app/file.js:12:7"
const STACK_FRAME_PATTERN = /^\s*at (?:.*? \()?(.+?):(\d+):\d+\)?$/;

/**
 * File and line of the frame that raised the error: the first frame of a V8 stack.
 */
export function innermostFrame(stack: string | undefined): StackLocation {
  for (const frame of (stack || '').split('\n')) {
    const match = STACK_FRAME_PATTERN.exec(frame);
    if (match) {
      return { file: match[1], line: parseInt(match[2], 10) };
    }
  }
  return { file: null, line: null };
}

function exceptionType(error: unknown): string {
  if (error instanceof Error) {
    return error.constructor.name || error.name || 'Error';
  }
  return 'Error';
}

export function errorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error ?? '');
  return message || 'Unknown error';
}

export function buildErrorReport(error: unknown, context: ReportContext, now: Date = new Date()): ErrorReport {
  const stackTrace = error instanceof Error && error.stack ? error.stack : `${exceptionType(error)}: ${errorMessage(error)}`;
  const { file, line } = innermostFrame(stackTrace);

  return {
    boardId: context.boardId || '',
    timestamp: now.toISOString(),
    file,
    line,
    stackTrace,
    message: errorMessage(error),
    exceptionType: exceptionType(error),
    requestPath: context.requestPath,
    requestMethod: context.requestMethod || 'UNKNOWN',
    userAgent: context.userAgent || null,
  };
}
