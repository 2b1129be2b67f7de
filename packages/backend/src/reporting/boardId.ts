import { IncomingHttpHeaders } from 'http';
import { Request } from 'express';
import { AppConfig } from '../config/env';

export interface BoardIdRequest {
  params: Record<string, string>;
  query: Request['query'];
  headers: IncomingHttpHeaders;
}

type BoardIdConfig = Pick<AppConfig, 'boardId' | 'runtimeErrorEndpointUrl'>;

// Hosted instances are named webapi<board id>, e.g. webapi0123456789abcdef01234567.example.com
const HOSTED_BOARD_ID_PATTERN = /webapi([a-f0-9]{24})/i;

function firstString(value: unknown): string | null {
  if (typeof value === 'string') {
    return value || null;
  }
  if (Array.isArray(value)) {
    return firstString(value[0]);
  }
  return null;
}

function matchHostedBoardId(value: string | null): string | null {
  if (!value) {
    return null;
  }
  const match = HOSTED_BOARD_ID_PATTERN.exec(value);
  return match ? match[1] : null;
}

/**
 * Find the board id a fault belongs to. Sources are tried in order and the
 * first non-empty one wins: route param, query string, X-Board-Id header,
 * BOARD_ID, the Host header, then the error endpoint URL.
 */
export function resolveBoardId(req: BoardIdRequest, config: BoardIdConfig): string | null {
  const sources: Array<[string, () => string | null]> = [
    ['route params', () => firstString(req.params.boardId)],
    ['query params', () => firstString(req.query.boardId)],
    ['header', () => firstString(req.headers['x-board-id'])],
    ['BOARD_ID env var', () => config.boardId],
    ['hostname', () => matchHostedBoardId(firstString(req.headers.host))],
    ['RUNTIME_ERROR_ENDPOINT_URL', () => matchHostedBoardId(config.runtimeErrorEndpointUrl)],
  ];

  for (const [source, lookup] of sources) {
    const boardId = lookup();
    if (boardId) {
      console.warn(`[ErrorReporter] Extracted boardId from ${source}: ${boardId}`);
      return boardId;
    }
  }

  console.warn('[ErrorReporter] Could not extract boardId from any source');
  return null;
}
