export interface AppConfig {
  readonly port: number;
  readonly host: string;
  readonly databaseUrl: string | null;
  readonly databaseSchema: string;
  readonly boardId: string | null;
  readonly runtimeErrorEndpointUrl: string | null;
}

const DEFAULT_PORT = 8000;

function optional(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function parsePort(value: string | undefined): number {
  const port = parseInt(value || '', 10);
  if (isNaN(port) || port < 0 || port > 65535) {
    return DEFAULT_PORT;
  }
  return port;
}

/**
 * Build the process-wide configuration once, at startup.
 * Everything downstream receives this value instead of reading process.env.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return Object.freeze({
    port: parsePort(env.PORT),
    host: optional(env.HOST) || '0.0.0.0',
    databaseUrl: optional(env.DATABASE_URL),
    databaseSchema: optional(env.DATABASE_SCHEMA) || 'public',
    boardId: optional(env.BOARD_ID),
    runtimeErrorEndpointUrl: optional(env.RUNTIME_ERROR_ENDPOINT_URL),
  });
}
