import { Client } from 'pg';
import { AppConfig } from './env';
import { DatabaseConnectionError, HttpError } from '../errors/httpError';

/**
 * Open a dedicated connection for a single request. No pooling: the caller
 * owns the client and must end it.
 */
export async function openConnection(config: AppConfig): Promise<Client> {
  if (!config.databaseUrl) {
    throw new HttpError(500, 'DATABASE_URL environment variable not set');
  }

  const client = new Client({ connectionString: config.databaseUrl });
  // A dropped backend also rejects the pending query; the event only needs a listener.
  client.on('error', (error) => {
    console.error('[Database] Connection error:', error);
  });
  try {
    await client.connect();
    return client;
  } catch (error) {
    console.error('[Database] Connection failed:', error);
    throw new DatabaseConnectionError(error);
  }
}

/**
 * Run `work` inside a transaction on its own connection. Commits when `work`
 * resolves; the connection is closed either way, which discards anything
 * left uncommitted.
 */
export async function withConnection<T>(
  config: AppConfig,
  work: (client: Client) => Promise<T>
): Promise<T> {
  const client = await openConnection(config);
  try {
    await client.query('BEGIN');
    await client.query(`SET search_path = ${client.escapeIdentifier(config.databaseSchema)}, "$user"`);
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } finally {
    // Never let a failed close replace the fault raised by `work`.
    await client.end().catch((error: unknown) => {
      console.error('[Database] Failed to close connection:', error);
    });
  }
}
