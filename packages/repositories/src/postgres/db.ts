import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;

  /** Pool size (defaults to 10) */
  maxConnections?: number;

  /**
   * Seconds to wait for a connection before failing with CONNECT_TIMEOUT,
   * which callers treat as the store being unavailable (defaults to 10)
   */
  connectTimeoutSeconds?: number;
};

/**
 * Create a connection pool and a Drizzle instance over the speed schema.
 *
 * bigint columns (obs_id) come back as numbers; numeric columns stay strings
 * and are converted by the row mappers.
 *
 * ```ts
 * const { db, client } = createDatabase({ connectionString: config.databaseUrl });
 * const repos = createPgRepositoryContext(db);
 * // on shutdown
 * await client.end();
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
    connect_timeout: config.connectTimeoutSeconds ?? 10,
    onnotice: () => {},
  });

  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];
export type DatabaseClient = ReturnType<typeof createDatabase>['client'];
