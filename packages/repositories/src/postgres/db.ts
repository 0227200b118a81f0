// Postgres connection for the config store

import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;

  /**
   * Seconds an idle connection stays open
   */
  idleTimeout?: number;
};

/**
 * Create a connection pool and its Drizzle instance.
 * Nothing connects until the first query.
 *
 * ```ts
 * const { db, close } = createDatabase({ connectionString: process.env.PATCHWORK_DATABASE_URL });
 * const configRepository = new PgConfigRepository(db);
 * // ...
 * await close();
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 4,
    idle_timeout: config.idleTimeout ?? 30,
  });

  const db = drizzle(client, { schema });

  return { db, client, close: () => client.end() };
}

export type Database = ReturnType<typeof createDatabase>['db'];
