import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export interface DbClientOptions {
  databaseUrl: string;
  /** Reported as `application_name`, so connections show up per cell in pg_stat_activity. */
  cellId: string;
  maxConnections?: number;
}

/**
 * postgres.js connection plus the Drizzle instance over it. The raw
 * `sql` handle is kept for schema bootstrap and shutdown.
 */
export function createDbClient(options: DbClientOptions) {
  const sql = postgres(options.databaseUrl, {
    max: options.maxConnections ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: { application_name: `jobflow-${options.cellId}` },
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient['db'];
