import pg from 'pg';
import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';

/**
 * Query surface shared by the pooled database handle and the handle a
 * transaction callback receives. Repositories accept either.
 */
export type WarehouseDb = PgDatabase<NodePgQueryResultHKT>;

export interface DatabaseHandle {
  db: NodePgDatabase;
  close(): Promise<void>;
}

export function createDatabase(opts: {
  connectionString: string;
  max?: number;
}): DatabaseHandle {
  const pool = new pg.Pool({
    connectionString: opts.connectionString,
    max: opts.max ?? 10,
  });

  return {
    db: drizzle(pool),
    close: () => pool.end(),
  };
}
