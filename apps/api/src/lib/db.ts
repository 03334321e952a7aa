import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';

export interface Database {
  db: NodePgDatabase;
  close(): Promise<void>;
}

export function createDb(connectionString: string): Database {
  const pool = new pg.Pool({ connectionString });
  return {
    db: drizzle(pool),
    close: () => pool.end(),
  };
}
