import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { sql } from 'drizzle-orm';
import * as schema from '@shared/schema';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  pool: pg.Pool;
  db: Database;
  close: () => Promise<void>;
}

export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new pg.Pool({ connectionString, max: 10 });
  pool.on('error', (err) => {
    console.error('[Storage] Idle client error:', err.message);
  });

  const db = drizzle(pool, { schema });
  return { pool, db, close: () => pool.end() };
}

/**
 * The pgvector extension must exist before drizzle-kit pushes the items table.
 */
export async function ensureVectorExtension(db: Database): Promise<void> {
  await db.execute(sql`CREATE EXTENSION IF NOT EXISTS vector`);
}
