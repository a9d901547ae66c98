import fs from 'fs/promises';
import path from 'path';
import { Pool } from 'pg';
import { errorMessage } from '../errors';

/** The subset of `pg.Pool` the build history needs. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
}

/** A pooled connection; `release(true)` discards it instead of returning it. */
export interface DbClient extends Queryable {
  release(destroy?: boolean): void;
}

/** A `Queryable` that can also hand out a dedicated client, as `pg.Pool` does. */
export interface Database extends Queryable {
  connect(): Promise<DbClient>;
}

export const SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'sql', 'schema.sql');

export function createPool(connectionString: string): Pool {
  const pool = new Pool({ connectionString });
  pool.on('error', (err) => {
    console.error('[db] Idle client error:', err.message);
  });
  return pool;
}

export async function checkConnection(pool: Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query('SELECT 1');
  } finally {
    client.release();
  }
}

/** Runs `work` between BEGIN and COMMIT on one client, rolling back if it throws. */
export async function withTransaction<T>(db: Database, work: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await db.connect();
  let broken = false;
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      broken = true;
      console.error('[db] Rollback failed:', errorMessage(rollbackErr));
    }
    throw err;
  } finally {
    client.release(broken);
  }
}

export async function applySchema(db: Queryable, schemaPath: string = SCHEMA_PATH): Promise<void> {
  const schema = await fs.readFile(schemaPath, 'utf-8');
  await db.query(schema);
  console.log('[db] Database schema applied');
}
