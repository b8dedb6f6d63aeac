import { readFile } from 'node:fs/promises';
import path from 'node:path';
import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;

/** The slice of `pg.Pool` / `pg.PoolClient` the repositories use. */
export interface Queryable {
  query(
    text: string,
    values?: unknown[],
  ): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
}

export type TransactionRunner = <T>(fn: (db: Queryable) => Promise<T>) => Promise<T>;

let _pool: pg.Pool | null = null;

/** The first call creates the pool; later calls ignore `connectionString`. */
export function getPool(connectionString: string | undefined = process.env['DATABASE_URL']): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString,
      max: 20,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'cargotrace-api',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}

/** Run a callback inside a transaction; rolls back on error. */
export async function withTransaction<T>(fn: (client: DbClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

export function schemaPath(): string {
  const packageRoot = path.dirname(require.resolve('@cargotrace/adapters/package.json'));
  return path.join(packageRoot, 'sql', 'schema.sql');
}

/** Idempotent; every statement in the schema file uses IF NOT EXISTS. */
export async function applySchema(db: Queryable = getPool()): Promise<void> {
  const sql = await readFile(schemaPath(), 'utf8');
  await db.query(sql);
  console.log('[pg-pool] schema applied');
}

/** Postgres unique_violation. */
export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === '23505';
}
