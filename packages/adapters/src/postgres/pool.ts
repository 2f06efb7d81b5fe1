import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;

let _pool: pg.Pool | null = null;

/** Profiles persist only when a connection string is configured. */
export function isDatabaseConfigured(): boolean {
  return Boolean(process.env['DATABASE_URL']);
}

export function getPool(): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString: process.env['DATABASE_URL'],
      max: 5,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'telemetry-analyzer-api',
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
