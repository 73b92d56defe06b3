import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;

/** The slice of a pg pool the repositories use; tests hand in an in-process stand-in. */
export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

let _pool: pg.Pool | null = null;

export function getPool(connectionString = process.env['DATABASE_URL']): pg.Pool {
  if (!_pool) {
    _pool = new Pool({
      connectionString,
      max: 5,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: 'ops-recap-api',
    });
    _pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return _pool;
}

/** Adapt the shared pool to the `SqlClient` shape. */
export function poolClient(pool: pg.Pool = getPool()): SqlClient {
  return {
    query: async (text, params) => {
      const result = await pool.query(text, params);
      return { rows: result.rows };
    },
  };
}

export async function closePool(): Promise<void> {
  if (_pool) {
    await _pool.end();
    _pool = null;
  }
}
