import { Pool } from 'pg';
import type { PoolClient, QueryResult, QueryResultRow } from 'pg';

export type Queryable = {
  query<R extends QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<R>>;
};

export type Db = Queryable & {
  transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
};

// Dev reloads can re-evaluate this module; keep a single pool per process.
const globalForDb = globalThis as unknown as { pgPool?: Pool };

function searchPathFromUrl(connectionString: string): string | null {
  try {
    return new URL(connectionString).searchParams.get('schema');
  } catch {
    return null;
  }
}

function clientQueryable(client: PoolClient): Queryable {
  return {
    query: <R extends QueryResultRow>(text: string, params?: unknown[]) => client.query<R>(text, params),
  };
}

export function createDb(connectionString: string): Db {
  const schema = searchPathFromUrl(connectionString);

  // `?schema=` is not understood by the pg driver itself; map it to search_path.
  const pool =
    globalForDb.pgPool ??
    new Pool({
      connectionString,
      options: schema ? `-c search_path=${schema}` : undefined,
    });

  if (process.env.NODE_ENV !== 'production') {
    globalForDb.pgPool = pool;
  }

  return {
    query: <R extends QueryResultRow>(text: string, params?: unknown[]) => pool.query<R>(text, params),

    async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const result = await fn(clientQueryable(client));
        await client.query('COMMIT');
        return result;
      } catch (e) {
        await client.query('ROLLBACK');
        throw e;
      } finally {
        client.release();
      }
    },

    async close() {
      globalForDb.pgPool = undefined;
      await pool.end();
    },
  };
}

export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const code = 'code' in error ? error.code : undefined;
  if (code !== '23505') return false;
  if (!constraint) return true;
  return 'constraint' in error && error.constraint === constraint;
}
