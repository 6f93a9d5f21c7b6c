import { Pool } from 'pg';
import type { QueryResult } from 'pg';

export interface SqlResult<T> {
  rows: T[];
  rowCount: number;
}

export interface SqlExecutor {
  query<T = Record<string, unknown>>(text: string, params?: unknown[]): Promise<SqlResult<T>>;
}

export interface SqlClient extends SqlExecutor {
  release(): void;
}

export interface SqlPool extends SqlExecutor {
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

export const createPool = (connectionString: string) =>
  new Pool({
    connectionString,
    max: 25,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    statement_timeout: 30_000,
  });

const toSqlResult = <T>(result: QueryResult): SqlResult<T> => ({
  rows: result.rows,
  rowCount: result.rowCount ?? 0,
});

/**
 * Narrows a pg Pool to the handful of calls the store makes, so tests can
 * script query results without a database.
 */
export const wrapPool = (pool: Pool): SqlPool => ({
  query: async <T = Record<string, unknown>>(text: string, params: unknown[] = []) =>
    toSqlResult<T>(await pool.query(text, params)),
  connect: async () => {
    const client = await pool.connect();
    return {
      query: async <T = Record<string, unknown>>(text: string, params: unknown[] = []) =>
        toSqlResult<T>(await client.query(text, params)),
      release: () => client.release(),
    };
  },
  end: () => pool.end(),
});

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client, rolling back on any
 * error. The client is released before the promise settles.
 */
export const withTransaction = async <T>(pool: SqlPool, fn: (client: SqlExecutor) => Promise<T>): Promise<T> => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch(() => undefined);
    throw error;
  } finally {
    client.release();
  }
};
