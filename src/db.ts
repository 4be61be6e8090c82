import path from 'node:path';
import pg from 'pg';
import { PGlite, type Transaction } from '@electric-sql/pglite';

export type Row = Record<string, unknown>;

export type QueryResult<T extends Row> = {
  rows: T[];
};

export interface Queryable {
  query<T extends Row = Row>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export interface Database extends Queryable {
  readonly location: string;
  withTransaction<T>(fn: (client: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

const MEMORY_URL = 'memory://';

function isPostgresUrl(url: string): boolean {
  return url.startsWith('postgres://') || url.startsWith('postgresql://');
}

function redactUrl(url: string): string {
  const parsed = new URL(url);
  if (parsed.password) {
    parsed.password = '***';
  }
  return parsed.toString();
}

function createPgDatabase(url: string): Database {
  const pool = new pg.Pool({ connectionString: url });

  return {
    location: redactUrl(url),
    async query<T extends Row = Row>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
      const { rows } = await pool.query<T>(text, params);
      return { rows };
    },
    async withTransaction<T>(fn: (client: Queryable) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query('begin');
        const result = await fn({
          async query<R extends Row = Row>(text: string, params?: unknown[]): Promise<QueryResult<R>> {
            const { rows } = await client.query<R>(text, params);
            return { rows };
          },
        });
        await client.query('commit');
        return result;
      } catch (error) {
        await client.query('rollback');
        throw error;
      } finally {
        client.release();
      }
    },
    async close(): Promise<void> {
      await pool.end();
    },
  };
}

function fromTransaction(tx: Transaction): Queryable {
  return {
    async query<T extends Row = Row>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
      const { rows } = await tx.query<T>(text, params);
      return { rows };
    },
  };
}

function createPgliteDatabase(url: string): Database {
  const inMemory = url === MEMORY_URL;
  const dataDir = inMemory ? undefined : path.resolve(url);
  const client = new PGlite(dataDir);

  return {
    location: dataDir ?? MEMORY_URL,
    async query<T extends Row = Row>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
      const { rows } = await client.query<T>(text, params);
      return { rows };
    },
    withTransaction<T>(fn: (client: Queryable) => Promise<T>): Promise<T> {
      return client.transaction((tx) => fn(fromTransaction(tx)));
    },
    async close(): Promise<void> {
      await client.close();
    },
  };
}

/**
 * Opens the relational store named by `url`.
 *
 * `postgres://` and `postgresql://` URLs go to a server through a `pg` pool,
 * `memory://` opens a throwaway in-process database, and anything else is
 * treated as a local PGlite data directory.
 */
export function createDatabase(url: string): Database {
  if (isPostgresUrl(url)) {
    return createPgDatabase(url);
  }
  return createPgliteDatabase(url);
}
