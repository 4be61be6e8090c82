import type { AppConfig } from '../config.js';
import { createDatabase, type Database, type Queryable, type Row } from '../db.js';
import type { Logger, LogLevel } from '../logger.js';
import type { FetchLike } from '../services/extract.js';

export type LogEntry = {
  level: LogLevel;
  message: string;
};

export function createMemoryLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    info: (message) => entries.push({ level: 'info', message }),
    warn: (message) => entries.push({ level: 'warn', message }),
    error: (message) => entries.push({ level: 'error', message }),
  };
}

export function jsonResponse(body: unknown, init: { status?: number; statusText?: string } = {}): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    statusText: init.statusText,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * Serves `routes[resource]` for `{base}/{resource}` and records every URL it
 * was asked for. Unknown resources fail like an unreachable host.
 */
export function createFetchStub(routes: Record<string, () => Response>): FetchLike & { calls: string[] } {
  const calls: string[] = [];
  const stub = async (url: string): Promise<Response> => {
    calls.push(url);
    const resource = url.slice(url.lastIndexOf('/') + 1);
    const route = routes[resource];
    if (!route) {
      throw new TypeError('fetch failed');
    }
    return route();
  };
  return Object.assign(stub, { calls });
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    apiBase: 'https://api.test',
    databaseUrl: 'memory://',
    fetchTimeoutMs: 1000,
    reportDir: null,
    ...overrides,
  };
}

export async function withMemoryDatabase<T>(fn: (db: Database) => Promise<T>): Promise<T> {
  const db = createDatabase('memory://');
  try {
    return await fn(db);
  } finally {
    await db.close();
  }
}

/** Plain copies of the selected rows, with int8 values read back as numbers. */
export async function selectRows(client: Queryable, sql: string): Promise<Row[]> {
  const { rows } = await client.query(sql);
  return rows.map((row) =>
    Object.fromEntries(Object.entries(row).map(([key, value]) => [key, typeof value === 'bigint' ? Number(value) : value]))
  );
}
