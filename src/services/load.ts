import type { Database, Queryable } from '../db.js';
import type { Logger } from '../logger.js';
import type { PostRecord, UserRecord } from '../types/records.js';

type TableColumn<R> = {
  name: keyof R & string;
  type: 'bigint' | 'integer' | 'text';
};

type TableConfig<R> = {
  table: string;
  columns: TableColumn<R>[];
};

export const USERS_TABLE: TableConfig<UserRecord> = {
  table: 'users',
  columns: [
    { name: 'user_id', type: 'bigint' },
    { name: 'name', type: 'text' },
    { name: 'username', type: 'text' },
    { name: 'email', type: 'text' },
  ],
};

// posts.user_id points at users.user_id; no constraint is declared for it.
export const POSTS_TABLE: TableConfig<PostRecord> = {
  table: 'posts',
  columns: [
    { name: 'post_id', type: 'bigint' },
    { name: 'user_id', type: 'bigint' },
    { name: 'title', type: 'text' },
    { name: 'body', type: 'text' },
    { name: 'title_len', type: 'integer' },
  ],
};

export type LoadSummary = {
  users: number;
  posts: number;
};

async function recreateTable<R>(client: Queryable, config: TableConfig<R>): Promise<void> {
  const columns = config.columns.map((column) => `${column.name} ${column.type}`).join(', ');
  await client.query(`drop table if exists ${config.table}`);
  await client.query(`create table ${config.table} (${columns})`);
}

async function insertRows<R>(client: Queryable, config: TableConfig<R>, rows: readonly R[]): Promise<number> {
  const names = config.columns.map((column) => column.name).join(', ');
  const placeholders = config.columns.map((_, index) => `$${index + 1}`).join(', ');
  const statement = `insert into ${config.table} (${names}) values (${placeholders})`;

  let total = 0;
  for (const row of rows) {
    const values = config.columns.map((column) => row[column.name] ?? null);
    await client.query(statement, values);
    total += 1;
  }
  return total;
}

export async function replaceTable<R>(client: Queryable, config: TableConfig<R>, rows: readonly R[]): Promise<number> {
  await recreateTable(client, config);
  return insertRows(client, config, rows);
}

/**
 * Replaces the `users` and `posts` tables with the given rows in a single
 * transaction.
 */
export async function loadTables(
  db: Database,
  users: readonly UserRecord[],
  posts: readonly PostRecord[],
  logger: Logger
): Promise<LoadSummary> {
  const summary = await db.withTransaction(async (client) => ({
    users: await replaceTable(client, USERS_TABLE, users),
    posts: await replaceTable(client, POSTS_TABLE, posts),
  }));

  logger.info(`Loaded ${summary.users} users and ${summary.posts} posts into ${db.location}`);
  return summary;
}
