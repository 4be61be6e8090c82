import os from 'node:os';
import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { z } from 'zod';
import type { Queryable, Row } from '../db.js';
import { toCsvLines } from '../utils/csv.js';
import { formatTable } from '../utils/table.js';

export type ReportDefinition<T extends Row> = {
  key: string;
  title: string;
  sql: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  columns: Array<keyof T & string>;
};

export type ReportResult<T extends Row = Row> = {
  key: string;
  title: string;
  columns: Array<keyof T & string>;
  rows: T[];
};

export type TopPosterRow = {
  user_id: number;
  username: string | null;
  post_count: number;
};

export type AverageTitleLengthRow = {
  user_id: number;
  username: string | null;
  avg_title_len: number;
};

export type ShortTitleRow = {
  post_id: number;
  user_id: number;
  title: string;
  title_len: number;
};

// pg hands bigint columns back as strings
const integer = z.coerce.number().int();

export const topPostersReport: ReportDefinition<TopPosterRow> = {
  key: 'top-posters',
  title: 'Top 5 users by number of posts',
  sql: `
    select u.user_id, u.username, count(p.post_id)::int as post_count
    from users u
    left join posts p on u.user_id = p.user_id
    group by u.user_id, u.username
    order by post_count desc, u.user_id asc
    limit 5
  `,
  schema: z.object({
    user_id: integer,
    username: z.string().nullable(),
    post_count: integer,
  }),
  columns: ['user_id', 'username', 'post_count'],
};

export const averageTitleLengthReport: ReportDefinition<AverageTitleLengthRow> = {
  key: 'avg-title-length',
  title: 'Average title length per user (descending)',
  sql: `
    select u.user_id, u.username, round(avg(p.title_len), 2)::float8 as avg_title_len
    from users u
    join posts p on u.user_id = p.user_id
    group by u.user_id, u.username
    order by avg_title_len desc, u.user_id asc
    limit 10
  `,
  schema: z.object({
    user_id: integer,
    username: z.string().nullable(),
    avg_title_len: z.coerce.number(),
  }),
  columns: ['user_id', 'username', 'avg_title_len'],
};

export const shortTitlesReport: ReportDefinition<ShortTitleRow> = {
  key: 'short-titles',
  title: 'Posts with short titles (<10 chars)',
  sql: `
    select post_id, user_id, title, title_len
    from posts
    where title_len < 10
    order by title_len asc, post_id asc
    limit 10
  `,
  schema: z.object({
    post_id: integer,
    user_id: integer,
    title: z.string(),
    title_len: integer,
  }),
  columns: ['post_id', 'user_id', 'title', 'title_len'],
};

export async function runReport<T extends Row>(
  client: Queryable,
  definition: ReportDefinition<T>
): Promise<ReportResult<T>> {
  const { rows } = await client.query(definition.sql);
  return {
    key: definition.key,
    title: definition.title,
    columns: definition.columns,
    rows: definition.schema.array().parse(rows),
  };
}

export async function runReports(client: Queryable): Promise<ReportResult[]> {
  return [
    await runReport(client, topPostersReport),
    await runReport(client, averageTitleLengthReport),
    await runReport(client, shortTitlesReport),
  ];
}

export function renderReports(results: readonly ReportResult[]): string {
  return results
    .map((result, index) => `${index + 1}) ${result.title}:\n${formatTable(result.columns, result.rows)}`)
    .join('\n\n');
}

export async function writeReportFiles(results: readonly ReportResult[], dir: string): Promise<string[]> {
  await fsp.mkdir(dir, { recursive: true });
  const written: string[] = [];
  for (const result of results) {
    const reportPath = path.join(dir, `${result.key}.csv`);
    await fsp.writeFile(reportPath, toCsvLines(result.columns, result.rows).join(os.EOL), 'utf8');
    written.push(reportPath);
  }
  return written;
}
