import { z } from 'zod';
import type { PostRecord, RawRecord, UserRecord } from '../types/records.js';

export const UNKNOWN_EMAIL = 'unknown@example.com';

function normalizeNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const str = value.trim();
  if (!str.length) return null;
  const parsed = Number(str);
  return Number.isFinite(parsed) ? parsed : null;
}

function normalizeText(value: unknown): string | null {
  if (value == null) return null;
  return typeof value === 'string' ? value : String(value);
}

// bigint columns; past 2^53 a JS number no longer holds the id exactly
const identifier = z.preprocess(normalizeNumber, z.number().int().safe());

const optionalText = z.preprocess(normalizeText, z.string().nullable());

const title = z.preprocess((value) => normalizeText(value)?.trim() ?? null, z.string().min(1));

const rawUserSchema = z
  .object({
    id: identifier,
    name: optionalText,
    username: optionalText,
    email: optionalText,
  })
  .transform(
    (row): UserRecord => ({
      user_id: row.id,
      name: row.name,
      username: row.username,
      email: row.email ?? UNKNOWN_EMAIL,
    })
  );

const rawPostSchema = z
  .object({
    id: identifier,
    userId: identifier,
    title,
    body: optionalText,
  })
  .transform(
    (row): PostRecord => ({
      post_id: row.id,
      user_id: row.userId,
      title: row.title,
      body: row.body,
      // code points, matching what `length()` returns in SQL
      title_len: Array.from(row.title).length,
    })
  );

function keepValid<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: readonly RawRecord[]): T[] {
  const result: T[] = [];
  for (const row of rows) {
    const parsed = schema.safeParse(row);
    if (parsed.success) {
      result.push(parsed.data);
    }
  }
  return result;
}

export function transformUsers(rows: readonly RawRecord[]): UserRecord[] {
  return keepValid(rawUserSchema, rows);
}

export function transformPosts(rows: readonly RawRecord[]): PostRecord[] {
  return keepValid(rawPostSchema, rows);
}

/**
 * Projects the raw API collections onto the `users` and `posts` tables.
 * Rows without their required fields are dropped.
 */
export function transform(
  rawUsers: readonly RawRecord[],
  rawPosts: readonly RawRecord[]
): { users: UserRecord[]; posts: PostRecord[] } {
  return {
    users: transformUsers(rawUsers),
    posts: transformPosts(rawPosts),
  };
}
