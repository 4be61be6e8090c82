import { z } from 'zod';
import { upstreamError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { CollectionSource, RawRecord } from '../types/records.js';
import { describeError } from '../utils/describe-error.js';
import { FALLBACK_POSTS, FALLBACK_USERS } from './fallback.js';

export type FetchLike = (
  url: string,
  init?: { signal?: AbortSignal; headers?: Record<string, string> }
) => Promise<Response>;

export type ExtractOptions = {
  apiBase: string;
  timeoutMs: number;
  logger: Logger;
  fetchImpl?: FetchLike;
};

export type ExtractResult = {
  users: RawRecord[];
  posts: RawRecord[];
  sources: {
    users: CollectionSource;
    posts: CollectionSource;
  };
};

const collectionSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * GETs `{apiBase}/{resource}` and returns the decoded list of objects, or
 * `null` after logging a warning when the request, the status or the payload
 * is unusable.
 */
export async function fetchCollection(resource: string, options: ExtractOptions): Promise<RawRecord[] | null> {
  const { apiBase, timeoutMs, logger, fetchImpl = fetch } = options;
  const url = `${apiBase}/${resource}`;

  try {
    const response = await fetchImpl(url, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: { accept: 'application/json' },
    });
    if (!response.ok) {
      await response.body?.cancel();
      throw upstreamError(response.status, response.statusText, url);
    }
    const body: unknown = await response.json();
    return collectionSchema.parse(body);
  } catch (error) {
    logger.warn(`API fetch ${resource} failed (${describeError(error)}). Using fallback sample.`);
    return null;
  }
}

export async function extract(options: ExtractOptions): Promise<ExtractResult> {
  const users = await fetchCollection('users', options);
  const posts = await fetchCollection('posts', options);

  return {
    users: users ?? FALLBACK_USERS.map((row) => ({ ...row })),
    posts: posts ?? FALLBACK_POSTS.map((row) => ({ ...row })),
    sources: {
      users: users ? 'api' : 'fallback',
      posts: posts ? 'api' : 'fallback',
    },
  };
}
