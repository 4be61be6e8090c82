import type { RawRecord } from '../types/records.js';

export const FALLBACK_USERS: readonly RawRecord[] = [
  { id: 1, name: 'Alice', username: 'alice', email: 'alice@example.com' },
  { id: 2, name: 'Bob', username: 'bob', email: 'bob@example.com' },
];

export const FALLBACK_POSTS: readonly RawRecord[] = [
  { userId: 1, id: 1, title: 'Hello', body: 'First post' },
  { userId: 1, id: 2, title: 'World', body: 'Second post' },
  { userId: 2, id: 3, title: 'Another', body: 'Third post' },
];
