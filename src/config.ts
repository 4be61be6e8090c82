import { z } from 'zod';

const blankAsUnset = (value: unknown) =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

const envSchema = z.object({
  API_BASE: z.preprocess(
    blankAsUnset,
    z
      .string()
      .trim()
      .url()
      .transform((value) => value.replace(/\/+$/, ''))
      .default('https://jsonplaceholder.typicode.com')
  ),
  DATABASE_URL: z.preprocess(blankAsUnset, z.string().trim().min(1).default('pipeline-data')),
  FETCH_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(8000)),
  REPORT_DIR: z.preprocess(blankAsUnset, z.string().trim().min(1).optional()),
});

export type AppConfig = {
  apiBase: string;
  databaseUrl: string;
  fetchTimeoutMs: number;
  reportDir: string | null;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    apiBase: parsed.API_BASE,
    databaseUrl: parsed.DATABASE_URL,
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    reportDir: parsed.REPORT_DIR ?? null,
  };
}
