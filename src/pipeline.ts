import type { AppConfig } from './config.js';
import type { Database } from './db.js';
import type { Logger } from './logger.js';
import { extract, type FetchLike } from './services/extract.js';
import { loadTables, type LoadSummary } from './services/load.js';
import { runReports, writeReportFiles, type ReportResult } from './services/report.js';
import { transform } from './services/transform.js';
import type { CollectionSource } from './types/records.js';

export type PipelineDeps = {
  config: AppConfig;
  db: Database;
  logger: Logger;
  fetchImpl?: FetchLike;
};

export type PipelineSummary = {
  sources: {
    users: CollectionSource;
    posts: CollectionSource;
  };
  loaded: LoadSummary;
  reports: ReportResult[];
  reportFiles: string[];
};

export async function runPipeline({ config, db, logger, fetchImpl }: PipelineDeps): Promise<PipelineSummary> {
  logger.info(`Extracting users and posts from ${config.apiBase}`);
  const raw = await extract({
    apiBase: config.apiBase,
    timeoutMs: config.fetchTimeoutMs,
    logger,
    fetchImpl,
  });

  const { users, posts } = transform(raw.users, raw.posts);
  const loaded = await loadTables(db, users, posts, logger);
  const reports = await runReports(db);

  let reportFiles: string[] = [];
  if (config.reportDir) {
    reportFiles = await writeReportFiles(reports, config.reportDir);
    logger.info(`Wrote ${reportFiles.length} report files to ${config.reportDir}`);
  }

  return {
    sources: raw.sources,
    loaded,
    reports,
    reportFiles,
  };
}
