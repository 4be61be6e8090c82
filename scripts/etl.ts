#!/usr/bin/env node
// Extract users/posts from the API, clean them, replace the `users` and
// `posts` tables, then print the canned reports.
import 'dotenv/config';
import { loadConfig } from '../src/config.js';
import { createDatabase } from '../src/db.js';
import { createConsoleLogger } from '../src/logger.js';
import { runPipeline } from '../src/pipeline.js';
import { renderReports } from '../src/services/report.js';
import { describeError } from '../src/utils/describe-error.js';

const logger = createConsoleLogger('etl');

async function main(): Promise<void> {
  const config = loadConfig();
  const db = createDatabase(config.databaseUrl);
  try {
    const summary = await runPipeline({ config, db, logger });
    console.log(`\n${renderReports(summary.reports)}\n`);
    logger.info(`ETL pipeline finished successfully. Database: ${db.location}`);
  } finally {
    await db.close();
  }
}

main().catch((error: unknown) => {
  logger.error(describeError(error));
  process.exitCode = 1;
});
