/**
 * EXPORT TASK PIPELINE - ENTRY POINT
 * Picks up export tasks from MongoDB and writes the requested reports
 *
 * Stack: Node.js + TypeScript + MongoDB + ExcelJS
 *
 * Usage:
 *   node dist/index.js          run on the cron schedule
 *   node dist/index.js --once   run one batch and exit
 */

import { config, validateConfig } from './config/env';
import { MongoStore } from './config/database';
import { logger } from './utils/logger';
import { runExportTasksNow, startExportTasksJob, stopExportTasksJob } from './cron/export-tasks.job';
import type { ReportContext } from './types/report.types';

const SHUTDOWN_TIMEOUT_MS = 10000;

async function main(): Promise<void> {
  validateConfig(config);

  const store = new MongoStore(config.mongo, logger);
  logger.info('Initializing database connection...');
  await store.initialize();

  const ctx: ReportContext = {
    store,
    config,
    logger,
    now: () => new Date(),
    platform: process.platform,
  };

  if (process.argv.includes('--once')) {
    try {
      const summary = await runExportTasksNow(ctx);
      logger.info('Single batch finished', { summary });
    } finally {
      await store.close();
    }
    return;
  }

  if (!startExportTasksJob(ctx)) {
    logger.warn('Nothing scheduled, exiting');
    await store.close();
    return;
  }

  logger.info(`Export task pipeline started (env: ${config.env}, worker: ${config.workerId})`);

  // Graceful shutdown
  const gracefulShutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received. Shutting down...`);
    stopExportTasksJob(ctx);

    // Force exit if closing takes too long
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    try {
      await store.close();
      process.exit(0);
    } catch (err) {
      logger.error('Error closing connections:', err);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception:', error);
    void gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection:', { reason });
  });
}

main().catch((error: unknown) => {
  logger.error('Error starting export task pipeline:', error);
  process.exit(1);
});
