/**
 * CRON JOB: EXPORT TASKS
 * Runs the task dispatcher on the configured schedule
 *
 * Default: every 5 minutes
 */

import schedule from 'node-schedule';
import { TaskDispatcher } from '../services/task-dispatcher.service';
import type { DispatchSummary } from '../types/entities';
import type { ReportContext } from '../types/report.types';

export const JOB_NAME = 'export-tasks';

let running = false;

/**
 * Runs one dispatch batch. Resolves to null when a batch is already running.
 */
export async function runExportTasksNow(ctx: ReportContext): Promise<DispatchSummary | null> {
    const { logger } = ctx;

    if (running) {
        logger.warn('[CRON] Previous export batch still running. Skipping...');
        return null;
    }

    running = true;
    try {
        logger.info('[CRON] Starting export batch...');
        const summary = await new TaskDispatcher(ctx).runPendingTasks();
        logger.info('[CRON] Export batch completed');
        return summary;
    } finally {
        running = false;
    }
}

/**
 * Schedules the export job. Returns false when disabled by configuration.
 */
export function startExportTasksJob(ctx: ReportContext): boolean {
    const { logger, config } = ctx;

    if (!config.cron.enabled) {
        logger.info('[CRON] Export job disabled by configuration');
        return false;
    }

    schedule.scheduleJob(JOB_NAME, config.cron.rule, async () => {
        try {
            await runExportTasksNow(ctx);
        } catch (error) {
            logger.error('[CRON] Error in export batch:', error);
        }
    });

    logger.info(`[CRON] Job scheduled: ${JOB_NAME} (${config.cron.rule})`);
    return true;
}

/**
 * Cancels the export job if it is scheduled
 */
export function stopExportTasksJob(ctx: Pick<ReportContext, 'logger'>): void {
    const job = schedule.scheduledJobs[JOB_NAME];
    if (job) {
        job.cancel();
        ctx.logger.info(`[CRON] Job ${JOB_NAME} cancelled`);
    }
}

export default {
    startExportTasksJob,
    stopExportTasksJob,
    runExportTasksNow
};
