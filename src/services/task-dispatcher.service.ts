/**
 * TASK DISPATCHER
 *
 * Picks up open export tasks and runs the report behind each one.
 * Task lifecycle: Open → InProgress → Complete | Failed
 *
 * A task is claimed with a conditional update before any report logic runs,
 * so two dispatchers never process the same task. One failing task never
 * stops the batch.
 */

import type { Document, Filter, UpdateFilter } from 'mongodb';
import { createTaskLogger } from '../utils/logger';
import { Errors, errorMessage } from '../utils/errors';
import { resolveReport } from '../reports';
import { generateReport } from './report.service';
import { OPEN_STATUSES } from '../types/entities';
import type { DispatchSummary, TaskDocument, TaskParameters } from '../types/entities';
import type { ReportContext } from '../types/report.types';

type TaskResult = 'completed' | 'failed' | 'skipped';

type TaskUpdate = Partial<Pick<TaskDocument,
  'task_status' | 'task_description' | 'export_path' | 'export_filename' | 'export_status'
>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function taskLabel(task: Document): string {
  const id: unknown = task.Task_Id ?? task._id;
  return id === undefined || id === null ? 'unknown' : String(id);
}

export class TaskDispatcher {
  constructor(private readonly ctx: ReportContext) {}

  private get tasksCollection(): string {
    return this.ctx.config.collections.tasks;
  }

  /**
   * Processes every open task of every configured template id, one at a time.
   */
  async runPendingTasks(): Promise<DispatchSummary> {
    const { logger, config } = this.ctx;
    const summary: DispatchSummary = { found: 0, processed: 0, completed: 0, failed: 0, skipped: 0 };

    for (const templateId of config.tasks.templateTaskIds) {
      let tasks: Document[];
      try {
        tasks = await this.ctx.store.find(this.tasksCollection, {
          Template_Task_Id: { $in: [templateId, String(templateId)] },
          task_status: { $in: [...OPEN_STATUSES] },
        });
      } catch (error) {
        logger.error(`Failed to load open tasks for template ${templateId}:`, error);
        continue;
      }

      if (tasks.length === 0) continue;
      logger.info(`Found ${tasks.length} open tasks for template ${templateId}`);
      summary.found += tasks.length;

      for (const task of tasks) {
        const result = await this.processTask(task);
        summary[result] += 1;
        if (result !== 'skipped') summary.processed += 1;
      }
    }

    logger.info(
      `Dispatch finished: ${summary.processed} processed ` +
      `(${summary.completed} completed, ${summary.failed} failed, ${summary.skipped} skipped)`
    );
    return summary;
  }

  /**
   * Claims one task and runs its report. Resolves to how the task ended.
   */
  async processTask(task: Document): Promise<TaskResult> {
    const claimed = await this.claim(task);
    if (!claimed) return 'skipped';

    const taskLogger = createTaskLogger(this.ctx.logger, taskLabel(claimed));
    const definition = resolveReport(claimed.Template_Task_Id);

    if (!definition) {
      const error = Errors.UnknownTaskType(claimed.Template_Task_Id);
      taskLogger.error(error.message);
      await this.finish(claimed, { task_status: 'Failed', task_description: error.message });
      return 'failed';
    }

    taskLogger.info(`Processing ${definition.name} (template ${definition.id})`);
    const parameters: TaskParameters = isRecord(claimed.parameters) ? claimed.parameters : {};

    try {
      const outcome = await generateReport({ ...this.ctx, logger: taskLogger }, definition, parameters);

      if (outcome.success) {
        const recorded = await this.finish(claimed, {
          task_status: 'Complete',
          task_description: `${definition.name} completed with 0 errors`,
          export_path: outcome.artifact.filepath,
          export_filename: outcome.artifact.filename,
          export_status: 'Generated',
        });
        return recorded ? 'completed' : 'failed';
      }

      await this.finish(claimed, {
        task_status: 'Failed',
        task_description: `${definition.name} completed with 1 errors: ${outcome.error.message}`,
        export_status: 'Failed',
      });
      return 'failed';
    } catch (error) {
      const failure = Errors.HandlerFailed(definition.name, errorMessage(error));
      taskLogger.error(failure.message, { stack: error instanceof Error ? error.stack : undefined });
      await this.finish(claimed, { task_status: 'Failed', task_description: failure.message });
      return 'failed';
    }
  }

  /**
   * Open → InProgress, only if the task is still open. Resolves to the
   * claimed task, or null when another worker got there first.
   */
  private async claim(task: Document): Promise<Document | null> {
    const filter: Filter<Document> = { _id: task._id, task_status: { $in: [...OPEN_STATUSES] } };
    const update: UpdateFilter<Document> = {
      $set: { task_status: 'InProgress', claimed_by: this.ctx.config.workerId, started_at: this.ctx.now() },
    };

    try {
      const claimed = await this.ctx.store.findOneAndUpdate(this.tasksCollection, filter, update);
      if (!claimed) {
        this.ctx.logger.debug(`Task ${taskLabel(task)} already claimed, skipping`);
      }
      return claimed;
    } catch (error) {
      this.ctx.logger.error(`Failed to claim task ${taskLabel(task)}:`, error);
      return null;
    }
  }

  /**
   * Writes the final status. Resolves to false when the store rejected the
   * write; the task then stays InProgress and counts as failed.
   */
  private async finish(task: Document, fields: TaskUpdate): Promise<boolean> {
    try {
      await this.ctx.store.updateOne(
        this.tasksCollection,
        { _id: task._id },
        { $set: { ...fields, finished_at: this.ctx.now() } }
      );
      return true;
    } catch (error) {
      this.ctx.logger.error(`Failed to update status of task ${taskLabel(task)}:`, error);
      return false;
    }
  }
}

export default TaskDispatcher;
