/**
 * LOGGER
 * Winston logger for the export worker. Every entry carries the worker id;
 * entries written while a task runs also carry the task id.
 */

import winston from 'winston';
import { config } from '../config/env';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// worker-01 [task 42] ... when a task is in scope
export const consoleLine = printf(({ level, message, timestamp: ts, workerId, taskId, stack, service: _service, ...rest }) => {
  const scope = taskId === undefined ? String(workerId) : `${String(workerId)} [task ${String(taskId)}]`;
  let line = `${ts} ${level} ${scope}: ${message}`;

  if (Object.keys(rest).length > 0) {
    line += ` ${JSON.stringify(rest)}`;
  }
  if (stack) {
    line += `\n${stack}`;
  }
  return line;
});

const jsonLine = combine(timestamp(), errors({ stack: true }), winston.format.json());

export type Logger = winston.Logger;

export const logger: Logger = winston.createLogger({
  level: config.logging.level,
  silent: config.env === 'test',
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'export-task-pipeline', workerId: config.workerId },
  transports: [
    new winston.transports.Console({
      format: config.isProduction ? jsonLine : combine(colorize(), consoleLine),
    }),
  ],
});

// Production keeps failed exports and the full batch history on disk
if (config.isProduction) {
  logger.add(new winston.transports.File({ filename: 'logs/export-errors.log', level: 'error', format: jsonLine }));
  logger.add(new winston.transports.File({ filename: 'logs/export-tasks.log', format: jsonLine }));
}

/**
 * Child logger that stamps every entry with the task being processed.
 */
export function createTaskLogger(base: Logger, taskId: string): Logger {
  return base.child({ taskId });
}

export default logger;
