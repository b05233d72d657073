/**
 * ENVIRONMENT TYPES
 * TypeScript definitions for the environment variables read by config/env.ts
 */

export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  WORKER_ID: string;

  // MongoDB
  MONGO_URI: string;
  MONGO_DB_NAME: string;
  MONGO_POOL_MAX: number;
  MONGO_CONNECT_TIMEOUT_MS: number;

  // Collections
  TASK_COLLECTION: string;
  AUDIT_COLLECTION: string;

  // Dispatcher allow-list, comma separated
  TEMPLATE_TASK_IDS: string;

  // Export directory per host OS
  EXPORT_PATH_WINDOWS: string;
  EXPORT_PATH_LINUX: string;

  // Scheduler
  EXPORT_CRON: string;
  EXPORT_CRON_ENABLED: boolean;

  // Logging
  LOG_LEVEL: string;
}

declare global {
  namespace NodeJS {
    interface ProcessEnv extends Partial<Record<keyof EnvConfig, string>> {}
  }
}
