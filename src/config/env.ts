/**
 * ENVIRONMENT CONFIGURATION
 * Loads and validates environment variables with safe defaults
 */

import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

// Load the .env file for the current environment
const envFile = process.env.NODE_ENV === 'production'
  ? '.env.production'
  : '.env';

dotenv.config({ path: path.resolve(process.cwd(), envFile) });

type Environment = 'development' | 'production' | 'test';

export interface AppConfig {
  env: Environment;
  isProduction: boolean;
  isDevelopment: boolean;
  workerId: string;
  mongo: {
    uri: string;
    dbName: string;
    maxPoolSize: number;
    connectTimeoutMs: number;
  };
  collections: {
    tasks: string;
    audit: string;
  };
  tasks: {
    templateTaskIds: number[];
  };
  exports: {
    windowsPath: string;
    linuxPath: string;
  };
  cron: {
    rule: string;
    enabled: boolean;
  };
  logging: {
    level: string;
  };
}

function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function getArray(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function getEnvironment(): Environment {
  const value = process.env.NODE_ENV;
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

// Every template id the report catalogue knows about
const DEFAULT_TEMPLATE_TASK_IDS = ['20', '21', '22', '23', '24', '26', '27', '30', '32', '33', '37', '38', '39', '40'];

function getTemplateTaskIds(): number[] {
  return getArray('TEMPLATE_TASK_IDS', DEFAULT_TEMPLATE_TASK_IDS)
    .filter(id => /^\d+$/.test(id))
    .map(id => parseInt(id, 10));
}

const env = getEnvironment();

export const config: AppConfig = {
  env,
  isProduction: env === 'production',
  isDevelopment: env !== 'production',
  workerId: process.env.WORKER_ID || `${os.hostname()}-${process.pid}`,

  mongo: {
    uri: process.env.MONGO_URI || 'mongodb://localhost:27017',
    dbName: process.env.MONGO_DB_NAME || 'drs',
    maxPoolSize: getNumber('MONGO_POOL_MAX', 10),
    connectTimeoutMs: getNumber('MONGO_CONNECT_TIMEOUT_MS', 30000),
  },

  collections: {
    tasks: process.env.TASK_COLLECTION || 'System_tasks',
    audit: process.env.AUDIT_COLLECTION || 'file_download_log',
  },

  tasks: {
    templateTaskIds: getTemplateTaskIds(),
  },

  exports: {
    windowsPath: process.env.EXPORT_PATH_WINDOWS || 'C:\\exports',
    linuxPath: process.env.EXPORT_PATH_LINUX || './exports',
  },

  cron: {
    rule: process.env.EXPORT_CRON || '*/5 * * * *',
    enabled: getBoolean('EXPORT_CRON_ENABLED', true),
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
  },
};

// Reject settings that cannot work in production
export function validateConfig(appConfig: AppConfig = config): void {
  if (appConfig.tasks.templateTaskIds.length === 0) {
    throw new Error('TEMPLATE_TASK_IDS does not contain any numeric template id');
  }
  if (appConfig.isProduction) {
    if (appConfig.mongo.uri.includes('localhost')) {
      throw new Error('MONGO_URI must point to a real server in production');
    }
    if (!process.env.EXPORT_PATH_WINDOWS && !process.env.EXPORT_PATH_LINUX) {
      throw new Error('EXPORT_PATH_WINDOWS or EXPORT_PATH_LINUX is required in production');
    }
  }
}

export default config;
