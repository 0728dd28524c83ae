import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

export interface Config {
  port: number;
  host: string;
  dataPath: string;
  downloadPath: string;
  enginePath: string;
  monitorIntervalMs: number;
  terminateGraceMs: number;
  progressLogIntervalMs: number;
  // When true, stop also deletes the aria2 control file (a stopped task then restarts from zero)
  stopDiscardsCheckpoint: boolean;
  debug: boolean;
  defaults: {
    split: number;
    maxConnectionsPerServer: number;
    maxTries: number;
  };
}

let config: Config | null = null;

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function getConfig(): Config {
  if (!config) {
    config = {
      port: intFromEnv('PORT', 8080),
      host: process.env.HOST || '127.0.0.1',
      dataPath: process.env.DATA_PATH || './state',
      downloadPath: process.env.DOWNLOAD_PATH || './downloads',
      enginePath: process.env.ARIA2C_PATH || 'aria2c',
      monitorIntervalMs: intFromEnv('MONITOR_INTERVAL_MS', 1000),
      terminateGraceMs: intFromEnv('TERMINATE_GRACE_MS', 5000),
      progressLogIntervalMs: intFromEnv('PROGRESS_LOG_INTERVAL_MS', 30000),
      stopDiscardsCheckpoint: process.env.STOP_DISCARDS_CHECKPOINT === 'true',
      debug: process.env.DEBUG === 'true' || process.env.NODE_ENV === 'development',
      defaults: {
        split: intFromEnv('DEFAULT_SPLIT', 4),
        maxConnectionsPerServer: intFromEnv('DEFAULT_MAX_CONNECTIONS', 16),
        maxTries: intFromEnv('DEFAULT_MAX_TRIES', 5),
      },
    };
  }
  return config;
}

export function reloadConfig(): Config {
  config = null;
  return getConfig();
}
