import { homedir } from 'os';
import { join, resolve } from 'path';
import type { AppConfig } from '../types/index.js';
import { FolderHandlingMode, isFolderHandlingMode } from '../types/index.js';
import { ConfigError } from '../lib/errors.js';

const USER_DOWNLOADS_TOKEN = '{USER_DOWNLOADS}';

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number, min: number = 0): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new ConfigError(`Environment variable ${key} must be a number, got: ${value}`);
  }
  if (num < min) {
    throw new ConfigError(`Environment variable ${key} must be at least ${min}, got: ${num}`);
  }
  return num;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvList(key: string, defaultValue: string[] = []): string[] {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Expand the downloads token and make the path absolute
 */
export function resolveTargetFolder(folder: string): string {
  if (folder === USER_DOWNLOADS_TOKEN) {
    return join(homedir(), 'Downloads');
  }
  return resolve(folder);
}

export function loadConfig(): AppConfig {
  // Watched folders. Missing folders are not an error here: the watcher
  // reports them as degraded and keeps retrying.
  const targetFolders = [...new Set(getEnvList('TARGET_FOLDERS').map(resolveTargetFolder))];
  if (targetFolders.length === 0) {
    throw new ConfigError('Missing required environment variable: TARGET_FOLDERS');
  }

  const watch = {
    targetFolders,
    healthCheckInterval: getEnvNumber('HEALTH_CHECK_INTERVAL_MS', 5000, 1),
    recoveryInitialDelay: getEnvNumber('RECOVERY_INITIAL_DELAY_MS', 1000, 1),
    recoveryMaxDelay: getEnvNumber('RECOVERY_MAX_DELAY_MS', 60000, 1),
  };

  if (watch.recoveryMaxDelay < watch.recoveryInitialDelay) {
    throw new ConfigError('RECOVERY_MAX_DELAY_MS must not be lower than RECOVERY_INITIAL_DELAY_MS');
  }

  // Engine
  const folderHandlingMode = getEnv('FOLDER_HANDLING_MODE', FolderHandlingMode.SMART_SCAN);
  if (!isFolderHandlingMode(folderHandlingMode)) {
    throw new ConfigError(
      `Invalid FOLDER_HANDLING_MODE: ${folderHandlingMode}. Must be one of: ${Object.values(FolderHandlingMode).join(', ')}`
    );
  }

  const engine = {
    cooldownMs: getEnvNumber('COOLDOWN_MS', 5000),
    folderHandlingMode,
    decisionRetentionCount: getEnvNumber('DECISION_RETENTION_COUNT', 50, 1),
    sampleCapPerFolder: getEnvNumber('SAMPLE_CAP_PER_FOLDER', 200, 1),
    maxConcurrency: getEnvNumber('MAX_CONCURRENCY', 4, 1),
    ignorePatterns: getEnvList('IGNORE_PATTERNS'),
    notificationBufferSize: getEnvNumber('NOTIFICATION_BUFFER_SIZE', 100, 1),
    moveRecordBufferSize: getEnvNumber('MOVE_RECORD_BUFFER_SIZE', 256, 1),
  };

  // Storage
  const storage = {
    rulesPath: resolve(getEnv('RULES_PATH', './config/rules.json')),
    stateDbPath: getEnv('STATE_DB_PATH', './tidywatch-state.db'),
  };

  // Logging
  const level = getEnv('LOG_LEVEL', 'info');
  if (!isLogLevel(level)) {
    throw new ConfigError(`Invalid LOG_LEVEL: ${level}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  const logging = {
    level,
    pretty: getEnvBoolean('LOG_PRETTY', process.env.NODE_ENV !== 'production'),
  };

  return {
    watch,
    engine,
    storage,
    logging,
  };
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

function isLogLevel(value: string): value is (typeof LOG_LEVELS)[number] {
  return LOG_LEVELS.some(level => level === value);
}

// Export singleton config instance
let config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

// For testing: reset config
export function resetConfig(): void {
  config = null;
}
