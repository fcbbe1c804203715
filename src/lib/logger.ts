import pino from 'pino';
import type { LoggingConfig } from '../types/index.js';

let logger: pino.Logger | null = null;

export function createLogger(config: LoggingConfig): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: { service: 'tidywatch' },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  };

  // Human-readable output for interactive runs
  if (config.pretty && config.level !== 'silent') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname,service',
        },
      },
    });
  }

  return pino(options);
}

export function initLogger(config: LoggingConfig): void {
  logger = createLogger(config);
}

export function getLogger(): pino.Logger {
  if (!logger) {
    logger = pino({
      level: process.env.LOG_LEVEL ?? 'info',
    });
  }
  return logger;
}

export function createChildLogger(context: Record<string, unknown>): pino.Logger {
  return getLogger().child(context);
}

export type Logger = pino.Logger;
