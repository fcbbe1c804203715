#!/usr/bin/env node
import { getConfig } from './config/config.js';
import { loadRulesFile } from './config/rules.js';
import { initLogger, getLogger, type Logger } from './lib/logger.js';
import { OrganizerEngine } from './services/OrganizerEngine.js';
import { StateStore } from './services/StateStore.js';
import type { EngineNotification } from './models/EngineNotification.js';

let engine: OrganizerEngine | null = null;
let stateStore: StateStore | null = null;
let consumers: Promise<void>[] = [];

function logNotification(logger: Logger, notification: EngineNotification): void {
  switch (notification.type) {
    case 'decision-recorded':
      logger.info(
        { decisionId: notification.decision.id, newPath: notification.decision.newPath },
        'Folder moved, undo available'
      );
      break;
    case 'decision-updated':
      logger.info({ decisionId: notification.decision.id, state: notification.decision.state }, 'Decision updated');
      break;
    case 'move-failed':
      logger.warn({ filePath: notification.path, code: notification.code, reason: notification.reason }, notification.message);
      break;
    case 'watcher-degraded':
      logger.warn({ root: notification.root }, notification.message);
      break;
    case 'watcher-recovered':
      logger.info({ root: notification.root }, 'Watched folder recovered');
      break;
    case 'notifications-dropped':
      logger.warn({ count: notification.count }, 'Notifications dropped, consumer too slow');
      break;
  }
}

/**
 * Drain both outward channels until the engine closes them
 */
function startConsumers(organizer: OrganizerEngine, logger: Logger): Promise<void>[] {
  const moves = (async () => {
    for await (const record of organizer.moveRecords) {
      logger.info(
        { sourcePath: record.sourcePath, destinationPath: record.destinationPath, category: record.category },
        'Moved'
      );
    }
  })();

  const notifications = (async () => {
    for await (const notification of organizer.notifications) {
      logNotification(logger, notification);
    }
  })();

  return [moves, notifications];
}

async function main() {
  try {
    // Load configuration
    const config = getConfig();

    // Initialize logger
    initLogger(config.logging);
    const logger = getLogger();

    logger.info('TidyWatch starting...');
    logger.info({ config: {
      targetFolders: config.watch.targetFolders,
      cooldownMs: config.engine.cooldownMs,
      folderHandlingMode: config.engine.folderHandlingMode,
      rulesPath: config.storage.rulesPath,
    }}, 'Configuration loaded');

    // Initialize services
    const rules = loadRulesFile(config.storage.rulesPath);
    stateStore = new StateStore(config.storage.stateDbPath);

    engine = new OrganizerEngine(config, { rules, store: stateStore });
    consumers = startConsumers(engine, logger);

    engine.start();

    logger.info('TidyWatch running - organizing new downloads...');

  } catch (error) {
    console.error('Fatal error during startup:', error);
    process.exit(1);
  }
}

function reloadRules(): void {
  const logger = getLogger();
  if (!engine) {
    return;
  }

  try {
    engine.reloadRulesFromFile(getConfig().storage.rulesPath);
  } catch (error) {
    logger.error({ error }, 'Rules reload failed, keeping current rules');
  }
}

// Graceful shutdown
async function shutdown(signal: string) {
  const logger = getLogger();
  logger.info({ signal }, 'Shutting down gracefully...');

  try {
    if (engine) {
      await engine.stop();
    }

    await Promise.all(consumers);

    if (stateStore) {
      stateStore.close();
    }

    logger.info('Shutdown complete');
    process.exit(0);

  } catch (error) {
    logger.error({ error }, 'Error during shutdown');
    process.exit(1);
  }
}

// Handle signals
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGHUP', () => reloadRules());

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  console.error('Uncaught exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

// Start application
main().catch((error) => {
  console.error('Failed to start application:', error);
  process.exit(1);
});
