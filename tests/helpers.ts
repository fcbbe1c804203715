import { mkdtempSync, mkdirSync, rmSync, writeFileSync, realpathSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { RawWatchEventType, WatchBackend, WatchHandlers, WatchSubscription } from '../src/services/FileWatcher.js';
import { createRuleNode } from '../src/models/RuleNode.js';
import { RuleTree } from '../src/models/RuleTree.js';
import { FolderHandlingMode } from '../src/types/index.js';
import type { OrganizerEngineConfig } from '../src/services/OrganizerEngine.js';

/**
 * Fresh directory under the OS temp dir (symlinks resolved, so paths compare equal)
 */
export function makeTempDir(prefix: string = 'tidywatch-'): string {
  return realpathSync(mkdtempSync(join(tmpdir(), prefix)));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a file, creating parent directories
 */
export function writeFile(filePath: string, content: string | Buffer = 'data'): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Poll until the condition holds
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeout: number = 5000,
  interval: number = 10
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await sleep(interval);
  }

  throw new Error(`Condition not met within ${timeout}ms`);
}

/**
 * In-process watch backend: tests push raw events by hand
 */
export class FakeWatchBackend implements WatchBackend {
  private handlers: Map<string, WatchHandlers> = new Map();
  subscribeCalls = 0;
  failSubscribe = false;

  subscribe(root: string, handlers: WatchHandlers): WatchSubscription {
    this.subscribeCalls++;
    if (this.failSubscribe) {
      throw new Error('subscribe failed');
    }
    this.handlers.set(root, handlers);
    return {
      close: async () => {
        if (this.handlers.get(root) === handlers) {
          this.handlers.delete(root);
        }
      },
    };
  }

  isSubscribed(root: string): boolean {
    return this.handlers.has(root);
  }

  emit(root: string, type: RawWatchEventType, path: string): void {
    this.handlers.get(root)?.onEvent({ type, path });
  }

  fail(root: string, error: Error): void {
    this.handlers.get(root)?.onError(error);
  }
}

/**
 * Small tree used across tests
 */
export function buildTestTree(): RuleTree {
  return new RuleTree([
    createRuleNode({ category: 'Images', extensions: ['.jpg', '.png'] }),
    createRuleNode({
      category: 'Documents',
      extensions: ['.txt'],
      children: [
        createRuleNode({ category: 'Documents', subcategory: 'PDF', extensions: ['.pdf'] }),
      ],
    }),
    createRuleNode({ category: 'Video', extensions: ['.mp4'] }),
  ]);
}

export function testEngineConfig(
  root: string,
  overrides: Partial<OrganizerEngineConfig['engine']> = {}
): OrganizerEngineConfig {
  return {
    watch: {
      targetFolders: [root],
      healthCheckInterval: 60000,
      recoveryInitialDelay: 20,
      recoveryMaxDelay: 100,
    },
    engine: {
      cooldownMs: 50,
      folderHandlingMode: FolderHandlingMode.SMART_SCAN,
      decisionRetentionCount: 50,
      sampleCapPerFolder: 200,
      maxConcurrency: 4,
      ignorePatterns: [],
      notificationBufferSize: 100,
      moveRecordBufferSize: 256,
      ...overrides,
    },
  };
}
