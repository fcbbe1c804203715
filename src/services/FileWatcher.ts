import chokidar from 'chokidar';
import { EventEmitter } from 'events';
import { accessSync, constants, readdirSync, statSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import type { FsEvent } from '../models/FsEvent.js';
import { createFsEvent } from '../models/FsEvent.js';
import type { IgnoreSet } from './IgnoreSet.js';
import { FsEventKind, WatcherState, isHiddenName, isSystemName } from '../types/index.js';
import { WatchUnavailableError, toError } from '../lib/errors.js';
import { createChildLogger, type Logger } from '../lib/logger.js';

// ============================================================================
// Backend
// ============================================================================

export type RawWatchEventType = 'add' | 'addDir' | 'change' | 'unlink' | 'unlinkDir';

export interface RawWatchEvent {
  type: RawWatchEventType;
  path: string;
}

export interface WatchSubscription {
  close(): Promise<void>;
}

export interface WatchHandlers {
  onEvent: (event: RawWatchEvent) => void;
  onError: (error: Error) => void;
}

/**
 * Source of raw filesystem events for one root (direct children only)
 */
export interface WatchBackend {
  subscribe(root: string, handlers: WatchHandlers): WatchSubscription;
}

export class ChokidarBackend implements WatchBackend {
  subscribe(root: string, handlers: WatchHandlers): WatchSubscription {
    const watcher = chokidar.watch(root, {
      ignored: (path: string) => resolve(path) !== root && isHiddenName(basename(path)),
      persistent: true,
      ignoreInitial: true,
      depth: 0,
    });

    const forward = (type: RawWatchEventType) => (path: string) => handlers.onEvent({ type, path });

    watcher
      .on('add', forward('add'))
      .on('addDir', forward('addDir'))
      .on('change', forward('change'))
      .on('unlink', forward('unlink'))
      .on('unlinkDir', forward('unlinkDir'))
      .on('error', (error) => handlers.onError(toError(error)));

    return {
      close: () => watcher.close(),
    };
  }
}

// ============================================================================
// Watcher
// ============================================================================

export interface FileWatcherOptions {
  healthCheckInterval: number;
  recoveryInitialDelay: number;
  recoveryMaxDelay: number;
}

export interface FileWatcherEvents {
  event: (event: FsEvent) => void;
  degraded: (root: string, error: WatchUnavailableError) => void;
  recovered: (root: string) => void;
}

export declare interface FileWatcher {
  on<U extends keyof FileWatcherEvents>(
    event: U,
    listener: FileWatcherEvents[U]
  ): this;
  emit<U extends keyof FileWatcherEvents>(
    event: U,
    ...args: Parameters<FileWatcherEvents[U]>
  ): boolean;
}

const KIND_BY_RAW_TYPE: Record<RawWatchEventType, FsEventKind> = {
  add: FsEventKind.CREATE,
  addDir: FsEventKind.CREATE,
  change: FsEventKind.MODIFY,
  unlink: FsEventKind.DELETE,
  unlinkDir: FsEventKind.DELETE,
};

/**
 * chokidar reports a rename as unlink + add; an add this soon after a removal
 * of the same entry type is forwarded as a rename of the removed path
 */
const RENAME_PAIR_WINDOW_MS = 100;

interface Removal {
  path: string;
  isDirectory: boolean;
  at: number;
}

/**
 * Watches one root and forwards normalized, filtered events.
 *
 * If the root disappears or the backend fails, the watcher goes `degraded`,
 * stops forwarding and retries with exponential backoff; it reports
 * `recovered` after re-subscribing and re-scanning.
 */
export class FileWatcher extends EventEmitter {
  readonly root: string;
  private state: WatcherState = WatcherState.IDLE;
  private subscription: WatchSubscription | null = null;
  private healthTimer: NodeJS.Timeout | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private retryDelay: number;
  private forwarding = true;
  private rootInode: number | null = null;
  private lastRemoval: Removal | null = null;
  private subscriptionGeneration = 0;
  private logger: Logger;

  constructor(
    root: string,
    private backend: WatchBackend,
    private ignoreSet: IgnoreSet,
    private options: FileWatcherOptions
  ) {
    super();
    this.root = resolve(root);
    this.retryDelay = options.recoveryInitialDelay;
    this.logger = createChildLogger({ root: this.root });
  }

  /**
   * Subscribe and synthesize a create event for every entry already in the root
   */
  start(): void {
    if (this.state === WatcherState.WATCHING || this.state === WatcherState.DEGRADED) {
      return;
    }

    this.logger.info('Starting watcher');

    if (this.connect()) {
      this.startHealthChecks();
    }
  }

  async stop(): Promise<void> {
    this.state = WatcherState.STOPPED;
    this.clearTimers();
    await this.closeSubscription();
    this.logger.info('Watcher stopped');
  }

  /**
   * While paused, events are dropped instead of forwarded
   */
  setForwarding(enabled: boolean): void {
    this.forwarding = enabled;
  }

  getState(): WatcherState {
    return this.state;
  }

  /**
   * Synthesize create events for the root's current entries
   * @returns Number of events forwarded
   */
  scan(): number {
    let names: string[];
    try {
      names = readdirSync(this.root);
    } catch (error) {
      this.enterDegraded(error);
      return 0;
    }

    let forwarded = 0;
    for (const name of names.sort()) {
      const path = join(this.root, name);
      let isDirectory = false;
      try {
        isDirectory = statSync(path).isDirectory();
      } catch (error) {
        // Vanished between readdir and stat
        this.logger.debug({ filePath: path, error }, 'Skipping entry during scan');
        continue;
      }
      if (this.forward(createFsEvent(path, this.root, FsEventKind.CREATE, isDirectory))) {
        forwarded++;
      }
    }

    this.logger.info({ entries: names.length, forwarded }, 'Initial scan complete');
    return forwarded;
  }

  /**
   * True when an event for this path would be dropped before the scheduler
   */
  isFiltered(path: string): boolean {
    const name = basename(path);
    return isHiddenName(name) || isSystemName(name) || this.ignoreSet.matches(path, this.root);
  }

  private connect(): boolean {
    try {
      accessSync(this.root, constants.R_OK);
      const stats = statSync(this.root);
      if (!stats.isDirectory()) {
        throw new Error('Not a directory');
      }
      this.rootInode = stats.ino;
    } catch (error) {
      this.enterDegraded(error);
      return false;
    }

    // A closing subscription can still deliver events; only the current one counts
    const generation = ++this.subscriptionGeneration;
    const isCurrent = () => generation === this.subscriptionGeneration;

    try {
      this.subscription = this.backend.subscribe(this.root, {
        onEvent: (raw) => {
          if (isCurrent()) {
            this.handleRawEvent(raw);
          }
        },
        onError: (error) => {
          if (isCurrent()) {
            this.handleBackendError(error);
          }
        },
      });
    } catch (error) {
      this.enterDegraded(error);
      return false;
    }

    this.state = WatcherState.WATCHING;
    this.retryDelay = this.options.recoveryInitialDelay;
    this.scan();
    return this.state === WatcherState.WATCHING;
  }

  private handleRawEvent(raw: RawWatchEvent): void {
    if (this.state !== WatcherState.WATCHING) {
      return;
    }

    const path = resolve(raw.path);
    if (path === this.root) {
      // The subscription dies with the directory, even if it is recreated
      if (raw.type === 'unlinkDir' || raw.type === 'unlink') {
        this.enterDegraded(new Error('Watched folder was removed'));
      }
      return;
    }
    // depth 0: anything that is not a direct child of the root is not ours
    if (dirname(path) !== this.root) {
      return;
    }

    const isDirectory = raw.type === 'addDir' || raw.type === 'unlinkDir';
    const kind = KIND_BY_RAW_TYPE[raw.type];

    if (kind === FsEventKind.DELETE) {
      this.lastRemoval = { path, isDirectory, at: Date.now() };
    } else if (kind === FsEventKind.CREATE && this.lastRemoval) {
      const removal = this.lastRemoval;
      this.lastRemoval = null;
      if (
        removal.isDirectory === isDirectory &&
        removal.path !== path &&
        Date.now() - removal.at <= RENAME_PAIR_WINDOW_MS
      ) {
        this.forward(createFsEvent(path, this.root, FsEventKind.RENAME, isDirectory, removal.path));
        return;
      }
    }

    this.forward(createFsEvent(path, this.root, kind, isDirectory));
  }

  /**
   * Filter, then hand to listeners
   * @returns True when the event was forwarded
   */
  private forward(event: FsEvent): boolean {
    if (!this.forwarding || this.isFiltered(event.path)) {
      return false;
    }
    try {
      this.emit('event', event);
    } catch (error) {
      this.logger.error({ filePath: event.path, error }, 'Event listener failed');
    }
    return true;
  }

  private handleBackendError(error: Error): void {
    this.logger.error({ error }, 'Watch backend error');
    this.enterDegraded(error);
  }

  private checkHealth(): void {
    if (this.state !== WatcherState.WATCHING) {
      return;
    }
    try {
      accessSync(this.root, constants.R_OK);
      const stats = statSync(this.root);
      if (!stats.isDirectory() || stats.ino !== this.rootInode) {
        throw new Error('Watched folder was replaced');
      }
    } catch (error) {
      this.enterDegraded(error);
    }
  }

  private enterDegraded(cause: unknown): void {
    if (this.state === WatcherState.STOPPED) {
      return;
    }

    const error = new WatchUnavailableError(this.root, cause);
    const wasDegraded = this.state === WatcherState.DEGRADED;
    this.state = WatcherState.DEGRADED;

    void this.closeSubscription();

    if (!wasDegraded) {
      this.logger.warn({ error: toError(cause).message }, 'Watched folder unavailable, entering degraded mode');
      try {
        this.emit('degraded', this.root, error);
      } catch (listenerError) {
        this.logger.error({ error: listenerError }, 'Degraded listener failed');
      }
    }

    this.scheduleRetry();
  }

  private scheduleRetry(): void {
    if (this.retryTimer || this.state !== WatcherState.DEGRADED) {
      return;
    }

    const delay = this.retryDelay;
    this.retryDelay = Math.min(this.retryDelay * 2, this.options.recoveryMaxDelay);
    this.logger.debug({ delay }, 'Scheduling watch retry');

    this.retryTimer = setTimeout(() => {
      this.retryTimer = null;
      this.retry();
    }, delay);
    this.retryTimer.unref();
  }

  private retry(): void {
    if (this.state !== WatcherState.DEGRADED) {
      return;
    }

    // Still degraded on failure: connect() re-schedules without notifying again
    if (!this.connect()) {
      return;
    }

    this.logger.info('Watched folder available again');
    try {
      this.emit('recovered', this.root);
    } catch (error) {
      this.logger.error({ error }, 'Recovered listener failed');
    }
    this.startHealthChecks();
  }

  private startHealthChecks(): void {
    if (this.healthTimer) {
      return;
    }
    this.healthTimer = setInterval(() => this.checkHealth(), this.options.healthCheckInterval);
    this.healthTimer.unref();
  }

  private async closeSubscription(): Promise<void> {
    const subscription = this.subscription;
    this.subscription = null;
    if (!subscription) {
      return;
    }
    try {
      await subscription.close();
    } catch (error) {
      this.logger.warn({ error }, 'Error closing watch subscription');
    }
  }

  private clearTimers(): void {
    if (this.healthTimer) {
      clearInterval(this.healthTimer);
      this.healthTimer = null;
    }
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
  }
}
