import type { EngineConfig, WatchConfig } from '../types/index.js';
import { FolderHandlingMode, SkipReason, WatcherState } from '../types/index.js';
import type { Decision } from '../models/Decision.js';
import type { EngineNotification } from '../models/EngineNotification.js';
import { droppedSummary } from '../models/EngineNotification.js';
import type { FsEvent } from '../models/FsEvent.js';
import type { MoveRecord } from '../models/MoveRecord.js';
import { RuleTreeRef, type RuleTree } from '../models/RuleTree.js';
import type { WatchedEntry } from '../models/WatchedEntry.js';
import { ChokidarBackend, FileWatcher, type WatchBackend } from './FileWatcher.js';
import { CooldownScheduler } from './CooldownScheduler.js';
import { Classifier, type Classification } from './Classifier.js';
import { FolderAnalyzer } from './FolderAnalyzer.js';
import { MoveExecutor } from './MoveExecutor.js';
import { DecisionLog } from './DecisionLog.js';
import { IgnoreSet } from './IgnoreSet.js';
import type { StateStore } from './StateStore.js';
import { loadRulesFile } from '../config/rules.js';
import { BackpressureChannel, DroppingChannel } from '../lib/channel.js';
import { KeyedMutex } from '../lib/keyed-mutex.js';
import { WorkerPool } from '../lib/worker-pool.js';
import { MoveFailedError, isEngineError, toError } from '../lib/errors.js';
import { createChildLogger, getLogger } from '../lib/logger.js';

export interface OrganizerEngineConfig {
  watch: WatchConfig;
  engine: EngineConfig;
}

export interface OrganizerEngineDependencies {
  rules: RuleTree;
  store: StateStore;
  backend?: WatchBackend;
}

export type EngineRunState = 'idle' | 'running' | 'paused' | 'stopping' | 'stopped';

export interface EngineStatus {
  state: EngineRunState;
  watchers: Array<{ root: string; state: WatcherState }>;
  pendingCooldowns: number;
  heldDownloads: number;
  activeTasks: number;
  queuedTasks: number;
  rules: number;
  folderHandlingMode: FolderHandlingMode;
}

// Single key: commands and decision recording run one at a time
const COMMAND_QUEUE = 'decision-log';

/**
 * Wires the pipeline: watchers -> cooldown -> classification -> move ->
 * decision log -> outward channels.
 *
 * Consumers must drain `moveRecords`: it applies backpressure and a full
 * channel holds back further moves (never drops them). `notifications`
 * drops the oldest items when full and reports how many were lost.
 */
export class OrganizerEngine {
  readonly moveRecords: BackpressureChannel<MoveRecord>;
  readonly notifications: DroppingChannel<EngineNotification>;

  private logger = getLogger();
  private state: EngineRunState = 'idle';
  private rules: RuleTreeRef;
  private ignoreSet: IgnoreSet;
  private scheduler: CooldownScheduler;
  private classifier: Classifier;
  private executor: MoveExecutor;
  private decisionLog: DecisionLog;
  private pool: WorkerPool;
  private pathLocks = new KeyedMutex();
  private commands = new KeyedMutex();
  private backend: WatchBackend;
  private watchers: FileWatcher[] = [];

  constructor(private config: OrganizerEngineConfig, deps: OrganizerEngineDependencies) {
    const { engine } = config;

    this.moveRecords = new BackpressureChannel<MoveRecord>(engine.moveRecordBufferSize);
    this.notifications = new DroppingChannel<EngineNotification>(engine.notificationBufferSize, droppedSummary);

    this.rules = new RuleTreeRef(deps.rules);
    this.backend = deps.backend ?? new ChokidarBackend();
    this.ignoreSet = new IgnoreSet(engine.ignorePatterns, deps.store);
    this.scheduler = new CooldownScheduler(engine.cooldownMs);
    this.classifier = new Classifier(
      this.rules,
      new FolderAnalyzer(engine.sampleCapPerFolder),
      this.ignoreSet,
      { folderHandlingMode: engine.folderHandlingMode }
    );
    this.executor = new MoveExecutor();
    this.decisionLog = new DecisionLog(deps.store, this.ignoreSet, this.executor, engine.decisionRetentionCount);
    this.pool = new WorkerPool(engine.maxConcurrency);

    this.scheduler.on('settled', (entry) => this.enqueue(entry));
  }

  /**
   * Load persisted ignore entries and start one watcher per target folder
   */
  start(): void {
    if (this.state !== 'idle') {
      this.logger.warn({ state: this.state }, 'Engine already started');
      return;
    }

    this.ignoreSet.loadPersisted();
    this.state = 'running';

    for (const root of this.config.watch.targetFolders) {
      const watcher = new FileWatcher(root, this.backend, this.ignoreSet, {
        healthCheckInterval: this.config.watch.healthCheckInterval,
        recoveryInitialDelay: this.config.watch.recoveryInitialDelay,
        recoveryMaxDelay: this.config.watch.recoveryMaxDelay,
      });

      watcher.on('event', (event) => this.handleEvent(event));
      watcher.on('degraded', (degradedRoot, error) => {
        this.notify({ type: 'watcher-degraded', root: degradedRoot, message: error.message, timestamp: Date.now() });
      });
      watcher.on('recovered', (recoveredRoot) => {
        this.notify({ type: 'watcher-recovered', root: recoveredRoot, timestamp: Date.now() });
      });

      this.watchers.push(watcher);
      watcher.start();
    }

    this.logger.info(
      { roots: this.watchers.map(w => w.root), cooldownMs: this.config.engine.cooldownMs },
      'Organizer engine running'
    );
  }

  /**
   * Cancel pending cooldowns without moving anything, let started moves
   * finish, then close both channels
   */
  async stop(): Promise<void> {
    if (this.state === 'stopping' || this.state === 'stopped') {
      return;
    }
    this.state = 'stopping';
    this.logger.info('Stopping organizer engine');

    await Promise.all(this.watchers.map(watcher => watcher.stop()));
    const cancelled = this.scheduler.close();
    const dropped = this.pool.clear(new Error('Engine stopping'));

    this.logger.info({ cancelled, dropped, active: this.pool.getStats().active }, 'Waiting for in-flight moves');
    await this.pool.waitForIdle();
    // Anything queued on the command inlet (undo, ignore) finishes first
    await this.commands.runExclusive(COMMAND_QUEUE, async () => undefined);

    this.moveRecords.close();
    this.notifications.close();
    this.state = 'stopped';
    this.logger.info('Organizer engine stopped');
  }

  /**
   * Stop forwarding events and drop pending cooldowns; in-flight moves finish
   */
  pause(): void {
    if (this.state !== 'running') {
      return;
    }
    this.state = 'paused';
    this.watchers.forEach(watcher => watcher.setForwarding(false));
    const cancelled = this.scheduler.cancelAll();
    this.pool.clear(new Error('Engine paused'));
    this.logger.info({ cancelled }, 'Organizer engine paused');
  }

  /**
   * Resume forwarding and re-scan each root for what arrived meanwhile
   */
  resume(): void {
    if (this.state !== 'paused') {
      return;
    }
    this.state = 'running';
    for (const watcher of this.watchers) {
      watcher.setForwarding(true);
      if (watcher.getState() === WatcherState.WATCHING) {
        watcher.scan();
      }
    }
    this.logger.info('Organizer engine resumed');
  }

  /**
   * Swap the rule tree. Classifications already running keep their snapshot.
   */
  reloadRules(tree: RuleTree): void {
    const previous = this.rules.swap(tree);
    this.logger.info({ previousRules: previous.size, rules: tree.size }, 'Rules reloaded');
  }

  /**
   * Load and swap in a rules file; on error the current tree stays
   * @throws ConfigError when the file is missing or invalid
   */
  reloadRulesFromFile(rulesPath: string): RuleTree {
    const tree = loadRulesFile(rulesPath);
    this.reloadRules(tree);
    return tree;
  }

  setFolderHandlingMode(mode: FolderHandlingMode): void {
    this.classifier.setFolderHandlingMode(mode);
    this.logger.info({ mode }, 'Folder handling mode changed');
  }

  // ==========================================================================
  // Command inlet
  // ==========================================================================

  /**
   * Move a recorded folder back to where it was
   * @throws UndoConflictError when the original location is occupied
   * @throws DecisionNotFoundError | DecisionStateError
   */
  undo(decisionId: string): Promise<Decision> {
    return this.commands.runExclusive(COMMAND_QUEUE, async () => {
      const decision = await this.decisionLog.undo(decisionId);
      this.notify({ type: 'decision-updated', decision, timestamp: Date.now() });
      return decision;
    });
  }

  /**
   * Never touch the folder's original location again
   * @throws DecisionNotFoundError | DecisionStateError
   */
  ignore(decisionId: string): Promise<Decision> {
    return this.commands.runExclusive(COMMAND_QUEUE, async () => {
      const decision = this.decisionLog.ignore(decisionId);
      this.notify({ type: 'decision-updated', decision, timestamp: Date.now() });
      return decision;
    });
  }

  listDecisions(limit?: number): Decision[] {
    return this.decisionLog.list(limit);
  }

  getDecision(decisionId: string): Decision | null {
    return this.decisionLog.get(decisionId);
  }

  getStatus(): EngineStatus {
    const stats = this.pool.getStats();
    return {
      state: this.state,
      watchers: this.watchers.map(watcher => ({ root: watcher.root, state: watcher.getState() })),
      pendingCooldowns: this.scheduler.pendingCount(),
      heldDownloads: this.scheduler.heldCount(),
      activeTasks: stats.active,
      queuedTasks: stats.queued,
      rules: this.rules.current().size,
      folderHandlingMode: this.classifier.getFolderHandlingMode(),
    };
  }

  // ==========================================================================
  // Pipeline
  // ==========================================================================

  private handleEvent(event: FsEvent): void {
    if (this.state !== 'running') {
      return;
    }
    this.scheduler.track(event);
  }

  private enqueue(entry: WatchedEntry): void {
    if (this.state !== 'running') {
      return;
    }
    void this.pool
      .execute(() => this.pathLocks.runExclusive(entry.path, () => this.processSettled(entry.path, entry.root)))
      .catch((error: unknown) => {
        this.logger.debug({ filePath: entry.path, error: toError(error).message }, 'Settled path not processed');
      });
  }

  /**
   * Classify and move one settled path. Never throws: failures are logged
   * and reported on the notification channel.
   */
  private async processSettled(path: string, root: string): Promise<void> {
    const logger = createChildLogger({ filePath: path });

    if (!this.shouldContinue(path)) {
      return;
    }

    if (this.decisionLog.wasRestoredByUser(path)) {
      logger.debug({ reason: SkipReason.RESTORED_BY_USER }, 'Classification skipped');
      return;
    }

    let classification: Classification;
    try {
      classification = await this.classifier.classify(path, root);
    } catch (error) {
      logger.warn({ error }, 'Classification failed, leaving path in place');
      return;
    }

    if (classification.action === 'skip') {
      logger.debug({ reason: classification.reason }, 'Classification skipped');
      return;
    }

    // New activity or shutdown while classifying: leave it
    if (!this.shouldContinue(path)) {
      return;
    }

    let record: MoveRecord;
    try {
      record = await this.executor.move({
        sourcePath: path,
        root,
        category: classification.category,
        subcategory: classification.subcategory,
        isFolder: classification.isFolder,
      });
    } catch (error) {
      this.reportMoveFailure(path, error);
      return;
    }

    if (record.isFolder) {
      await this.recordDecision(record);
    }

    try {
      await this.moveRecords.send(record);
    } catch (error) {
      logger.error({ error, destinationPath: record.destinationPath }, 'Move record could not be delivered');
    }
  }

  private shouldContinue(path: string): boolean {
    return this.state === 'running' && !this.scheduler.isTracked(path);
  }

  private recordDecision(record: MoveRecord): Promise<void> {
    return this.commands.runExclusive(COMMAND_QUEUE, async () => {
      try {
        const decision = this.decisionLog.record(record);
        this.notify({ type: 'decision-recorded', decision, timestamp: Date.now() });
      } catch (error) {
        this.logger.error({ error, destinationPath: record.destinationPath }, 'Failed to record folder decision');
      }
    });
  }

  private reportMoveFailure(path: string, error: unknown): void {
    const err = toError(error);

    if (isEngineError(err)) {
      const reason = err instanceof MoveFailedError ? err.reason : null;
      this.logger.warn({ filePath: path, code: err.code, reason, error: err.message }, 'Move failed, item left in place');
      this.notify({
        type: 'move-failed',
        path,
        code: err.code,
        reason,
        message: err.message,
        timestamp: Date.now(),
      });
      return;
    }

    this.logger.error({ filePath: path, error: err }, 'Unexpected move failure, item left in place');
    this.notify({
      type: 'move-failed',
      path,
      code: 'MoveFailed',
      reason: 'io-error',
      message: err.message,
      timestamp: Date.now(),
    });
  }

  private notify(notification: EngineNotification): void {
    this.notifications.push(notification);
  }
}
