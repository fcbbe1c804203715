import { EventEmitter } from 'events';
import { readdir } from 'fs/promises';
import { basename, join } from 'path';
import type { FsEvent } from '../models/FsEvent.js';
import type { WatchedEntry } from '../models/WatchedEntry.js';
import { createWatchedEntry, noteSize, recordSize, touchWatchedEntry } from '../models/WatchedEntry.js';
import { FsEventKind, isTransientName } from '../types/index.js';
import { lstatOrNull } from '../lib/fs.js';
import { getLogger } from '../lib/logger.js';

export interface CooldownSchedulerEvents {
  settled: (entry: WatchedEntry) => void;
  cancelled: (path: string, reason: 'deleted' | 'renamed' | 'disappeared') => void;
}

export declare interface CooldownScheduler {
  on<U extends keyof CooldownSchedulerEvents>(
    event: U,
    listener: CooldownSchedulerEvents[U]
  ): this;
  emit<U extends keyof CooldownSchedulerEvents>(
    event: U,
    ...args: Parameters<CooldownSchedulerEvents[U]>
  ): boolean;
}

/**
 * Size of a file, or for a directory the entry count plus the size of its
 * direct files. Null when the path is gone.
 */
async function measure(path: string): Promise<number | null> {
  const stats = await lstatOrNull(path);
  if (!stats) {
    return null;
  }
  if (!stats.isDirectory()) {
    return stats.size;
  }

  const entries = await readdir(path, { withFileTypes: true });
  let total = entries.length;
  for (const entry of entries) {
    if (entry.isFile()) {
      const child = await lstatOrNull(join(path, entry.name));
      total += child?.size ?? 0;
    }
  }
  return total;
}

/**
 * Per-path debounce in front of classification.
 *
 * Every event for a path bumps the entry's generation and re-arms its timer.
 * A firing timer re-checks the path asynchronously and gives up as soon as it
 * sees a newer generation, so each burst of events produces exactly one
 * `settled` emission, for the state after the last event. Paths with a
 * transient-download suffix are held without a timer until renamed.
 */
export class CooldownScheduler extends EventEmitter {
  private entries: Map<string, WatchedEntry> = new Map();
  private closed = false;
  private logger = getLogger();

  constructor(private cooldownMs: number) {
    super();
    if (!Number.isFinite(cooldownMs) || cooldownMs < 0) {
      throw new RangeError(`Cooldown must be a non-negative number, got: ${cooldownMs}`);
    }
  }

  track(event: FsEvent): void {
    if (this.closed) {
      return;
    }

    switch (event.kind) {
      case FsEventKind.DELETE:
        this.cancel(event.path, 'deleted');
        return;

      case FsEventKind.RENAME:
        if (event.previousPath !== undefined) {
          this.cancel(event.previousPath, 'renamed');
        }
        this.observe(event);
        return;

      case FsEventKind.CREATE:
      case FsEventKind.MODIFY:
      default:
        this.observe(event);
    }
  }

  /**
   * Drop a path's entry without settling it
   * @returns True when an entry existed
   */
  cancel(path: string, reason: 'deleted' | 'renamed' | 'disappeared'): boolean {
    const entry = this.entries.get(path);
    if (!entry) {
      return false;
    }
    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
    this.entries.delete(path);
    this.logger.debug({ filePath: path, reason }, 'Cooldown cancelled');
    this.emit('cancelled', path, reason);
    return true;
  }

  /**
   * Cancel every pending entry without settling any of them
   * @returns Number of cancelled entries
   */
  cancelAll(): number {
    const count = this.entries.size;
    for (const entry of this.entries.values()) {
      if (entry.timer) {
        clearTimeout(entry.timer);
        entry.timer = null;
      }
    }
    this.entries.clear();
    return count;
  }

  /**
   * Cancel everything and refuse further events
   */
  close(): number {
    this.closed = true;
    return this.cancelAll();
  }

  isTracked(path: string): boolean {
    return this.entries.has(path);
  }

  /** Transient downloads waiting to be renamed */
  heldCount(): number {
    let held = 0;
    for (const entry of this.entries.values()) {
      if (entry.held) {
        held++;
      }
    }
    return held;
  }

  pendingCount(): number {
    return this.entries.size;
  }

  private observe(event: FsEvent): void {
    const held = isTransientName(basename(event.path));
    let entry = this.entries.get(event.path);

    if (entry) {
      touchWatchedEntry(entry, event);
      entry.held = held;
    } else {
      entry = createWatchedEntry(event, held);
      this.entries.set(event.path, entry);
    }

    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }

    if (held) {
      this.logger.debug({ filePath: event.path }, 'Download in progress, holding until renamed');
      return;
    }

    void this.sampleSize(entry, entry.generation);
    this.arm(entry);
  }

  private arm(entry: WatchedEntry): void {
    const generation = entry.generation;
    entry.timer = setTimeout(() => {
      entry.timer = null;
      void this.fire(entry, generation);
    }, this.cooldownMs);
  }

  private isCurrent(entry: WatchedEntry, generation: number): boolean {
    return this.entries.get(entry.path) === entry && entry.generation === generation;
  }

  private async sampleSize(entry: WatchedEntry, generation: number): Promise<void> {
    try {
      const size = await measure(entry.path);
      if (size !== null && this.isCurrent(entry, generation)) {
        noteSize(entry, size);
      }
    } catch (error) {
      this.logger.debug({ filePath: entry.path, error }, 'Could not sample size');
    }
  }

  private async fire(entry: WatchedEntry, generation: number): Promise<void> {
    if (!this.isCurrent(entry, generation)) {
      return;
    }

    let size: number | null;
    try {
      size = await measure(entry.path);
    } catch (error) {
      // Unreadable: settle anyway and let classification report it
      this.logger.debug({ filePath: entry.path, error }, 'Could not measure settled path');
      size = entry.lastSize ?? 0;
    }

    // An event arrived while measuring; its own timer takes over
    if (!this.isCurrent(entry, generation)) {
      return;
    }

    if (size === null) {
      this.cancel(entry.path, 'disappeared');
      return;
    }

    if (recordSize(entry, size)) {
      this.logger.debug({ filePath: entry.path, size }, 'Still growing, extending cooldown');
      this.arm(entry);
      return;
    }

    this.entries.delete(entry.path);

    try {
      this.emit('settled', entry);
    } catch (error) {
      this.logger.error({ filePath: entry.path, error }, 'Settled listener failed');
    }
  }
}
