import type { FsEvent } from './FsEvent.js';

export interface WatchedEntry {
  /** Absolute path being debounced */
  path: string;

  /** Watched root the path belongs to */
  root: string;

  /** Timestamp of the most recent event for the path */
  lastEventTime: number;

  /** Size when the entry was created (null until first sampled) */
  firstSeenSize: number | null;

  /** Size at the last check */
  lastSize: number | null;

  /** Consecutive cooldown windows that ended with an unchanged size */
  stableCount: number;

  /** Bumped by every event; a timer only settles the generation it was armed for */
  generation: number;

  /** Held indefinitely while the name carries a transient-download suffix */
  held: boolean;

  isDirectory: boolean;

  timer: NodeJS.Timeout | null;
}

export function createWatchedEntry(event: FsEvent, held: boolean): WatchedEntry {
  return {
    path: event.path,
    root: event.root,
    lastEventTime: event.timestamp,
    firstSeenSize: null,
    lastSize: null,
    stableCount: 0,
    generation: 0,
    held,
    isDirectory: event.isDirectory,
    timer: null,
  };
}

export function touchWatchedEntry(entry: WatchedEntry, event: FsEvent): void {
  entry.lastEventTime = event.timestamp;
  entry.generation++;
  entry.stableCount = 0;
  entry.isDirectory = entry.isDirectory || event.isDirectory;
}

/**
 * Remember a size sampled when an event arrived
 */
export function noteSize(entry: WatchedEntry, size: number): void {
  if (entry.firstSeenSize === null) {
    entry.firstSeenSize = size;
  }
  entry.lastSize = size;
}

/**
 * Compare a size measured when the cooldown ends with the last known one
 * @returns True when the size changed since the last sample
 */
export function recordSize(entry: WatchedEntry, size: number): boolean {
  if (entry.firstSeenSize === null) {
    entry.firstSeenSize = size;
  }
  const changed = entry.lastSize !== size;
  entry.lastSize = size;
  entry.stableCount = changed ? 0 : entry.stableCount + 1;
  return changed;
}
