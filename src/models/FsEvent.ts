import { FsEventKind } from '../types/index.js';

export interface FsEvent {
  /** Absolute path the event is about */
  path: string;

  /** Watched root the path belongs to */
  root: string;

  kind: FsEventKind;

  /** Milliseconds since epoch when the watcher saw the event */
  timestamp: number;

  isDirectory: boolean;

  /** Old path for RENAME events */
  previousPath?: string;
}

export function createFsEvent(
  path: string,
  root: string,
  kind: FsEventKind,
  isDirectory: boolean,
  previousPath?: string
): FsEvent {
  const event: FsEvent = {
    path,
    root,
    kind,
    timestamp: Date.now(),
    isDirectory,
  };
  if (previousPath !== undefined) {
    event.previousPath = previousPath;
  }
  return event;
}
