import type { Decision } from './Decision.js';
import type { EngineErrorCode, MoveFailureReason } from '../lib/errors.js';

export type EngineNotification =
  | { type: 'decision-recorded'; decision: Decision; timestamp: number }
  | { type: 'decision-updated'; decision: Decision; timestamp: number }
  | {
      type: 'move-failed';
      path: string;
      code: EngineErrorCode;
      reason: MoveFailureReason | null;
      message: string;
      timestamp: number;
    }
  | { type: 'watcher-degraded'; root: string; message: string; timestamp: number }
  | { type: 'watcher-recovered'; root: string; timestamp: number }
  | { type: 'notifications-dropped'; count: number; timestamp: number };

export function droppedSummary(count: number): EngineNotification {
  return { type: 'notifications-dropped', count, timestamp: Date.now() };
}
