import { randomUUID } from 'crypto';
import { DecisionState } from '../types/index.js';
import type { MoveRecord } from './MoveRecord.js';

export interface Decision {
  /** UUID */
  id: string;

  /** Where the folder was before the engine moved it */
  originalPath: string;

  /** Where the engine put it */
  newPath: string;

  category: string;

  /** Milliseconds since epoch of the move */
  timestamp: number;

  state: DecisionState;
}

export function createDecision(record: MoveRecord): Decision {
  return {
    id: randomUUID(),
    originalPath: record.sourcePath,
    newPath: record.destinationPath,
    category: record.category,
    timestamp: record.timestamp,
    state: DecisionState.ACTIVE,
  };
}

// Database row type (from SQLite)
export interface DecisionRow {
  id: string;
  original_path: string;
  new_path: string;
  category: string;
  timestamp: number;
  state: string;
}

function toDecisionState(value: string): DecisionState {
  switch (value) {
    case DecisionState.UNDONE_BY_USER:
      return DecisionState.UNDONE_BY_USER;
    case DecisionState.IGNORED:
      return DecisionState.IGNORED;
    default:
      return DecisionState.ACTIVE;
  }
}

// Convert database row to model
export function rowToDecision(row: DecisionRow): Decision {
  return {
    id: row.id,
    originalPath: row.original_path,
    newPath: row.new_path,
    category: row.category,
    timestamp: row.timestamp,
    state: toDecisionState(row.state),
  };
}
