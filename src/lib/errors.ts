import { types } from 'util';

export type MoveFailureReason =
  | 'permission-denied'
  | 'source-missing'
  | 'cross-device-copy-failed'
  | 'io-error';

export type EngineErrorCode =
  | 'WatchUnavailable'
  | 'ConflictExhausted'
  | 'MoveFailed'
  | 'UndoConflict'
  | 'DecisionNotFound'
  | 'DecisionState'
  | 'ConfigError';

/**
 * Base class for every error the engine reports. `code` is the stable value
 * notifications and logs carry; `message` is for humans.
 */
export abstract class EngineError extends Error {
  abstract readonly code: EngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class WatchUnavailableError extends EngineError {
  readonly code = 'WatchUnavailable';

  constructor(readonly root: string, cause?: unknown) {
    super(`Watched folder is not accessible: ${root}`, { cause });
  }
}

export class ConflictExhaustedError extends EngineError {
  readonly code = 'ConflictExhausted';

  constructor(readonly destinationPath: string, readonly attempts: number) {
    super(`No free name for ${destinationPath} after ${attempts} attempts`);
  }
}

export class MoveFailedError extends EngineError {
  readonly code = 'MoveFailed';

  constructor(
    readonly sourcePath: string,
    readonly reason: MoveFailureReason,
    cause?: unknown
  ) {
    super(`Failed to move ${sourcePath}: ${reason}`, { cause });
  }
}

export class UndoConflictError extends EngineError {
  readonly code = 'UndoConflict';

  constructor(readonly decisionId: string, readonly occupiedPath: string) {
    super(`Cannot undo ${decisionId}: ${occupiedPath} is occupied, resolve it manually`);
  }
}

export class DecisionNotFoundError extends EngineError {
  readonly code = 'DecisionNotFound';

  constructor(readonly decisionId: string) {
    super(`Decision not found: ${decisionId}`);
  }
}

export class DecisionStateError extends EngineError {
  readonly code = 'DecisionState';

  constructor(readonly decisionId: string, readonly state: string) {
    super(`Decision ${decisionId} is ${state}, only active decisions can change`);
  }
}

export class ConfigError extends EngineError {
  readonly code = 'ConfigError';
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Node system errors carry a string `code` such as ENOENT or EXDEV. Checked
 * structurally: errors raised by fs may come from another realm, where
 * `instanceof Error` is false.
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toError(error: unknown): Error {
  return types.isNativeError(error) || error instanceof Error ? error : new Error(String(error));
}
