import { cp, mkdir, rename, rm } from 'fs/promises';
import type { CopyOptions, RmOptions } from 'fs';
import { basename, dirname, join } from 'path';
import type { MoveRecord } from '../models/MoveRecord.js';
import { createMoveRecord } from '../models/MoveRecord.js';
import { resolveConflict, DEFAULT_MAX_ATTEMPTS } from './ConflictResolver.js';
import { KeyedMutex } from '../lib/keyed-mutex.js';
import {
  MoveFailedError,
  UndoConflictError,
  errnoCode,
  type MoveFailureReason,
} from '../lib/errors.js';
import { isCrossDeviceError, isMissingError, isPermissionError, pathExists } from '../lib/fs.js';
import { getLogger, createChildLogger } from '../lib/logger.js';

export interface MoveRequest {
  sourcePath: string;
  root: string;
  category: string;
  subcategory: string | null;
  isFolder: boolean;
}

/**
 * The filesystem calls a transfer is made of
 */
export interface TransferOperations {
  rename(sourcePath: string, targetPath: string): Promise<void>;
  cp(sourcePath: string, targetPath: string, options: CopyOptions): Promise<void>;
  rm(targetPath: string, options: RmOptions): Promise<void>;
}

const nodeTransferOperations: TransferOperations = { rename, cp, rm };

export interface MoveExecutorOptions {
  maxConflictAttempts?: number;
  operations?: TransferOperations;
}

/**
 * Destination directory for a classification: root/category[/sub/segments]
 */
export function destinationDirectory(root: string, category: string, subcategory: string | null): string {
  if (!subcategory || subcategory === category) {
    return join(root, category);
  }
  return join(root, category, ...subcategory.split('/').filter(segment => segment.length > 0));
}

function failureReason(error: unknown): MoveFailureReason {
  if (isPermissionError(error)) {
    return 'permission-denied';
  }
  if (isMissingError(error)) {
    return 'source-missing';
  }
  return 'io-error';
}

export class MoveExecutor {
  private logger = getLogger();
  private directoryLocks = new KeyedMutex();
  private maxConflictAttempts: number;
  private operations: TransferOperations;

  constructor(options: MoveExecutorOptions = {}) {
    this.maxConflictAttempts = options.maxConflictAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.operations = options.operations ?? nodeTransferOperations;
  }

  /**
   * Move a classified entry into its category folder
   * @param request Source and destination category
   * @returns Record of the completed move
   * @throws ConflictExhaustedError when no free name exists
   * @throws MoveFailedError on IO failure; the source is left in place
   */
  async move(request: MoveRequest): Promise<MoveRecord> {
    const targetDir = destinationDirectory(request.root, request.category, request.subcategory);
    const logger = createChildLogger({ sourcePath: request.sourcePath, targetDir });

    return this.directoryLocks.runExclusive(targetDir, async () => {
      try {
        await mkdir(targetDir, { recursive: true });
      } catch (error) {
        throw new MoveFailedError(request.sourcePath, failureReason(error), error);
      }

      const finalPath = await resolveConflict(
        join(targetDir, basename(request.sourcePath)),
        this.maxConflictAttempts,
        request.isFolder
      );

      if (finalPath !== join(targetDir, basename(request.sourcePath))) {
        logger.warn({ finalPath }, 'Name taken at destination, using numbered name');
      }

      await this.transfer(request.sourcePath, finalPath);

      const record = createMoveRecord(
        request.sourcePath,
        finalPath,
        request.category,
        request.subcategory,
        request.isFolder,
        request.root
      );

      logger.info({ destinationPath: finalPath, category: request.category }, 'Moved');
      return record;
    });
  }

  /**
   * Move an entry to an exact path, refusing to overwrite
   * @throws UndoConflictError when the target is occupied
   * @throws MoveFailedError on IO failure
   */
  async relocate(fromPath: string, toPath: string, decisionId: string): Promise<void> {
    const targetDir = dirname(toPath);

    await this.directoryLocks.runExclusive(targetDir, async () => {
      if (await pathExists(toPath)) {
        throw new UndoConflictError(decisionId, toPath);
      }

      try {
        await mkdir(targetDir, { recursive: true });
      } catch (error) {
        throw new MoveFailedError(fromPath, failureReason(error), error);
      }

      await this.transfer(fromPath, toPath);
      this.logger.info({ fromPath, toPath, decisionId }, 'Relocated');
    });
  }

  /**
   * rename(), falling back to copy-then-delete across devices
   */
  private async transfer(sourcePath: string, targetPath: string): Promise<void> {
    try {
      await this.operations.rename(sourcePath, targetPath);
      return;
    } catch (error) {
      if (!isCrossDeviceError(error)) {
        throw new MoveFailedError(sourcePath, failureReason(error), error);
      }
    }

    this.logger.debug({ sourcePath, targetPath }, 'Cross-device move, copying');

    // cp merges into an existing directory, so anything at the target now is not ours
    if (await pathExists(targetPath)) {
      throw new MoveFailedError(
        sourcePath,
        'cross-device-copy-failed',
        new Error(`Destination appeared before copy: ${targetPath}`)
      );
    }

    try {
      await this.operations.cp(sourcePath, targetPath, { recursive: true, errorOnExist: true, force: false });
    } catch (error) {
      const code = errnoCode(error);
      if (code !== 'EEXIST' && code !== 'ERR_FS_CP_EEXIST') {
        await this.discardPartialCopy(targetPath);
      }
      throw new MoveFailedError(sourcePath, 'cross-device-copy-failed', error);
    }

    try {
      await this.operations.rm(sourcePath, { recursive: true });
    } catch (error) {
      // Part of the source may already be gone; the complete copy is kept
      this.logger.error({ sourcePath, targetPath, error }, 'Copied but could not remove source');
      throw new MoveFailedError(sourcePath, failureReason(error), error);
    }
  }

  private async discardPartialCopy(targetPath: string): Promise<void> {
    try {
      await this.operations.rm(targetPath, { recursive: true, force: true });
    } catch (error) {
      this.logger.error({ targetPath, error }, 'Failed to remove partial copy');
    }
  }
}
