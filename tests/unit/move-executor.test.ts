import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { cp, rm } from 'fs/promises';
import { join } from 'path';
import { MoveExecutor, destinationDirectory, type TransferOperations } from '../../src/services/MoveExecutor.js';
import { ConflictExhaustedError, MoveFailedError, UndoConflictError } from '../../src/lib/errors.js';
import { makeTempDir, removeTempDir, writeFile } from '../helpers.js';

describe('MoveExecutor', () => {
  let root: string;
  let executor: MoveExecutor;

  beforeEach(() => {
    root = makeTempDir();
    executor = new MoveExecutor();
  });

  afterEach(() => {
    removeTempDir(root);
  });

  describe('destinationDirectory', () => {
    it('should place top-level categories directly under the root', () => {
      expect(destinationDirectory('/data', 'Images', null)).toBe(join('/data', 'Images'));
    });

    it('should nest subcategories', () => {
      expect(destinationDirectory('/data', 'Documents', 'PDF')).toBe(join('/data', 'Documents', 'PDF'));
      expect(destinationDirectory('/data', 'Documents', 'Work/Invoices')).toBe(
        join('/data', 'Documents', 'Work', 'Invoices')
      );
    });

    it('should not repeat a subcategory equal to its category', () => {
      expect(destinationDirectory('/data', 'Images', 'Images')).toBe(join('/data', 'Images'));
    });
  });

  it('should move a file into its category folder', async () => {
    const source = join(root, 'report.pdf');
    writeFile(source, 'pdf-bytes');

    const record = await executor.move({
      sourcePath: source,
      root,
      category: 'Documents',
      subcategory: 'PDF',
      isFolder: false,
    });

    expect(record.sourcePath).toBe(source);
    expect(record.destinationPath).toBe(join(root, 'Documents', 'PDF', 'report.pdf'));
    expect(record.category).toBe('Documents');
    expect(record.subcategory).toBe('PDF');
    expect(record.isFolder).toBe(false);
    expect(record.root).toBe(root);
    expect(existsSync(source)).toBe(false);
    expect(readFileSync(record.destinationPath, 'utf-8')).toBe('pdf-bytes');
  });

  it('should move a folder with its contents', async () => {
    const source = join(root, 'Holiday');
    writeFile(join(source, 'beach.jpg'), 'jpg');

    const record = await executor.move({ sourcePath: source, root, category: 'Images', subcategory: null, isFolder: true });

    expect(record.destinationPath).toBe(join(root, 'Images', 'Holiday'));
    expect(existsSync(join(root, 'Images', 'Holiday', 'beach.jpg'))).toBe(true);
  });

  it('should never overwrite an existing file', async () => {
    writeFile(join(root, 'Images', 'photo.jpg'), 'old');
    writeFile(join(root, 'photo.jpg'), 'new');

    const record = await executor.move({
      sourcePath: join(root, 'photo.jpg'),
      root,
      category: 'Images',
      subcategory: null,
      isFolder: false,
    });

    expect(record.destinationPath).toBe(join(root, 'Images', 'photo (1).jpg'));
    expect(readFileSync(join(root, 'Images', 'photo.jpg'), 'utf-8')).toBe('old');
    expect(readFileSync(join(root, 'Images', 'photo (1).jpg'), 'utf-8')).toBe('new');
  });

  it('should number a conflicting folder on its whole name', async () => {
    mkdirSync(join(root, 'Code', 'my.project'), { recursive: true });
    writeFile(join(root, 'my.project', 'main.py'));

    const record = await executor.move({ sourcePath: join(root, 'my.project'), root, category: 'Code', subcategory: null, isFolder: true });

    expect(record.destinationPath).toBe(join(root, 'Code', 'my.project (1)'));
    expect(existsSync(join(root, 'Code', 'my.project (1)', 'main.py'))).toBe(true);
  });

  it('should give concurrent moves of the same name distinct destinations', async () => {
    writeFile(join(root, 'a', 'photo.jpg'), 'a');
    writeFile(join(root, 'b', 'photo.jpg'), 'b');

    const records = await Promise.all([
      executor.move({ sourcePath: join(root, 'a', 'photo.jpg'), root, category: 'Images', subcategory: null, isFolder: false }),
      executor.move({ sourcePath: join(root, 'b', 'photo.jpg'), root, category: 'Images', subcategory: null, isFolder: false }),
    ]);

    const destinations = records.map(record => record.destinationPath).sort();
    expect(destinations).toEqual([join(root, 'Images', 'photo (1).jpg'), join(root, 'Images', 'photo.jpg')]);
  });

  it('should report a missing source', async () => {
    const move = executor.move({
      sourcePath: join(root, 'gone.txt'),
      root,
      category: 'Documents',
      subcategory: null,
      isFolder: false,
    });

    await expect(move).rejects.toThrow(MoveFailedError);
    await expect(move).rejects.toMatchObject({ reason: 'source-missing', code: 'MoveFailed' });
  });

  it('should leave the source in place when no free name exists', async () => {
    const limited = new MoveExecutor({ maxConflictAttempts: 1 });
    writeFile(join(root, 'Images', 'photo.jpg'));
    writeFile(join(root, 'Images', 'photo (1).jpg'));
    writeFile(join(root, 'photo.jpg'));

    await expect(
      limited.move({ sourcePath: join(root, 'photo.jpg'), root, category: 'Images', subcategory: null, isFolder: false })
    ).rejects.toThrow(ConflictExhaustedError);
    expect(existsSync(join(root, 'photo.jpg'))).toBe(true);
  });

  describe('relocate', () => {
    it('should move an entry to an exact path', async () => {
      writeFile(join(root, 'Images', 'Holiday', 'beach.jpg'));

      await executor.relocate(join(root, 'Images', 'Holiday'), join(root, 'Holiday'), 'decision-1');

      expect(existsSync(join(root, 'Holiday', 'beach.jpg'))).toBe(true);
      expect(existsSync(join(root, 'Images', 'Holiday'))).toBe(false);
    });

    it('should refuse to overwrite an occupied target', async () => {
      writeFile(join(root, 'Images', 'Holiday', 'beach.jpg'));
      mkdirSync(join(root, 'Holiday'));

      await expect(
        executor.relocate(join(root, 'Images', 'Holiday'), join(root, 'Holiday'), 'decision-1')
      ).rejects.toThrow(UndoConflictError);
      expect(existsSync(join(root, 'Images', 'Holiday', 'beach.jpg'))).toBe(true);
    });
  });

  describe('across devices', () => {
    function errnoError(code: string): Error {
      return Object.assign(new Error(code), { code });
    }

    function crossDevice(overrides: Partial<TransferOperations> = {}): MoveExecutor {
      return new MoveExecutor({
        operations: {
          rename: async () => {
            throw errnoError('EXDEV');
          },
          cp,
          rm,
          ...overrides,
        },
      });
    }

    it('should copy then delete when rename reports EXDEV', async () => {
      writeFile(join(root, 'Holiday', 'beach.jpg'), 'jpg');

      const record = await crossDevice().move({
        sourcePath: join(root, 'Holiday'),
        root,
        category: 'Images',
        subcategory: null,
        isFolder: true,
      });

      expect(record.destinationPath).toBe(join(root, 'Images', 'Holiday'));
      expect(readFileSync(join(root, 'Images', 'Holiday', 'beach.jpg'), 'utf-8')).toBe('jpg');
      expect(existsSync(join(root, 'Holiday'))).toBe(false);
    });

    it('should remove a partial copy and keep the source when the copy fails', async () => {
      writeFile(join(root, 'movie.mp4'), 'full');
      const executor = crossDevice({
        cp: async (_source, target) => {
          writeFileSync(target, 'fu');
          throw errnoError('EIO');
        },
      });

      const move = executor.move({ sourcePath: join(root, 'movie.mp4'), root, category: 'Video', subcategory: null, isFolder: false });

      await expect(move).rejects.toMatchObject({ code: 'MoveFailed', reason: 'cross-device-copy-failed' });
      expect(existsSync(join(root, 'Video', 'movie.mp4'))).toBe(false);
      expect(readFileSync(join(root, 'movie.mp4'), 'utf-8')).toBe('full');
    });

    it('should not delete an entry that appeared at the destination during the move', async () => {
      writeFile(join(root, 'photo.jpg'), 'mine');
      const executor = crossDevice({
        rename: async (_source, target) => {
          writeFileSync(target, 'someone-else');
          throw errnoError('EXDEV');
        },
      });

      const move = executor.move({ sourcePath: join(root, 'photo.jpg'), root, category: 'Images', subcategory: null, isFolder: false });

      await expect(move).rejects.toMatchObject({ reason: 'cross-device-copy-failed' });
      expect(readFileSync(join(root, 'Images', 'photo.jpg'), 'utf-8')).toBe('someone-else');
      expect(readFileSync(join(root, 'photo.jpg'), 'utf-8')).toBe('mine');
    });

    it('should keep a complete copy when the source cannot be removed', async () => {
      writeFile(join(root, 'notes.txt'), 'text');
      const executor = crossDevice({
        rm: async (target, options) => {
          if (target === join(root, 'notes.txt')) {
            throw errnoError('EACCES');
          }
          await rm(target, options);
        },
      });

      const move = executor.move({ sourcePath: join(root, 'notes.txt'), root, category: 'Documents', subcategory: null, isFolder: false });

      await expect(move).rejects.toMatchObject({ reason: 'permission-denied' });
      expect(readFileSync(join(root, 'Documents', 'notes.txt'), 'utf-8')).toBe('text');
      expect(existsSync(join(root, 'notes.txt'))).toBe(true);
    });

    it('should surface other rename failures without copying', async () => {
      writeFile(join(root, 'photo.jpg'));
      const executor = new MoveExecutor({
        operations: {
          rename: async () => {
            throw errnoError('EPERM');
          },
          cp: async () => {
            throw new Error('copy should not run');
          },
          rm,
        },
      });

      await expect(
        executor.move({ sourcePath: join(root, 'photo.jpg'), root, category: 'Images', subcategory: null, isFolder: false })
      ).rejects.toMatchObject({ reason: 'permission-denied' });
      expect(existsSync(join(root, 'photo.jpg'))).toBe(true);
    });
  });
});
