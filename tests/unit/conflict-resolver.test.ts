import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdirSync } from 'fs';
import { join } from 'path';
import { candidateName, resolveConflict } from '../../src/services/ConflictResolver.js';
import { ConflictExhaustedError } from '../../src/lib/errors.js';
import { makeTempDir, removeTempDir, writeFile } from '../helpers.js';

describe('ConflictResolver', () => {
  describe('candidateName', () => {
    it('should insert the counter before the extension', () => {
      expect(candidateName('photo.jpg', 1)).toBe('photo (1).jpg');
      expect(candidateName('archive.tar.gz', 2)).toBe('archive.tar (2).gz');
    });

    it('should append the counter to names without an extension', () => {
      expect(candidateName('README', 3)).toBe('README (3)');
      expect(candidateName('Project', 1)).toBe('Project (1)');
    });

    it('should number the whole name of a folder', () => {
      expect(candidateName('my.project', 1, true)).toBe('my.project (1)');
      expect(candidateName('v2.0', 4, true)).toBe('v2.0 (4)');
    });
  });

  describe('resolveConflict', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = makeTempDir();
    });

    afterEach(() => {
      removeTempDir(tempDir);
    });

    it('should return the desired path when it is free', async () => {
      const desired = join(tempDir, 'photo.jpg');

      await expect(resolveConflict(desired)).resolves.toBe(desired);
    });

    it('should return the first free numbered name', async () => {
      writeFile(join(tempDir, 'photo.jpg'));
      writeFile(join(tempDir, 'photo (1).jpg'));

      await expect(resolveConflict(join(tempDir, 'photo.jpg'))).resolves.toBe(join(tempDir, 'photo (2).jpg'));
    });

    it('should keep dots in a conflicting folder name', async () => {
      mkdirSync(join(tempDir, 'my.project'));

      await expect(resolveConflict(join(tempDir, 'my.project'), 10, true)).resolves.toBe(
        join(tempDir, 'my.project (1)')
      );
    });

    it('should give up after the maximum number of attempts', async () => {
      writeFile(join(tempDir, 'photo.jpg'));
      writeFile(join(tempDir, 'photo (1).jpg'));
      writeFile(join(tempDir, 'photo (2).jpg'));

      await expect(resolveConflict(join(tempDir, 'photo.jpg'), 2)).rejects.toThrow(ConflictExhaustedError);
    });
  });
});
