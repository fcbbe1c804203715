import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { loadRulesFile, parseRules } from '../../src/config/rules.js';
import { ConfigError } from '../../src/lib/errors.js';
import { makeTempDir, removeTempDir } from '../helpers.js';

describe('Rules file', () => {
  describe('parseRules', () => {
    it('should build a tree from the structured format', () => {
      const tree = parseRules({ rules: [{ category: 'Images', extensions: ['jpg'] }] });

      expect(tree.categoryFor('a.jpg')).toEqual({ category: 'Images', subcategory: null, matched: true });
    });

    it('should join nested child names into a subcategory path', () => {
      const tree = parseRules({
        rules: [
          {
            category: 'Documents',
            children: [{ name: 'Work', children: [{ name: 'Invoices', patterns: ['invoice*'] }] }],
          },
        ],
      });

      expect(tree.match('invoice-42.pdf')).toEqual({
        category: 'Documents',
        subcategory: 'Work/Invoices',
        matched: true,
      });
    });

    it('should use the configured default category', () => {
      const tree = parseRules({ defaultCategory: 'Misc', rules: [] });

      expect(tree.defaultCategory).toBe('Misc');
    });

    it('should accept the flat legacy format', () => {
      const tree = parseRules({ Images: ['.png'], Documents: { PDF: ['.pdf'] } });

      expect(tree.match('a.png')?.category).toBe('Images');
      expect(tree.match('a.pdf')).toEqual({ category: 'Documents', subcategory: 'PDF', matched: true });
      expect(tree.defaultCategory).toBe('Others');
    });

    it('should reject category names with separators', () => {
      expect(() => parseRules({ rules: [{ category: 'A/B' }] })).toThrow(
        'Invalid rules: rules.0.category: must be a plain folder name'
      );
    });

    it('should reject malformed legacy rules', () => {
      expect(() => parseRules({ Images: 5 })).toThrow(ConfigError);
    });
  });

  describe('loadRulesFile', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = makeTempDir();
    });

    afterEach(() => {
      removeTempDir(tempDir);
    });

    it('should report a missing file', () => {
      const rulesPath = join(tempDir, 'missing.json');

      expect(() => loadRulesFile(rulesPath)).toThrow(`Rules file not found at: ${rulesPath}`);
    });

    it('should report invalid JSON', () => {
      const rulesPath = join(tempDir, 'rules.json');
      writeFileSync(rulesPath, '{ not json');

      expect(() => loadRulesFile(rulesPath)).toThrow(`Rules file is not valid JSON: ${rulesPath}`);
    });

    it('should load the bundled default rules', () => {
      const tree = loadRulesFile(join(__dirname, '..', '..', 'config', 'rules.json'));

      expect(tree.categoryFor('report.pdf')).toEqual({ category: 'Documents', subcategory: 'PDF', matched: true });
      expect(tree.categoryFor('app.ts').category).toBe('Code');
      expect(tree.categoryFor('backup.tar.gz').category).toBe('Archives');
      expect(tree.categoryFor('holiday.heic').category).toBe('Images');
      expect(tree.categoryFor('song.mp3').category).toBe('Audio');
      expect(tree.categoryFor('mystery.bin').category).toBe('Others');
    });
  });
});
