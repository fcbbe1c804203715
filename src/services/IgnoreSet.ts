import ignore from 'ignore';
import { basename, relative, resolve, sep, isAbsolute } from 'path';
import { IgnoreEntryKind } from '../types/index.js';
import { isSameOrInside } from '../lib/fs.js';
import type { StateStore } from './StateStore.js';
import { getLogger } from '../lib/logger.js';

/**
 * Paths and patterns the engine must never touch.
 *
 * Path entries cover the path itself and everything beneath it. Pattern
 * entries use gitignore syntax and are tested against the base name and the
 * path relative to the watched root. Configured patterns live in memory only;
 * entries added through {@link IgnoreSet.addPath} / {@link IgnoreSet.addPattern}
 * are written to the state store when one is attached.
 */
export class IgnoreSet {
  private paths: Set<string> = new Set();
  private patterns: string[] = [];
  private matcher: ReturnType<typeof ignore> = ignore();
  private store: StateStore | null;
  private logger = getLogger();

  constructor(configuredPatterns: readonly string[] = [], store?: StateStore) {
    this.store = store ?? null;
    for (const pattern of configuredPatterns) {
      this.addPatternInMemory(pattern);
    }
  }

  /**
   * Load entries persisted by earlier runs
   * @returns Number of entries loaded
   */
  loadPersisted(): number {
    if (!this.store) {
      return 0;
    }
    const entries = this.store.listIgnoreEntries();
    for (const entry of entries) {
      if (entry.kind === IgnoreEntryKind.PATH) {
        this.paths.add(resolve(entry.value));
      } else {
        this.addPatternInMemory(entry.value);
      }
    }
    this.logger.info({ count: entries.length }, 'Loaded persisted ignore entries');
    return entries.length;
  }

  addPath(path: string): void {
    const absolute = resolve(path);
    this.paths.add(absolute);
    this.store?.addIgnoreEntry(IgnoreEntryKind.PATH, absolute);
    this.logger.info({ path: absolute }, 'Path added to ignore set');
  }

  addPattern(pattern: string): void {
    this.addPatternInMemory(pattern);
    this.store?.addIgnoreEntry(IgnoreEntryKind.PATTERN, pattern);
  }

  /**
   * @param path Absolute path of the entry
   * @param root Watched root the entry belongs to, for relative pattern matching
   */
  matches(path: string, root?: string): boolean {
    for (const ignoredPath of this.paths) {
      if (isSameOrInside(path, ignoredPath)) {
        return true;
      }
    }

    if (this.patterns.length === 0) {
      return false;
    }

    const name = basename(path);
    if (name.length > 0 && this.matcher.ignores(name)) {
      return true;
    }

    if (root) {
      const relativePath = relative(root, path);
      if (
        relativePath.length > 0 &&
        !relativePath.startsWith('..') &&
        !isAbsolute(relativePath) &&
        this.matcher.ignores(relativePath.split(sep).join('/'))
      ) {
        return true;
      }
    }

    return false;
  }

  listPaths(): string[] {
    return [...this.paths];
  }

  listPatterns(): string[] {
    return [...this.patterns];
  }

  private addPatternInMemory(pattern: string): void {
    const trimmed = pattern.trim();
    if (trimmed.length === 0 || this.patterns.includes(trimmed)) {
      return;
    }
    this.patterns.push(trimmed);
    this.matcher.add(trimmed);
  }
}
