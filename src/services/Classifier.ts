import { access, constants } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import type { Stats } from 'fs';
import type { RuleTreeRef } from '../models/RuleTree.js';
import type { FolderAnalyzer } from './FolderAnalyzer.js';
import type { IgnoreSet } from './IgnoreSet.js';
import { FolderHandlingMode, SkipReason, TRANSIENT_SUFFIXES } from '../types/index.js';
import { lstatOrNull, pathExists } from '../lib/fs.js';
import { createChildLogger } from '../lib/logger.js';

export type Classification =
  | { action: 'move'; category: string; subcategory: string | null; isFolder: boolean }
  | { action: 'skip'; reason: SkipReason };

export interface ClassifierOptions {
  folderHandlingMode: FolderHandlingMode;
}

function skip(reason: SkipReason): Classification {
  return { action: 'skip', reason };
}

/**
 * Decides where a settled path should go. Read-only.
 */
export class Classifier {
  private folderHandlingMode: FolderHandlingMode;

  constructor(
    private rules: RuleTreeRef,
    private analyzer: FolderAnalyzer,
    private ignoreSet: IgnoreSet,
    options: ClassifierOptions
  ) {
    this.folderHandlingMode = options.folderHandlingMode;
  }

  setFolderHandlingMode(mode: FolderHandlingMode): void {
    this.folderHandlingMode = mode;
  }

  getFolderHandlingMode(): FolderHandlingMode {
    return this.folderHandlingMode;
  }

  /**
   * @param path Absolute path of a settled entry
   * @param root Watched root the entry lives in
   */
  async classify(path: string, root: string): Promise<Classification> {
    const logger = createChildLogger({ filePath: path });
    // One snapshot for the whole call; a reload mid-way does not mix trees
    const tree = this.rules.current();

    if (this.ignoreSet.matches(path, root)) {
      return skip(SkipReason.IGNORED);
    }

    let stats: Stats | null;
    try {
      stats = await lstatOrNull(path);
    } catch (error) {
      logger.debug({ error }, 'Cannot stat path');
      return skip(SkipReason.UNREADABLE);
    }

    if (!stats) {
      return skip(SkipReason.MISSING);
    }
    if (stats.isSymbolicLink()) {
      return skip(SkipReason.SYMLINK);
    }

    if (stats.isDirectory()) {
      const isRootChild = resolve(dirname(path)) === resolve(root);
      if (isRootChild && tree.isManagedFolderName(basename(path))) {
        return skip(SkipReason.CATEGORY_FOLDER);
      }

      switch (this.folderHandlingMode) {
        case FolderHandlingMode.IGNORE:
          return skip(SkipReason.FOLDER_IGNORED);

        case FolderHandlingMode.MOVE_TO_OTHERS:
          return { action: 'move', category: tree.defaultCategory, subcategory: null, isFolder: true };

        case FolderHandlingMode.SMART_SCAN:
        default: {
          const analysis = await this.analyzer.analyze(path, tree);
          logger.debug({ category: analysis.category, sampled: analysis.sampled }, 'Smart scan result');
          return { action: 'move', category: analysis.category, subcategory: null, isFolder: true };
        }
      }
    }

    if (!stats.isFile()) {
      return skip(SkipReason.UNREADABLE);
    }

    try {
      await access(path, constants.R_OK);
    } catch (error) {
      logger.debug({ error }, 'File is not readable');
      return skip(SkipReason.UNREADABLE);
    }

    if (stats.size === 0 && (await this.hasTransientSibling(path))) {
      return skip(SkipReason.TRANSIENT_ARTIFACT);
    }

    const match = tree.categoryFor(basename(path));
    return { action: 'move', category: match.category, subcategory: match.subcategory, isFolder: false };
  }

  /**
   * Browsers create an empty placeholder under the final name while the real
   * data still lands in "<name>.crdownload" and the like
   */
  private async hasTransientSibling(path: string): Promise<boolean> {
    const directory = dirname(path);
    const name = basename(path);
    for (const suffix of TRANSIENT_SUFFIXES) {
      if (await pathExists(join(directory, name + suffix))) {
        return true;
      }
    }
    return false;
  }
}
