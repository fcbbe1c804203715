import { readdir, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import { join } from 'path';
import type { RuleTree } from '../models/RuleTree.js';
import { isHiddenName } from '../types/index.js';
import { getLogger } from '../lib/logger.js';

export interface CategoryTally {
  category: string;
  count: number;
  totalSize: number;
}

export interface FolderAnalysis {
  /** Winning category, or the tree's default when nothing was counted */
  category: string;

  /** Files successfully sampled and counted */
  sampled: number;

  /** Directories listed, bounded by the sample cap as well */
  directoriesRead: number;

  /** Sorted best first */
  tallies: CategoryTally[];
}

/**
 * Plurality by count; ties go to the larger total size, then alphabetical
 */
export function compareTallies(a: CategoryTally, b: CategoryTally): number {
  if (a.count !== b.count) {
    return b.count - a.count;
  }
  if (a.totalSize !== b.totalSize) {
    return b.totalSize - a.totalSize;
  }
  return a.category < b.category ? -1 : a.category > b.category ? 1 : 0;
}

/**
 * Infers a folder's dominant category from a bounded sample of the files
 * inside it. Never writes to the filesystem.
 */
export class FolderAnalyzer {
  private logger = getLogger();

  constructor(private sampleCap: number) {
    if (!Number.isInteger(sampleCap) || sampleCap < 1) {
      throw new RangeError(`Sample cap must be a positive integer, got: ${sampleCap}`);
    }
  }

  async analyze(folderPath: string, tree: RuleTree): Promise<FolderAnalysis> {
    const tallies = new Map<string, CategoryTally>();
    const pending: string[] = [folderPath];
    let sampled = 0;
    let directoriesRead = 0;

    // Breadth-first so shallow files are sampled before deep ones. A tree of
    // mostly empty folders stops after sampleCap listings.
    while (pending.length > 0 && sampled < this.sampleCap && directoriesRead < this.sampleCap) {
      const directory = pending.shift();
      if (directory === undefined) {
        break;
      }
      directoriesRead++;

      let entries: Dirent[];
      try {
        entries = await readdir(directory, { withFileTypes: true });
      } catch (error) {
        this.logger.debug({ directory, error }, 'Skipping unreadable directory during analysis');
        continue;
      }

      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const entry of entries) {
        if (sampled >= this.sampleCap) {
          break;
        }
        if (isHiddenName(entry.name) || entry.isSymbolicLink()) {
          continue;
        }

        const entryPath = join(directory, entry.name);

        if (entry.isDirectory()) {
          pending.push(entryPath);
          continue;
        }
        if (!entry.isFile()) {
          continue;
        }

        let size: number;
        try {
          size = (await stat(entryPath)).size;
        } catch (error) {
          this.logger.debug({ entryPath, error }, 'Skipping unreadable file during analysis');
          continue;
        }

        const { category } = tree.categoryFor(entry.name);
        const tally = tallies.get(category) ?? { category, count: 0, totalSize: 0 };
        tally.count++;
        tally.totalSize += size;
        tallies.set(category, tally);
        sampled++;
      }
    }

    const ranked = [...tallies.values()].sort(compareTallies);
    const category = ranked[0]?.category ?? tree.defaultCategory;

    this.logger.debug({ folderPath, sampled, directoriesRead, category }, 'Folder analyzed');
    return { category, sampled, directoriesRead, tallies: ranked };
  }
}
