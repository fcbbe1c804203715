import { basename, dirname, extname, join } from 'path';
import { ConflictExhaustedError } from '../lib/errors.js';
import { pathExists } from '../lib/fs.js';

export const DEFAULT_MAX_ATTEMPTS = 1000;

/**
 * Build the n-th alternative name: "photo.jpg" -> "photo (n).jpg". Folders
 * have no extension: "my.project" -> "my.project (n)".
 * @param fileName Base name
 * @param attempt Counter, starting at 1
 */
export function candidateName(fileName: string, attempt: number, isDirectory: boolean = false): string {
  if (isDirectory) {
    return `${fileName} (${attempt})`;
  }
  const extension = extname(fileName);
  const stem = extension ? fileName.slice(0, -extension.length) : fileName;
  return `${stem} (${attempt})${extension}`;
}

/**
 * Return a path that is free at the time of the check.
 *
 * Nothing is created or reserved; callers serialize resolve-then-rename per
 * destination directory.
 *
 * @param destinationPath Desired destination
 * @param maxAttempts Numbered alternatives to try before giving up
 * @param isDirectory Number the whole name instead of the stem
 * @throws ConflictExhaustedError when every alternative is taken
 */
export async function resolveConflict(
  destinationPath: string,
  maxAttempts: number = DEFAULT_MAX_ATTEMPTS,
  isDirectory: boolean = false
): Promise<string> {
  if (!(await pathExists(destinationPath))) {
    return destinationPath;
  }

  const parent = dirname(destinationPath);
  const fileName = basename(destinationPath);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const candidate = join(parent, candidateName(fileName, attempt, isDirectory));
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }

  throw new ConflictExhaustedError(destinationPath, maxAttempts);
}
