import { lstat } from 'fs/promises';
import type { Stats } from 'fs';
import { sep } from 'path';
import { errnoCode } from './errors.js';

/**
 * lstat that maps "nothing there" to null and rethrows everything else
 */
export async function lstatOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await lstat(filePath);
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return null;
    }
    throw error;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  return (await lstatOrNull(filePath)) !== null;
}

export function isPermissionError(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'EACCES' || code === 'EPERM';
}

export function isCrossDeviceError(error: unknown): boolean {
  return errnoCode(error) === 'EXDEV';
}

export function isMissingError(error: unknown): boolean {
  return errnoCode(error) === 'ENOENT';
}

/**
 * True when `candidate` is `base` itself or lies beneath it
 */
export function isSameOrInside(candidate: string, base: string): boolean {
  if (candidate === base) {
    return true;
  }
  const prefix = base.endsWith(sep) ? base : base + sep;
  return candidate.startsWith(prefix);
}
