export interface MoveRecord {
  /** Where the entry was before the move */
  readonly sourcePath: string;

  /** Where it is now (after conflict resolution) */
  readonly destinationPath: string;

  readonly category: string;

  readonly subcategory: string | null;

  /** Milliseconds since epoch */
  readonly timestamp: number;

  readonly isFolder: boolean;

  /** Watched root the move happened in */
  readonly root: string;
}

export function createMoveRecord(
  sourcePath: string,
  destinationPath: string,
  category: string,
  subcategory: string | null,
  isFolder: boolean,
  root: string
): MoveRecord {
  return Object.freeze({
    sourcePath,
    destinationPath,
    category,
    subcategory,
    timestamp: Date.now(),
    isFolder,
    root,
  });
}
