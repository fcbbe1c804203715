// ============================================================================
// Enums
// ============================================================================

export enum FsEventKind {
  CREATE = 'create',
  MODIFY = 'modify',
  DELETE = 'delete',
  RENAME = 'rename'
}

export enum FolderHandlingMode {
  SMART_SCAN = 'smart_scan',
  MOVE_TO_OTHERS = 'move_to_others',
  IGNORE = 'ignore'
}

export enum DecisionState {
  ACTIVE = 'active',
  UNDONE_BY_USER = 'undone_by_user',
  IGNORED = 'ignored'
}

export enum WatcherState {
  IDLE = 'idle',
  WATCHING = 'watching',
  DEGRADED = 'degraded',
  STOPPED = 'stopped'
}

export enum SkipReason {
  IGNORED = 'ignored',
  MISSING = 'missing',
  UNREADABLE = 'unreadable',
  SYMLINK = 'symlink',
  CATEGORY_FOLDER = 'category-folder',
  FOLDER_IGNORED = 'folder-ignored',
  TRANSIENT_ARTIFACT = 'transient-artifact',
  RESTORED_BY_USER = 'restored-by-user'
}

export enum IgnoreEntryKind {
  PATH = 'path',
  PATTERN = 'pattern'
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface WatchConfig {
  targetFolders: string[];
  healthCheckInterval: number;
  recoveryInitialDelay: number;
  recoveryMaxDelay: number;
}

export interface EngineConfig {
  cooldownMs: number;
  folderHandlingMode: FolderHandlingMode;
  decisionRetentionCount: number;
  sampleCapPerFolder: number;
  maxConcurrency: number;
  ignorePatterns: string[];
  notificationBufferSize: number;
  moveRecordBufferSize: number;
}

export interface StorageConfig {
  rulesPath: string;
  stateDbPath: string;
}

export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  pretty: boolean;
}

export interface AppConfig {
  watch: WatchConfig;
  engine: EngineConfig;
  storage: StorageConfig;
  logging: LoggingConfig;
}

// ============================================================================
// Naming conventions
// ============================================================================

export const DEFAULT_CATEGORY = 'Others';

/** Suffixes browsers and download managers put on files still being written. */
export const TRANSIENT_SUFFIXES = [
  '.crdownload',
  '.part',
  '.partial',
  '.download',
  '.opdownload',
  '.tmp',
  '.!ut',
  '.!qb'
] as const;

export const SYSTEM_FILE_NAMES = [
  'desktop.ini',
  'thumbs.db',
  '.ds_store',
  'icon\r'
] as const;

// ============================================================================
// Type Guards
// ============================================================================

export function isTransientName(fileName: string): boolean {
  const lowerName = fileName.toLowerCase();
  return TRANSIENT_SUFFIXES.some(suffix => lowerName.endsWith(suffix));
}

export function isHiddenName(fileName: string): boolean {
  return fileName.startsWith('.');
}

export function isSystemName(fileName: string): boolean {
  const lowerName = fileName.toLowerCase();
  // Office writes "~$name.docx" lock files beside open documents
  return lowerName.startsWith('~$') || SYSTEM_FILE_NAMES.some(name => name === lowerName);
}

export function isFolderHandlingMode(value: string): value is FolderHandlingMode {
  return Object.values(FolderHandlingMode).some(mode => mode === value);
}
