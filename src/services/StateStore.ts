import Database from 'better-sqlite3';
import type { Decision, DecisionRow } from '../models/Decision.js';
import { rowToDecision } from '../models/Decision.js';
import { DecisionState, IgnoreEntryKind } from '../types/index.js';
import { getLogger } from '../lib/logger.js';

export interface StoredIgnoreEntry {
  kind: IgnoreEntryKind;
  value: string;
  createdAt: number;
}

interface IgnoreEntryRow {
  kind: string;
  value: string;
  created_at: number;
}

/**
 * SQLite persistence for folder decisions and user ignore entries
 */
export class StateStore {
  private db: Database.Database;
  private logger = getLogger();

  // Prepared statements
  private insertDecisionStmt!: Database.Statement;
  private updateDecisionStateStmt!: Database.Statement;
  private selectDecisionStmt!: Database.Statement;
  private selectRecentDecisionsStmt!: Database.Statement;
  private selectUndoneByOriginStmt!: Database.Statement;
  private pruneDecisionsStmt!: Database.Statement;
  private insertIgnoreStmt!: Database.Statement;
  private selectIgnoreStmt!: Database.Statement;

  constructor(dbPath: string) {
    this.logger.info({ dbPath }, 'Opening state store');

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');

    this.createSchema();
    this.prepareStatements();
  }

  private createSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS decisions (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT UNIQUE NOT NULL,
        original_path TEXT NOT NULL,
        new_path TEXT NOT NULL,
        category TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        state TEXT NOT NULL CHECK(state IN ('active', 'undone_by_user', 'ignored'))
      );

      CREATE INDEX IF NOT EXISTS idx_decisions_timestamp ON decisions(timestamp);

      CREATE TABLE IF NOT EXISTS ignore_entries (
        kind TEXT NOT NULL CHECK(kind IN ('path', 'pattern')),
        value TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (kind, value)
      );
    `);
  }

  private prepareStatements(): void {
    this.insertDecisionStmt = this.db.prepare(`
      INSERT INTO decisions (id, original_path, new_path, category, timestamp, state)
      VALUES (@id, @originalPath, @newPath, @category, @timestamp, @state)
    `);

    this.updateDecisionStateStmt = this.db.prepare(`
      UPDATE decisions SET state = @state WHERE id = @id
    `);

    this.selectDecisionStmt = this.db.prepare(`
      SELECT id, original_path, new_path, category, timestamp, state
      FROM decisions WHERE id = ?
    `);

    this.selectRecentDecisionsStmt = this.db.prepare(`
      SELECT id, original_path, new_path, category, timestamp, state
      FROM decisions ORDER BY timestamp DESC, seq DESC LIMIT ?
    `);

    this.selectUndoneByOriginStmt = this.db.prepare(`
      SELECT 1 AS found FROM decisions
      WHERE original_path = ? AND state = 'undone_by_user'
      LIMIT 1
    `);

    // Oldest first: everything outside the newest N rows goes
    this.pruneDecisionsStmt = this.db.prepare(`
      DELETE FROM decisions WHERE seq NOT IN (
        SELECT seq FROM decisions ORDER BY timestamp DESC, seq DESC LIMIT ?
      )
    `);

    this.insertIgnoreStmt = this.db.prepare(`
      INSERT OR IGNORE INTO ignore_entries (kind, value, created_at)
      VALUES (@kind, @value, @createdAt)
    `);

    this.selectIgnoreStmt = this.db.prepare(`
      SELECT kind, value, created_at FROM ignore_entries ORDER BY created_at ASC, rowid ASC
    `);
  }

  insertDecision(decision: Decision): void {
    this.insertDecisionStmt.run({
      id: decision.id,
      originalPath: decision.originalPath,
      newPath: decision.newPath,
      category: decision.category,
      timestamp: decision.timestamp,
      state: decision.state,
    });
  }

  updateDecisionState(id: string, state: DecisionState): void {
    this.updateDecisionStateStmt.run({ id, state });
  }

  getDecision(id: string): Decision | null {
    const row = this.selectDecisionStmt.get(id) as DecisionRow | undefined;
    return row ? rowToDecision(row) : null;
  }

  /**
   * Newest first
   */
  listDecisions(limit: number): Decision[] {
    const rows = this.selectRecentDecisionsStmt.all(limit) as DecisionRow[];
    return rows.map(rowToDecision);
  }

  /**
   * True when a folder was moved away from `originalPath` and the user undid it
   */
  hasUndoneDecisionFor(originalPath: string): boolean {
    return this.selectUndoneByOriginStmt.get(originalPath) !== undefined;
  }

  /**
   * Keep only the newest `keep` decisions
   * @returns Number of discarded decisions
   */
  pruneDecisions(keep: number): number {
    const result = this.pruneDecisionsStmt.run(keep);
    if (result.changes > 0) {
      this.logger.debug({ discarded: result.changes, keep }, 'Pruned old decisions');
    }
    return result.changes;
  }

  addIgnoreEntry(kind: IgnoreEntryKind, value: string): boolean {
    const result = this.insertIgnoreStmt.run({ kind, value, createdAt: Date.now() });
    return result.changes > 0;
  }

  listIgnoreEntries(): StoredIgnoreEntry[] {
    const rows = this.selectIgnoreStmt.all() as IgnoreEntryRow[];
    return rows.map(row => ({
      kind: row.kind === IgnoreEntryKind.PATTERN ? IgnoreEntryKind.PATTERN : IgnoreEntryKind.PATH,
      value: row.value,
      createdAt: row.created_at,
    }));
  }

  close(): void {
    this.db.close();
    this.logger.info('State store closed');
  }
}
