/**
 * @fileoverview SQLite store for per-account sync cursors.
 *
 * The position only moves through advance(), which the reconciler calls
 * inside the transaction that commits a page.
 */

import type Database from 'better-sqlite3';
import type { SyncCursor } from '../types.js';

type CursorRow = {
  account_id: string;
  position: string | null;
  last_success_at: number | null;
  consecutive_failures: number;
  last_error: string | null;
  updated_at: number;
};

function rowToCursor(row: CursorRow): SyncCursor {
  return {
    accountId: row.account_id,
    position: row.position,
    lastSuccessAt: row.last_success_at,
    consecutiveFailures: row.consecutive_failures,
    lastError: row.last_error,
    updatedAt: row.updated_at,
  };
}

export class SyncCursorStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sync_cursors (
        account_id            TEXT PRIMARY KEY,
        position              TEXT,
        last_success_at       INTEGER,
        consecutive_failures  INTEGER NOT NULL DEFAULT 0,
        last_error            TEXT,
        updated_at            INTEGER NOT NULL
      );
    `);
  }

  get(accountId: string): SyncCursor | null {
    const row = this.db
      .prepare('SELECT * FROM sync_cursors WHERE account_id = ?')
      .get(accountId) as CursorRow | undefined;
    return row ? rowToCursor(row) : null;
  }

  /** Get the cursor, creating an empty one on first use. */
  ensure(accountId: string, now: number = Date.now()): SyncCursor {
    this.db
      .prepare(
        `INSERT OR IGNORE INTO sync_cursors (account_id, position, consecutive_failures, updated_at)
         VALUES (?, NULL, 0, ?)`
      )
      .run(accountId, now);
    const cursor = this.get(accountId);
    if (!cursor) {
      throw new Error(`Sync cursor missing after insert: ${accountId}`);
    }
    return cursor;
  }

  advance(accountId: string, position: string | null, now: number = Date.now()): void {
    this.db
      .prepare('UPDATE sync_cursors SET position = ?, updated_at = ? WHERE account_id = ?')
      .run(position, now, accountId);
  }

  recordSuccess(accountId: string, now: number = Date.now()): void {
    this.db
      .prepare(
        `UPDATE sync_cursors
         SET last_success_at = ?, consecutive_failures = 0, last_error = NULL, updated_at = ?
         WHERE account_id = ?`
      )
      .run(now, now, accountId);
  }

  /** Increment the failure counter. Returns the new count. */
  recordFailure(accountId: string, error: string, now: number = Date.now()): number {
    this.db
      .prepare(
        `UPDATE sync_cursors
         SET consecutive_failures = consecutive_failures + 1, last_error = ?, updated_at = ?
         WHERE account_id = ?`
      )
      .run(error, now, accountId);
    return this.get(accountId)?.consecutiveFailures ?? 0;
  }

  /** Operator action: forget the position so the next tick starts a full listing. */
  reset(accountId: string, now: number = Date.now()): void {
    this.db
      .prepare(
        `UPDATE sync_cursors
         SET position = NULL, consecutive_failures = 0, last_error = NULL, updated_at = ?
         WHERE account_id = ?`
      )
      .run(now, accountId);
  }

  listAccounts(): string[] {
    const rows = this.db
      .prepare('SELECT account_id FROM sync_cursors ORDER BY account_id ASC')
      .all() as { account_id: string }[];
    return rows.map(r => r.account_id);
  }
}
