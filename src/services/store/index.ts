/**
 * @fileoverview Local store: one SQLite database holding every entity.
 *
 * Entity stores share the connection. Row locks are a keyed async mutex
 * over `email:<id>` / `action:<id>` keys; a writer takes the lock, does
 * its remote call if any, then commits one synchronous transaction.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { ActionItemStore } from '../../domains/actions/repo/sqlite.js';
import { HuddleStore } from '../../domains/huddles/repo/sqlite.js';
import { EmailStore } from '../../domains/mailbox/repo/sqlite.js';
import { SyncCursorStore } from '../../domains/sync/repo/sqlite.js';
import { KeyedMutex } from '../../utils/keyed-mutex.js';

export interface LocalStore {
  db: Database.Database;
  emails: EmailStore;
  actionItems: ActionItemStore;
  huddles: HuddleStore;
  cursors: SyncCursorStore;
  /** Run fn in one all-or-nothing transaction */
  transaction<T>(fn: () => T): T;
  withEmailLock<T>(emailId: string, fn: () => Promise<T> | T): Promise<T>;
  /** Lock several emails, acquired in sorted order */
  withEmailLocks<T>(emailIds: string[], fn: () => Promise<T> | T): Promise<T>;
  withActionItemLock<T>(actionItemId: string, fn: () => Promise<T> | T): Promise<T>;
}

/**
 * Open (creating if needed) the SQLite database.
 * ':memory:' gives a private in-memory database.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  return db;
}

export function emailLockKey(emailId: string): string {
  return `email:${emailId}`;
}

export function actionItemLockKey(actionItemId: string): string {
  return `action:${actionItemId}`;
}

export function createLocalStore(db: Database.Database, locks: KeyedMutex = new KeyedMutex()): LocalStore {
  return {
    db,
    emails: new EmailStore(db),
    actionItems: new ActionItemStore(db),
    huddles: new HuddleStore(db),
    cursors: new SyncCursorStore(db),

    transaction<T>(fn: () => T): T {
      return db.transaction(fn)();
    },

    withEmailLock<T>(emailId: string, fn: () => Promise<T> | T): Promise<T> {
      return locks.runExclusive(emailLockKey(emailId), fn);
    },

    withEmailLocks<T>(emailIds: string[], fn: () => Promise<T> | T): Promise<T> {
      return locks.runExclusiveMany(emailIds.map(emailLockKey), fn);
    },

    withActionItemLock<T>(actionItemId: string, fn: () => Promise<T> | T): Promise<T> {
      return locks.runExclusive(actionItemLockKey(actionItemId), fn);
    },
  };
}
