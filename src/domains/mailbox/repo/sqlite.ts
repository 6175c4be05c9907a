/**
 * @fileoverview SQLite store for mirrored emails.
 *
 * One row per (account, remote message id). Soft-deleted rows keep their
 * deleted_at timestamp until purge; purged rows leave a tombstone in
 * purged_emails so the purge stays terminal and sync never re-ingests them.
 */

import crypto from 'crypto';
import type Database from 'better-sqlite3';
import { ConflictError, NotFoundError } from '../../../utils/errors.js';
import type { Email, EmailFilter, EmailPatch, NewEmail } from '../types.js';

type EmailRow = {
  id: string;
  account_id: string;
  remote_id: string;
  thread_id: string | null;
  message_id: string | null;
  sender: string;
  sender_name: string | null;
  recipients: string;
  subject: string;
  body: string;
  snippet: string;
  received_at: number;
  is_read: number;
  is_starred: number;
  labels: string;
  deleted_at: number | null;
  trash_pending: number;
  sync_version: number;
  is_urgent: number;
  urgency_score: number;
  urgency_reason: string | null;
  created_at: number;
  updated_at: number;
};

export type PurgedEmail = {
  id: string;
  accountId: string;
  remoteId: string;
  purgedAt: number;
};

function parseStringArray(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

function rowToEmail(row: EmailRow): Email {
  return {
    id: row.id,
    accountId: row.account_id,
    remoteId: row.remote_id,
    threadId: row.thread_id,
    messageId: row.message_id,
    sender: row.sender,
    senderName: row.sender_name,
    recipients: parseStringArray(row.recipients),
    subject: row.subject,
    body: row.body,
    snippet: row.snippet,
    receivedAt: row.received_at,
    isRead: row.is_read === 1,
    isStarred: row.is_starred === 1,
    labels: parseStringArray(row.labels),
    deletedAt: row.deleted_at,
    trashPending: row.trash_pending === 1,
    syncVersion: row.sync_version,
    isUrgent: row.is_urgent === 1,
    urgencyScore: row.urgency_score,
    urgencyReason: row.urgency_reason,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

type SqlValue = string | number | null;

/** Translate a patch into SET clauses, in a fixed column order. */
function patchToAssignments(patch: EmailPatch): { sets: string[]; values: SqlValue[] } {
  const sets: string[] = [];
  const values: SqlValue[] = [];
  const put = (column: string, value: SqlValue): void => {
    sets.push(`${column} = ?`);
    values.push(value);
  };

  if (patch.threadId !== undefined) put('thread_id', patch.threadId);
  if (patch.messageId !== undefined) put('message_id', patch.messageId);
  if (patch.sender !== undefined) put('sender', patch.sender);
  if (patch.senderName !== undefined) put('sender_name', patch.senderName);
  if (patch.recipients !== undefined) put('recipients', JSON.stringify(patch.recipients));
  if (patch.subject !== undefined) put('subject', patch.subject);
  if (patch.body !== undefined) put('body', patch.body);
  if (patch.snippet !== undefined) put('snippet', patch.snippet);
  if (patch.receivedAt !== undefined) put('received_at', patch.receivedAt);
  if (patch.isRead !== undefined) put('is_read', patch.isRead ? 1 : 0);
  if (patch.isStarred !== undefined) put('is_starred', patch.isStarred ? 1 : 0);
  if (patch.labels !== undefined) put('labels', JSON.stringify(patch.labels));
  if (patch.deletedAt !== undefined) put('deleted_at', patch.deletedAt);
  if (patch.trashPending !== undefined) put('trash_pending', patch.trashPending ? 1 : 0);
  if (patch.isUrgent !== undefined) put('is_urgent', patch.isUrgent ? 1 : 0);
  if (patch.urgencyScore !== undefined) put('urgency_score', patch.urgencyScore);
  if (patch.urgencyReason !== undefined) put('urgency_reason', patch.urgencyReason);

  return { sets, values };
}

/** WHERE clauses shared by search and batch target resolution. */
function buildFilterClauses(accountId: string, filter: EmailFilter): { where: string[]; values: (string | number)[] } {
  const where: string[] = ['account_id = ?'];
  const values: (string | number)[] = [accountId];

  where.push(filter.inTrash ? 'deleted_at IS NOT NULL' : 'deleted_at IS NULL');

  if (filter.query) {
    const like = `%${escapeLike(filter.query)}%`;
    where.push("(subject LIKE ? ESCAPE '\\' OR body LIKE ? ESCAPE '\\' OR sender LIKE ? ESCAPE '\\' OR sender_name LIKE ? ESCAPE '\\')");
    values.push(like, like, like, like);
  }
  if (filter.from) {
    const like = `%${escapeLike(filter.from)}%`;
    where.push("(sender LIKE ? ESCAPE '\\' OR sender_name LIKE ? ESCAPE '\\')");
    values.push(like, like);
  }
  if (filter.isRead !== undefined) {
    where.push('is_read = ?');
    values.push(filter.isRead ? 1 : 0);
  }
  if (filter.isStarred !== undefined) {
    where.push('is_starred = ?');
    values.push(filter.isStarred ? 1 : 0);
  }
  if (filter.label) {
    where.push('EXISTS (SELECT 1 FROM json_each(emails.labels) WHERE json_each.value = ?)');
    values.push(filter.label);
  }
  if (filter.receivedAfter !== undefined) {
    where.push('received_at >= ?');
    values.push(filter.receivedAfter);
  }
  if (filter.receivedBefore !== undefined) {
    where.push('received_at < ?');
    values.push(filter.receivedBefore);
  }

  return { where, values };
}

export class EmailStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS emails (
        id              TEXT PRIMARY KEY,
        account_id      TEXT NOT NULL,
        remote_id       TEXT NOT NULL,
        thread_id       TEXT,
        message_id      TEXT,
        sender          TEXT NOT NULL,
        sender_name     TEXT,
        recipients      TEXT NOT NULL DEFAULT '[]',
        subject         TEXT NOT NULL DEFAULT '',
        body            TEXT NOT NULL DEFAULT '',
        snippet         TEXT NOT NULL DEFAULT '',
        received_at     INTEGER NOT NULL,
        is_read         INTEGER NOT NULL DEFAULT 0,
        is_starred      INTEGER NOT NULL DEFAULT 0,
        labels          TEXT NOT NULL DEFAULT '[]',
        deleted_at      INTEGER,
        trash_pending   INTEGER NOT NULL DEFAULT 0,
        sync_version    INTEGER NOT NULL DEFAULT 0,
        is_urgent       INTEGER NOT NULL DEFAULT 0,
        urgency_score   INTEGER NOT NULL DEFAULT 0,
        urgency_reason  TEXT,
        created_at      INTEGER NOT NULL,
        updated_at      INTEGER NOT NULL,
        UNIQUE(account_id, remote_id)
      );

      CREATE INDEX IF NOT EXISTS idx_emails_inbox
        ON emails(account_id, deleted_at, received_at);

      CREATE TABLE IF NOT EXISTS purged_emails (
        id          TEXT PRIMARY KEY,
        account_id  TEXT NOT NULL,
        remote_id   TEXT NOT NULL,
        purged_at   INTEGER NOT NULL,
        UNIQUE(account_id, remote_id)
      );
    `);

    // Migration: add message_id column if it doesn't exist
    const columns = this.db.prepare(`PRAGMA table_info(emails)`).all() as Array<{ name: string }>;
    if (!columns.some((col) => col.name === 'message_id')) {
      this.db.exec(`ALTER TABLE emails ADD COLUMN message_id TEXT`);
    }
  }

  getById(id: string): Email | null {
    const row = this.db
      .prepare('SELECT * FROM emails WHERE id = ?')
      .get(id) as EmailRow | undefined;
    return row ? rowToEmail(row) : null;
  }

  /** Get an email and check it belongs to the account. */
  getForAccount(accountId: string, id: string): Email | null {
    const email = this.getById(id);
    return email && email.accountId === accountId ? email : null;
  }

  getByRemoteId(accountId: string, remoteId: string): Email | null {
    const row = this.db
      .prepare('SELECT * FROM emails WHERE account_id = ? AND remote_id = ?')
      .get(accountId, remoteId) as EmailRow | undefined;
    return row ? rowToEmail(row) : null;
  }

  /** Map remote ids to existing local ids (for locking a sync page before commit). */
  findIdsByRemoteIds(accountId: string, remoteIds: string[]): Map<string, string> {
    const result = new Map<string, string>();
    if (remoteIds.length === 0) return result;

    const stmt = this.db.prepare('SELECT id FROM emails WHERE account_id = ? AND remote_id = ?');
    for (const remoteId of remoteIds) {
      const row = stmt.get(accountId, remoteId) as { id: string } | undefined;
      if (row) result.set(remoteId, row.id);
    }
    return result;
  }

  insert(input: NewEmail, now: number = Date.now()): Email {
    const id = crypto.randomUUID();
    const syncVersion = Math.max(1, input.syncVersion ?? 1);

    this.db
      .prepare(
        `INSERT INTO emails (id, account_id, remote_id, thread_id, message_id, sender, sender_name, recipients,
         subject, body, snippet, received_at, is_read, is_starred, labels, deleted_at, trash_pending,
         sync_version, is_urgent, urgency_score, urgency_reason, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        input.accountId,
        input.remoteId,
        input.threadId,
        input.messageId,
        input.sender,
        input.senderName,
        JSON.stringify(input.recipients),
        input.subject,
        input.body,
        input.snippet,
        input.receivedAt,
        input.isRead ? 1 : 0,
        input.isStarred ? 1 : 0,
        JSON.stringify(input.labels),
        input.deletedAt,
        input.trashPending ? 1 : 0,
        syncVersion,
        input.isUrgent ? 1 : 0,
        input.urgencyScore,
        input.urgencyReason,
        now,
        now
      );

    return { ...input, id, syncVersion, createdAt: now, updatedAt: now };
  }

  /**
   * Apply a patch. With expectedVersion, the write only lands if the row
   * still carries that sync_version; otherwise ConflictError.
   * Every write bumps sync_version (or jumps to a higher provider version).
   */
  update(id: string, patch: EmailPatch, expectedVersion?: number, now: number = Date.now()): Email {
    const { sets, values } = patchToAssignments(patch);

    sets.push('sync_version = MAX(sync_version + 1, ?)');
    values.push(patch.providerVersion ?? 0);
    sets.push('updated_at = ?');
    values.push(now);

    let sql = `UPDATE emails SET ${sets.join(', ')} WHERE id = ?`;
    values.push(id);
    if (expectedVersion !== undefined) {
      sql += ' AND sync_version = ?';
      values.push(expectedVersion);
    }

    const result = this.db.prepare(sql).run(...values);
    if (result.changes === 0) {
      if (!this.getById(id)) throw new NotFoundError('Email', id);
      throw new ConflictError('Email', id);
    }

    const updated = this.getById(id);
    if (!updated) throw new NotFoundError('Email', id);
    return updated;
  }

  /** Hard-delete an email and leave a tombstone. */
  purge(email: Email, now: number = Date.now()): void {
    this.db.prepare('DELETE FROM emails WHERE id = ?').run(email.id);
    this.db
      .prepare(
        `INSERT OR REPLACE INTO purged_emails (id, account_id, remote_id, purged_at)
         VALUES (?, ?, ?, ?)`
      )
      .run(email.id, email.accountId, email.remoteId, now);
  }

  getPurged(id: string): PurgedEmail | null {
    const row = this.db
      .prepare('SELECT * FROM purged_emails WHERE id = ?')
      .get(id) as { id: string; account_id: string; remote_id: string; purged_at: number } | undefined;
    return row
      ? { id: row.id, accountId: row.account_id, remoteId: row.remote_id, purgedAt: row.purged_at }
      : null;
  }

  isRemoteIdPurged(accountId: string, remoteId: string): boolean {
    const row = this.db
      .prepare('SELECT 1 AS found FROM purged_emails WHERE account_id = ? AND remote_id = ?')
      .get(accountId, remoteId);
    return row !== undefined;
  }

  /** Non-trashed emails, newest first. */
  listInbox(accountId: string, limit = 50): Email[] {
    return this.search(accountId, { limit });
  }

  /** Trashed emails, most recently deleted first. */
  listTrash(accountId: string, limit = 50): Email[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM emails WHERE account_id = ? AND deleted_at IS NOT NULL
         ORDER BY deleted_at DESC LIMIT ?`
      )
      .all(accountId, limit) as EmailRow[];
    return rows.map(rowToEmail);
  }

  /** Evaluate a filter against the current state of the store. */
  search(accountId: string, filter: EmailFilter = {}): Email[] {
    const { where, values } = buildFilterClauses(accountId, filter);
    const limit = filter.limit ?? 500;
    const rows = this.db
      .prepare(
        `SELECT * FROM emails WHERE ${where.join(' AND ')}
         ORDER BY received_at DESC, id ASC LIMIT ?`
      )
      .all(...values, limit) as EmailRow[];
    return rows.map(rowToEmail);
  }

  /**
   * Ids of every email matching the filter, newest first. Unlike search,
   * there is no default cap; filter.limit applies only when set.
   */
  findMatchingIds(accountId: string, filter: EmailFilter = {}): string[] {
    const { where, values } = buildFilterClauses(accountId, filter);
    const sql = `SELECT id FROM emails WHERE ${where.join(' AND ')}
         ORDER BY received_at DESC, id ASC`;
    const rows = filter.limit !== undefined
      ? this.db.prepare(`${sql} LIMIT ?`).all(...values, filter.limit) as Array<{ id: string }>
      : this.db.prepare(sql).all(...values) as Array<{ id: string }>;
    return rows.map(row => row.id);
  }

  /** Trashed emails (any account) deleted strictly before the cutoff. */
  listTrashedBefore(cutoff: number): Email[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM emails WHERE deleted_at IS NOT NULL AND deleted_at < ?
         ORDER BY deleted_at ASC`
      )
      .all(cutoff) as EmailRow[];
    return rows.map(rowToEmail);
  }

  /** Emails trashed locally whose remote trash call has not succeeded yet. */
  listTrashPending(accountId: string): Email[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM emails WHERE account_id = ? AND deleted_at IS NOT NULL AND trash_pending = 1
         ORDER BY deleted_at ASC`
      )
      .all(accountId) as EmailRow[];
    return rows.map(rowToEmail);
  }

  countUnread(accountId: string): number {
    const row = this.db
      .prepare(
        'SELECT COUNT(*) AS count FROM emails WHERE account_id = ? AND deleted_at IS NULL AND is_read = 0'
      )
      .get(accountId) as { count: number };
    return row.count;
  }
}
