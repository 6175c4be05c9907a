/**
 * @fileoverview SQLite store for action items.
 *
 * email_id is a plain column with no foreign key: purging an email
 * detaches its action items instead of deleting them.
 */

import crypto from 'crypto';
import type Database from 'better-sqlite3';
import { NotFoundError } from '../../../utils/errors.js';
import { normalizeTitle } from '../service/normalize.js';
import {
  isActionPriority,
  isActionStatus,
  type ActionItem,
  type ActionItemListOptions,
  type ActionItemPatch,
  type ActionStatus,
  type CreateActionItemInput,
} from '../types.js';

type ActionItemRow = {
  id: string;
  account_id: string;
  email_id: string | null;
  title: string;
  normalized_title: string;
  description: string | null;
  due_date: number | null;
  priority: string;
  status: string;
  auto_created: number;
  source_quote: string | null;
  created_at: number;
  completed_at: number | null;
  updated_at: number;
};

function rowToActionItem(row: ActionItemRow): ActionItem {
  return {
    id: row.id,
    accountId: row.account_id,
    emailId: row.email_id,
    title: row.title,
    normalizedTitle: row.normalized_title,
    description: row.description,
    dueDate: row.due_date,
    priority: isActionPriority(row.priority) ? row.priority : 'medium',
    status: isActionStatus(row.status) ? row.status : 'pending',
    autoCreated: row.auto_created === 1,
    sourceQuote: row.source_quote,
    createdAt: row.created_at,
    completedAt: row.completed_at,
    updatedAt: row.updated_at,
  };
}

/** Priority rank for ORDER BY (urgent first). */
const PRIORITY_RANK_SQL = `CASE priority
  WHEN 'urgent' THEN 0 WHEN 'high' THEN 1 WHEN 'medium' THEN 2 ELSE 3 END`;

export class ActionItemStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS action_items (
        id                TEXT PRIMARY KEY,
        account_id        TEXT NOT NULL,
        email_id          TEXT,
        title             TEXT NOT NULL,
        normalized_title  TEXT NOT NULL,
        description       TEXT,
        due_date          INTEGER,
        priority          TEXT NOT NULL DEFAULT 'medium',
        status            TEXT NOT NULL DEFAULT 'pending',
        auto_created      INTEGER NOT NULL DEFAULT 0,
        source_quote      TEXT,
        created_at        INTEGER NOT NULL,
        completed_at      INTEGER,
        updated_at        INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_action_items_account
        ON action_items(account_id, status);
      CREATE INDEX IF NOT EXISTS idx_action_items_email
        ON action_items(email_id, normalized_title);
    `);
  }

  create(input: CreateActionItemInput, now: number = Date.now()): ActionItem {
    const item: ActionItem = {
      id: crypto.randomUUID(),
      accountId: input.accountId,
      emailId: input.emailId ?? null,
      title: input.title.trim(),
      normalizedTitle: normalizeTitle(input.title),
      description: input.description ?? null,
      dueDate: input.dueDate ?? null,
      priority: input.priority ?? 'medium',
      status: 'pending',
      autoCreated: input.autoCreated ?? false,
      sourceQuote: input.sourceQuote ?? null,
      createdAt: now,
      completedAt: null,
      updatedAt: now,
    };

    this.db
      .prepare(
        `INSERT INTO action_items (id, account_id, email_id, title, normalized_title, description,
         due_date, priority, status, auto_created, source_quote, created_at, completed_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        item.id,
        item.accountId,
        item.emailId,
        item.title,
        item.normalizedTitle,
        item.description,
        item.dueDate,
        item.priority,
        item.status,
        item.autoCreated ? 1 : 0,
        item.sourceQuote,
        item.createdAt,
        item.completedAt,
        item.updatedAt
      );

    return item;
  }

  getById(id: string): ActionItem | null {
    const row = this.db
      .prepare('SELECT * FROM action_items WHERE id = ?')
      .get(id) as ActionItemRow | undefined;
    return row ? rowToActionItem(row) : null;
  }

  /** Urgent first, then earliest due date (undated last), then oldest. */
  list(accountId: string, options: ActionItemListOptions = {}): ActionItem[] {
    const where = ['account_id = ?'];
    const values: (string | number)[] = [accountId];

    if (options.status) {
      where.push('status = ?');
      values.push(options.status);
    }
    if (options.emailId) {
      where.push('email_id = ?');
      values.push(options.emailId);
    }

    const rows = this.db
      .prepare(
        `SELECT * FROM action_items WHERE ${where.join(' AND ')}
         ORDER BY ${PRIORITY_RANK_SQL}, due_date IS NULL, due_date ASC, created_at ASC
         LIMIT ?`
      )
      .all(...values, options.limit ?? 200) as ActionItemRow[];
    return rows.map(rowToActionItem);
  }

  /** A not-completed item on the same email with the same normalized title, if any. */
  findOpenByEmailAndTitle(emailId: string, normalizedTitle: string): ActionItem | null {
    const row = this.db
      .prepare(
        `SELECT * FROM action_items
         WHERE email_id = ? AND normalized_title = ? AND status != 'completed'
         LIMIT 1`
      )
      .get(emailId, normalizedTitle) as ActionItemRow | undefined;
    return row ? rowToActionItem(row) : null;
  }

  setStatus(id: string, status: ActionStatus, now: number = Date.now()): ActionItem {
    const completedAt = status === 'completed' ? now : null;
    const result = this.db
      .prepare('UPDATE action_items SET status = ?, completed_at = ?, updated_at = ? WHERE id = ?')
      .run(status, completedAt, now, id);
    if (result.changes === 0) {
      throw new NotFoundError('ActionItem', id);
    }
    const item = this.getById(id);
    if (!item) throw new NotFoundError('ActionItem', id);
    return item;
  }

  /** Rewrite the editable fields; the normalized title follows the title. */
  update(id: string, patch: ActionItemPatch, now: number = Date.now()): ActionItem {
    const current = this.getById(id);
    if (!current) throw new NotFoundError('ActionItem', id);

    const title = patch.title !== undefined ? patch.title.trim() : current.title;
    const next: ActionItem = {
      ...current,
      title,
      normalizedTitle: normalizeTitle(title),
      description: patch.description !== undefined ? patch.description : current.description,
      dueDate: patch.dueDate !== undefined ? patch.dueDate : current.dueDate,
      priority: patch.priority ?? current.priority,
      updatedAt: now,
    };

    this.db
      .prepare(
        `UPDATE action_items
         SET title = ?, normalized_title = ?, description = ?, due_date = ?, priority = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(next.title, next.normalizedTitle, next.description, next.dueDate, next.priority, now, id);
    return next;
  }

  /** Clear the email back-reference on every item pointing at the email. Returns affected ids. */
  detachEmail(emailId: string, now: number = Date.now()): string[] {
    const rows = this.db
      .prepare('SELECT id FROM action_items WHERE email_id = ?')
      .all(emailId) as { id: string }[];
    this.db
      .prepare('UPDATE action_items SET email_id = NULL, updated_at = ? WHERE email_id = ?')
      .run(now, emailId);
    return rows.map(r => r.id);
  }

  delete(id: string): boolean {
    const result = this.db.prepare('DELETE FROM action_items WHERE id = ?').run(id);
    return result.changes > 0;
  }
}
