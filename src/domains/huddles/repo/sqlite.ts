/**
 * @fileoverview SQLite store for huddles, their members, messages and shared emails.
 */

import crypto from 'crypto';
import type Database from 'better-sqlite3';
import type {
  Huddle,
  HuddleMember,
  HuddleMessage,
  HuddleRole,
  HuddleSharedEmail,
  HuddleStatus,
} from '../types.js';

type HuddleRow = {
  id: string;
  name: string;
  description: string | null;
  created_by: string;
  status: string;
  created_at: number;
  updated_at: number;
};

type MemberRow = {
  huddle_id: string;
  user_email: string;
  role: string;
  joined_at: number;
};

type MessageRow = {
  id: string;
  huddle_id: string;
  sender_email: string;
  text: string;
  created_at: number;
};

type SharedEmailRow = {
  huddle_id: string;
  email_id: string;
  shared_by: string;
  shared_at: number;
};

function toStatus(value: string): HuddleStatus {
  return value === 'archived' ? 'archived' : 'active';
}

function toRole(value: string): HuddleRole {
  return value === 'owner' || value === 'admin' ? value : 'member';
}

function rowToHuddle(row: HuddleRow): Huddle {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdBy: row.created_by,
    status: toStatus(row.status),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToMember(row: MemberRow): HuddleMember {
  return {
    huddleId: row.huddle_id,
    userEmail: row.user_email,
    role: toRole(row.role),
    joinedAt: row.joined_at,
  };
}

export class HuddleStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS huddles (
        id           TEXT PRIMARY KEY,
        name         TEXT NOT NULL,
        description  TEXT,
        created_by   TEXT NOT NULL,
        status       TEXT NOT NULL DEFAULT 'active',
        created_at   INTEGER NOT NULL,
        updated_at   INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS huddle_members (
        huddle_id   TEXT NOT NULL REFERENCES huddles(id),
        user_email  TEXT NOT NULL,
        role        TEXT NOT NULL DEFAULT 'member',
        joined_at   INTEGER NOT NULL,
        seq         INTEGER PRIMARY KEY AUTOINCREMENT,
        UNIQUE(huddle_id, user_email)
      );

      CREATE TABLE IF NOT EXISTS huddle_messages (
        id            TEXT NOT NULL UNIQUE,
        huddle_id     TEXT NOT NULL REFERENCES huddles(id),
        sender_email  TEXT NOT NULL,
        text          TEXT NOT NULL,
        created_at    INTEGER NOT NULL,
        seq           INTEGER PRIMARY KEY AUTOINCREMENT
      );

      CREATE TABLE IF NOT EXISTS huddle_emails (
        huddle_id  TEXT NOT NULL REFERENCES huddles(id),
        email_id   TEXT NOT NULL,
        shared_by  TEXT NOT NULL,
        shared_at  INTEGER NOT NULL,
        PRIMARY KEY (huddle_id, email_id)
      );

      CREATE INDEX IF NOT EXISTS idx_huddle_members_user
        ON huddle_members(user_email);
    `);
  }

  create(input: { name: string; description: string | null; createdBy: string }, now: number): Huddle {
    const huddle: Huddle = {
      id: crypto.randomUUID(),
      name: input.name,
      description: input.description,
      createdBy: input.createdBy,
      status: 'active',
      createdAt: now,
      updatedAt: now,
    };
    this.db
      .prepare(
        `INSERT INTO huddles (id, name, description, created_by, status, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(huddle.id, huddle.name, huddle.description, huddle.createdBy, huddle.status, now, now);
    return huddle;
  }

  getById(id: string): Huddle | null {
    const row = this.db
      .prepare('SELECT * FROM huddles WHERE id = ?')
      .get(id) as HuddleRow | undefined;
    return row ? rowToHuddle(row) : null;
  }

  setStatus(id: string, status: HuddleStatus, now: number): void {
    this.db
      .prepare('UPDATE huddles SET status = ?, updated_at = ? WHERE id = ?')
      .run(status, now, id);
  }

  touch(id: string, now: number): void {
    this.db.prepare('UPDATE huddles SET updated_at = ? WHERE id = ?').run(now, id);
  }

  /** Huddles the user belongs to, most recently active first. */
  listForUser(userEmail: string, status?: HuddleStatus): Huddle[] {
    const rows = this.db
      .prepare(
        `SELECT h.* FROM huddles h
         JOIN huddle_members m ON m.huddle_id = h.id
         WHERE m.user_email = ? AND (? IS NULL OR h.status = ?)
         ORDER BY h.updated_at DESC, h.id ASC`
      )
      .all(userEmail.toLowerCase(), status ?? null, status ?? null) as HuddleRow[];
    return rows.map(rowToHuddle);
  }

  /** Insert a member unless already present. Returns true when inserted. */
  addMember(huddleId: string, userEmail: string, role: HuddleRole, now: number): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO huddle_members (huddle_id, user_email, role, joined_at)
         VALUES (?, ?, ?, ?)`
      )
      .run(huddleId, userEmail.toLowerCase(), role, now);
    return result.changes > 0;
  }

  removeMember(huddleId: string, userEmail: string): boolean {
    const result = this.db
      .prepare('DELETE FROM huddle_members WHERE huddle_id = ? AND user_email = ?')
      .run(huddleId, userEmail.toLowerCase());
    return result.changes > 0;
  }

  getMember(huddleId: string, userEmail: string): HuddleMember | null {
    const row = this.db
      .prepare('SELECT * FROM huddle_members WHERE huddle_id = ? AND user_email = ?')
      .get(huddleId, userEmail.toLowerCase()) as MemberRow | undefined;
    return row ? rowToMember(row) : null;
  }

  /** Members in join order. */
  listMembers(huddleId: string): HuddleMember[] {
    const rows = this.db
      .prepare('SELECT * FROM huddle_members WHERE huddle_id = ? ORDER BY seq ASC')
      .all(huddleId) as MemberRow[];
    return rows.map(rowToMember);
  }

  addMessage(huddleId: string, senderEmail: string, text: string, now: number): HuddleMessage {
    const message: HuddleMessage = {
      id: crypto.randomUUID(),
      huddleId,
      senderEmail: senderEmail.toLowerCase(),
      text,
      createdAt: now,
    };
    this.db
      .prepare(
        `INSERT INTO huddle_messages (id, huddle_id, sender_email, text, created_at)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(message.id, huddleId, message.senderEmail, text, now);
    return message;
  }

  /** Messages in posting order. */
  listMessages(huddleId: string, limit = 200): HuddleMessage[] {
    const rows = this.db
      .prepare('SELECT * FROM huddle_messages WHERE huddle_id = ? ORDER BY seq ASC LIMIT ?')
      .all(huddleId, limit) as MessageRow[];
    return rows.map(row => ({
      id: row.id,
      huddleId: row.huddle_id,
      senderEmail: row.sender_email,
      text: row.text,
      createdAt: row.created_at,
    }));
  }

  /** Returns false when the email was already shared to the huddle. */
  shareEmail(huddleId: string, emailId: string, sharedBy: string, now: number): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO huddle_emails (huddle_id, email_id, shared_by, shared_at)
         VALUES (?, ?, ?, ?)`
      )
      .run(huddleId, emailId, sharedBy.toLowerCase(), now);
    return result.changes > 0;
  }

  listSharedEmails(huddleId: string): HuddleSharedEmail[] {
    const rows = this.db
      .prepare('SELECT * FROM huddle_emails WHERE huddle_id = ? ORDER BY shared_at ASC, email_id ASC')
      .all(huddleId) as SharedEmailRow[];
    return rows.map(row => ({
      huddleId: row.huddle_id,
      emailId: row.email_id,
      sharedBy: row.shared_by,
      sharedAt: row.shared_at,
    }));
  }
}
