/**
 * @fileoverview SQLite credential store with AES-256-GCM encryption.
 *
 * Tokens are encrypted at rest using the CREDENTIAL_ENCRYPTION_KEY.
 * Each credential is encrypted with a unique IV.
 */

import Database from 'better-sqlite3';
import crypto from 'crypto';
import path from 'path';
import fs from 'fs';
import { createLogger } from '../../utils/observability/index.js';
import type { CredentialStore, StoredCredential } from './types.js';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;

const log = createLogger({ domain: 'credentials' });

type CredentialRow = {
  encrypted_data: Buffer;
  iv: Buffer;
  auth_tag: Buffer;
};

function parseCredential(json: string): StoredCredential | null {
  const value: unknown = JSON.parse(json);
  if (!value || typeof value !== 'object') return null;
  if (!('accessToken' in value) || typeof value.accessToken !== 'string') return null;
  if (!('refreshToken' in value) || typeof value.refreshToken !== 'string') return null;
  if (!('expiresAt' in value) || typeof value.expiresAt !== 'number') return null;
  return {
    accessToken: value.accessToken,
    refreshToken: value.refreshToken,
    expiresAt: value.expiresAt,
  };
}

export class SqliteCredentialStore implements CredentialStore {
  private db: Database.Database;
  private encryptionKey: Buffer;

  /**
   * @param dbPath Path to SQLite database file (':memory:' for tests)
   * @param encryptionKey 32-byte hex string for AES-256 encryption
   */
  constructor(dbPath: string, encryptionKey: string) {
    if (!/^[0-9a-fA-F]{64}$/.test(encryptionKey)) {
      throw new Error(
        'CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string (32 bytes)'
      );
    }
    this.encryptionKey = Buffer.from(encryptionKey, 'hex');

    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS account_credentials (
        account_id TEXT NOT NULL,
        provider TEXT NOT NULL,
        encrypted_data BLOB NOT NULL,
        iv BLOB NOT NULL,
        auth_tag BLOB NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (account_id, provider)
      )
    `);
  }

  private encrypt(data: string): { encrypted: Buffer; iv: Buffer; authTag: Buffer } {
    const iv = crypto.randomBytes(IV_LENGTH);
    const cipher = crypto.createCipheriv(ALGORITHM, this.encryptionKey, iv);
    const encrypted = Buffer.concat([cipher.update(data, 'utf8'), cipher.final()]);
    return { encrypted, iv, authTag: cipher.getAuthTag() };
  }

  private decrypt(row: CredentialRow): string {
    const decipher = crypto.createDecipheriv(ALGORITHM, this.encryptionKey, row.iv);
    decipher.setAuthTag(row.auth_tag);
    return Buffer.concat([decipher.update(row.encrypted_data), decipher.final()]).toString('utf8');
  }

  async get(accountId: string, provider: string): Promise<StoredCredential | null> {
    const row = this.db
      .prepare(
        `SELECT encrypted_data, iv, auth_tag FROM account_credentials
         WHERE account_id = ? AND provider = ?`
      )
      .get(accountId.toLowerCase(), provider) as CredentialRow | undefined;

    if (!row) {
      return null;
    }

    try {
      return parseCredential(this.decrypt(row));
    } catch (err) {
      // Corrupted row or rotated key
      log.warn('credential_decrypt_failed', {
        accountId,
        provider,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  async set(accountId: string, provider: string, credential: StoredCredential): Promise<void> {
    const { encrypted, iv, authTag } = this.encrypt(JSON.stringify(credential));
    const now = Date.now();

    this.db
      .prepare(
        `INSERT INTO account_credentials (account_id, provider, encrypted_data, iv, auth_tag, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (account_id, provider) DO UPDATE SET
           encrypted_data = excluded.encrypted_data,
           iv = excluded.iv,
           auth_tag = excluded.auth_tag,
           updated_at = excluded.updated_at`
      )
      .run(accountId.toLowerCase(), provider, encrypted, iv, authTag, now, now);
  }

  async delete(accountId: string, provider: string): Promise<void> {
    this.db
      .prepare('DELETE FROM account_credentials WHERE account_id = ? AND provider = ?')
      .run(accountId.toLowerCase(), provider);
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}
