/**
 * @fileoverview In-memory credential store.
 *
 * No encryption. Data is lost on process restart. Use for tests and
 * local runs without a credential database.
 */

import type { CredentialStore, StoredCredential } from './types.js';

export class MemoryCredentialStore implements CredentialStore {
  private store = new Map<string, StoredCredential>();

  private key(accountId: string, provider: string): string {
    return `${provider}:${accountId.toLowerCase()}`;
  }

  async get(accountId: string, provider: string): Promise<StoredCredential | null> {
    return this.store.get(this.key(accountId, provider)) ?? null;
  }

  async set(accountId: string, provider: string, credential: StoredCredential): Promise<void> {
    this.store.set(this.key(accountId, provider), { ...credential });
  }

  async delete(accountId: string, provider: string): Promise<void> {
    this.store.delete(this.key(accountId, provider));
  }

  /** Clear all credentials. Useful for test cleanup. */
  clear(): void {
    this.store.clear();
  }
}
