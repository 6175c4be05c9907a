/**
 * @fileoverview Credential store factory.
 *
 * Returns the credential store selected by configuration.
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import type { CredentialStore } from './types.js';
import { SqliteCredentialStore } from './sqlite.js';
import { MemoryCredentialStore } from './memory.js';

export type { CredentialStore, StoredCredential } from './types.js';
export { CredentialTokenProvider } from './token-provider.js';
export { MemoryCredentialStore } from './memory.js';

let instance: CredentialStore | null = null;

/**
 * Get the credential store instance.
 *
 * - 'sqlite': SQLite with encryption (default)
 * - 'memory': In-memory store (tests and local runs)
 */
export function getCredentialStore(): CredentialStore {
  if (instance) {
    return instance;
  }

  const { provider, sqlitePath, encryptionKey } = config.credentials;
  switch (provider) {
    case 'sqlite':
      if (!encryptionKey) {
        throw new Error('CREDENTIAL_ENCRYPTION_KEY is required for sqlite credential store');
      }
      instance = new SqliteCredentialStore(sqlitePath, encryptionKey);
      break;
    case 'memory':
      instance = new MemoryCredentialStore();
      break;
    default:
      throw new Error(
        `Invalid CREDENTIAL_STORE_PROVIDER: ${provider}. Expected 'sqlite' or 'memory'.`
      );
  }

  return instance;
}

/**
 * Reset the credential store instance.
 * Useful for tests to get a fresh store.
 */
export function resetCredentialStore(): void {
  instance = null;
}
