/**
 * @fileoverview Credential store interface for OAuth tokens.
 *
 * Tokens are stored keyed by account id (the mailbox address) and provider
 * (e.g., 'google'). Implementations handle encryption; callers work with
 * plain credentials. Acquiring and refreshing tokens happens outside the
 * engine, which only reads what is stored here.
 */

/**
 * OAuth credential stored for an account.
 */
export interface StoredCredential {
  accessToken: string;
  refreshToken: string;
  expiresAt: number; // Unix timestamp in milliseconds
}

/**
 * Interface for credential storage backends.
 *
 * Note: Methods return Promises for interface flexibility, but the SQLite
 * implementation (better-sqlite3) is synchronous.
 */
export interface CredentialStore {
  /**
   * Get credentials for an account and provider.
   * @returns Credentials or null if not found.
   */
  get(accountId: string, provider: string): Promise<StoredCredential | null>;

  /**
   * Store credentials for an account and provider.
   * Overwrites existing credentials if present.
   */
  set(accountId: string, provider: string, credential: StoredCredential): Promise<void>;

  /**
   * Delete credentials for an account and provider.
   * No-op if credentials don't exist.
   */
  delete(accountId: string, provider: string): Promise<void>;
}
