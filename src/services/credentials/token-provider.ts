/**
 * @fileoverview Token provider backed by the credential store.
 *
 * Hands out stored access tokens while they are valid. Missing or expired
 * credentials mean the account is unauthenticated until the external
 * token-refresh flow writes fresh ones.
 */

import { createLogger } from '../../utils/observability/index.js';
import type { TokenProvider, TokenResult } from '../../domains/mailbox/types.js';
import type { CredentialStore } from './types.js';

const log = createLogger({ domain: 'token-provider' });

/** Tokens expiring sooner than this are treated as already expired. */
const EXPIRY_SKEW_MS = 60 * 1000;

export class CredentialTokenProvider implements TokenProvider {
  constructor(
    private readonly store: CredentialStore,
    private readonly provider = 'google',
    private readonly now: () => number = Date.now
  ) {}

  async getValidToken(accountId: string): Promise<TokenResult> {
    const credential = await this.store.get(accountId, this.provider);
    if (!credential) {
      return { status: 'unauthenticated' };
    }
    if (credential.expiresAt <= this.now() + EXPIRY_SKEW_MS) {
      return { status: 'unauthenticated' };
    }
    return { status: 'ok', accessToken: credential.accessToken };
  }

  /**
   * The provider rejected the stored access token. Expire it locally so no
   * further calls go out with it; the refresh token stays for the refresh flow.
   */
  async reportAuthFailure(accountId: string): Promise<void> {
    const credential = await this.store.get(accountId, this.provider);
    if (!credential) return;
    await this.store.set(accountId, this.provider, { ...credential, expiresAt: 0 });
    log.warn('access_token_invalidated', { accountId, provider: this.provider });
  }
}
