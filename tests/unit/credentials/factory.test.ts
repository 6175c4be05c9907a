import { afterEach, describe, expect, it, vi } from 'vitest';

async function importFactoryWith(credentials: Record<string, string | undefined>) {
  vi.resetModules();
  vi.doMock('../../../src/config.js', () => ({
    default: { credentials },
  }));
  return import('../../../src/services/credentials/index.js');
}

describe('Credential Store Factory', () => {
  afterEach(() => {
    vi.doUnmock('../../../src/config.js');
    vi.resetModules();
  });

  it('throws for invalid CREDENTIAL_STORE_PROVIDER values', async () => {
    const { getCredentialStore } = await importFactoryWith({
      provider: 'invalid-provider',
      sqlitePath: './data/test-credentials.db',
      encryptionKey: '0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef',
    });

    expect(() => getCredentialStore()).toThrow(
      "Invalid CREDENTIAL_STORE_PROVIDER: invalid-provider. Expected 'sqlite' or 'memory'."
    );
  });

  it('requires an encryption key for the sqlite store', async () => {
    const { getCredentialStore } = await importFactoryWith({
      provider: 'sqlite',
      sqlitePath: ':memory:',
      encryptionKey: undefined,
    });

    expect(() => getCredentialStore()).toThrow('CREDENTIAL_ENCRYPTION_KEY is required for sqlite credential store');
  });

  it('returns the same memory store until reset', async () => {
    const { getCredentialStore, resetCredentialStore, MemoryCredentialStore } = await importFactoryWith({
      provider: 'memory',
      sqlitePath: ':memory:',
      encryptionKey: undefined,
    });

    const first = getCredentialStore();
    expect(first).toBeInstanceOf(MemoryCredentialStore);
    expect(getCredentialStore()).toBe(first);

    resetCredentialStore();
    expect(getCredentialStore()).not.toBe(first);
  });
});
