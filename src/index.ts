/**
 * @fileoverview Engine process entry point.
 *
 * Opens the mail store, wires the Gmail adapter and the credential-backed
 * token provider, and runs sync loops for the configured accounts until
 * SIGINT/SIGTERM.
 */

import config, { validateConfig } from './config.js';

// Fail fast if critical configuration is missing
validateConfig();

import { createMailEngine } from './engine.js';
import { GmailMailboxAdapter } from './domains/mailbox/providers/gmail.js';
import { InMemoryFanout } from './domains/notifications/providers/memory.js';
import { CredentialTokenProvider, getCredentialStore } from './services/credentials/index.js';
import { openDatabase } from './services/store/index.js';
import { createLogger, initObservability } from './utils/observability/index.js';

initObservability();

const log = createLogger({ domain: 'main' });

const db = openDatabase(config.store.sqlitePath);
const tokens = new CredentialTokenProvider(getCredentialStore());
const adapter = new GmailMailboxAdapter(tokens, {
  clientId: config.google.clientId,
  clientSecret: config.google.clientSecret,
});

const engine = createMailEngine({
  db,
  adapter,
  tokens,
  fanout: new InMemoryFanout(),
  options: {
    sync: {
      intervalMs: config.sync.intervalMs,
      backoffBaseMs: config.sync.backoffBaseMs,
      backoffMaxMs: config.sync.backoffMaxMs,
      pageSize: config.sync.pageSize,
      maxPagesPerTick: config.sync.maxPagesPerTick,
      authRecheckMs: config.sync.authRecheckMs,
    },
    trash: config.trash,
    extractor: config.extractor,
  },
});

for (const accountId of config.sync.accounts) {
  engine.registerAccount(accountId);
}

if (config.sync.enabled) {
  engine.start(config.sync.accounts);
} else {
  log.info('sync_disabled');
}

log.info('engine_ready', {
  env: config.nodeEnv,
  accounts: config.sync.accounts.length,
  syncEnabled: config.sync.enabled,
});

let isShuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;
  log.info('shutdown_signal_received', { signal });

  const forceExitTimer = setTimeout(() => {
    log.warn('shutdown_forced', { timeoutMs: 10000 });
    process.exit(1);
  }, 10000);

  try {
    // Stop loops first, waiting for in-flight ticks, then close the database
    await engine.stop();
    db.close();
    clearTimeout(forceExitTimer);
    process.exit(0);
  } catch (error) {
    log.error('shutdown_failed', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
