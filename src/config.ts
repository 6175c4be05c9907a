/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the engine requires.
 *
 * @see .env.example for the variables a deployment sets
 */

import 'dotenv/config';

// ---------------------------------------------------------------------------
// Config helpers: required vs optional
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

/** Read a comma-separated list env var. */
function optionalList(key: string): string[] {
  const raw = process.env[key];
  if (!raw) return [];
  return raw.split(',').map(item => item.trim()).filter(Boolean);
}

/** Return a path that differs between dev and production. */
function dbPath(envKey: string, prodPath: string, devPath: string): string {
  return process.env[envKey] || (process.env.NODE_ENV === 'production' ? prodPath : devPath);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  nodeEnv: optional('NODE_ENV', 'development'),

  /** Local mirror of every account's mailbox */
  store: {
    sqlitePath: dbPath('MAILSTORE_SQLITE_PATH', '/app/data/mailstore.db', './data/mailstore.db'),
  },

  /** Google OAuth client used to talk to Gmail */
  google: {
    clientId: required('GOOGLE_CLIENT_ID'),
    clientSecret: required('GOOGLE_CLIENT_SECRET'),
  },

  /** Credential storage configuration */
  credentials: {
    provider: optional('CREDENTIAL_STORE_PROVIDER', 'sqlite'),
    sqlitePath: dbPath('CREDENTIAL_STORE_SQLITE_PATH', '/app/data/credentials.db', './data/credentials.db'),
    encryptionKey: required('CREDENTIAL_ENCRYPTION_KEY'),
  },

  /** Sync scheduler configuration */
  sync: {
    enabled: optionalBool('SYNC_ENABLED', true),
    intervalMs: optionalInt('SYNC_INTERVAL_MS', 60000),
    backoffBaseMs: optionalInt('SYNC_BACKOFF_BASE_MS', 30000),
    backoffMaxMs: optionalInt('SYNC_BACKOFF_MAX_MS', 600000),
    pageSize: optionalInt('SYNC_PAGE_SIZE', 50),
    maxPagesPerTick: optionalInt('SYNC_MAX_PAGES_PER_TICK', 5),
    authRecheckMs: optionalInt('SYNC_AUTH_RECHECK_MS', 60000),
    accounts: optionalList('SYNC_ACCOUNTS'),
  },

  /** Trash retention */
  trash: {
    retentionDays: optionalInt('TRASH_RETENTION_DAYS', 30),
    sweepIntervalMs: optionalInt('TRASH_SWEEP_INTERVAL_MS', 3600000),
  },

  /** Action extraction and urgency scoring */
  extractor: {
    timezone: optional('EXTRACTOR_TIMEZONE', 'UTC'),
    urgencyThreshold: optionalInt('URGENCY_THRESHOLD', 40),
  },
};

export type AppConfig = typeof config;

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  // Google OAuth (required for the Gmail adapter)
  if (!config.google.clientId) errors.push('GOOGLE_CLIENT_ID is required');
  if (!config.google.clientSecret) errors.push('GOOGLE_CLIENT_SECRET is required');

  if (config.credentials.provider !== 'sqlite' && config.credentials.provider !== 'memory') {
    errors.push(`CREDENTIAL_STORE_PROVIDER must be 'sqlite' or 'memory', got ${config.credentials.provider}`);
  }

  // Encryption key validation
  if (config.credentials.provider === 'sqlite') {
    if (!config.credentials.encryptionKey) {
      errors.push('CREDENTIAL_ENCRYPTION_KEY is required');
    } else if (!/^[0-9a-fA-F]{64}$/.test(config.credentials.encryptionKey)) {
      errors.push('CREDENTIAL_ENCRYPTION_KEY must be a 64-character hex string (32 bytes)');
    }
  }

  // Numeric bounds
  if (config.sync.intervalMs < 1000) {
    errors.push(`SYNC_INTERVAL_MS must be >= 1000, got ${config.sync.intervalMs}`);
  }
  if (config.sync.backoffBaseMs < 1) {
    errors.push(`SYNC_BACKOFF_BASE_MS must be >= 1, got ${config.sync.backoffBaseMs}`);
  }
  if (config.sync.backoffMaxMs < config.sync.backoffBaseMs) {
    errors.push(`SYNC_BACKOFF_MAX_MS must be >= SYNC_BACKOFF_BASE_MS, got ${config.sync.backoffMaxMs}`);
  }
  if (config.sync.pageSize < 1 || config.sync.pageSize > 500) {
    errors.push(`SYNC_PAGE_SIZE must be 1-500, got ${config.sync.pageSize}`);
  }
  if (config.sync.maxPagesPerTick < 1) {
    errors.push(`SYNC_MAX_PAGES_PER_TICK must be >= 1, got ${config.sync.maxPagesPerTick}`);
  }
  if (config.trash.retentionDays < 1) {
    errors.push(`TRASH_RETENTION_DAYS must be >= 1, got ${config.trash.retentionDays}`);
  }
  if (config.trash.sweepIntervalMs < 10000) {
    errors.push(`TRASH_SWEEP_INTERVAL_MS must be >= 10000, got ${config.trash.sweepIntervalMs}`);
  }
  if (config.extractor.urgencyThreshold < 0 || config.extractor.urgencyThreshold > 100) {
    errors.push(`URGENCY_THRESHOLD must be 0-100, got ${config.extractor.urgencyThreshold}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
