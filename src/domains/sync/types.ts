/**
 * @fileoverview Sync scheduler type definitions.
 */

/** Persisted per-account reconciliation position. */
export interface SyncCursor {
  accountId: string;
  /** Opaque provider position; null until the first page commits */
  position: string | null;
  lastSuccessAt: number | null;
  consecutiveFailures: number;
  lastError: string | null;
  updatedAt: number;
}

export type SyncState = 'idle' | 'syncing' | 'backoff' | 'unauthenticated' | 'stopped';

/** Outcome of one reconciliation tick. */
export interface TickResult {
  accountId: string;
  pages: number;
  created: number;
  updated: number;
  skipped: number;
  /** Outward trash calls that reached the provider during this tick */
  trashPushed: number;
  extractionPasses: number;
  actionItemsCreated: number;
  cursor: string | null;
  /** Provider still had pages when the tick stopped */
  hasMore: boolean;
  cancelled: boolean;
}

/** What callers can observe about an account's scheduling. */
export interface AccountSyncStatus {
  accountId: string;
  state: SyncState;
  cursor: SyncCursor | null;
  /** When the next tick is due, if one is scheduled */
  nextRunAt: number | null;
}

export interface SyncOptions {
  intervalMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  pageSize: number;
  maxPagesPerTick: number;
  authRecheckMs: number;
}
