/**
 * @fileoverview Sync scheduler runtime.
 *
 * One background loop per account. Each loop runs a reconciliation tick,
 * then waits: the normal interval after success, exponential backoff after
 * a failure, or the auth recheck interval while the account has no valid
 * token. Loops never run two ticks for one account at once; a manual
 * trigger queues behind the running tick.
 */

export * from '../types.js';
export { Reconciler } from '../service/reconcile.js';
export { computeBackoffMs } from '../service/backoff.js';

import type { TokenProvider } from '../../mailbox/types.js';
import type { SyncCursorStore } from '../repo/sqlite.js';
import type { Reconciler } from '../service/reconcile.js';
import { computeBackoffMs } from '../service/backoff.js';
import { AppError, AuthenticationError } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { AccountSyncStatus, SyncOptions, SyncState, TickResult } from '../types.js';

const log = createLogger({ domain: 'sync-scheduler' });

interface AccountLoop {
  accountId: string;
  state: SyncState;
  timer: ReturnType<typeof setTimeout> | null;
  nextRunAt: number | null;
  controller: AbortController;
  inFlight: Promise<void> | null;
}

export interface SyncSchedulerDeps {
  reconciler: Reconciler;
  cursors: SyncCursorStore;
  tokens: TokenProvider;
  now?: () => number;
}

export class SyncScheduler {
  private loops = new Map<string, AccountLoop>();
  private reconciler: Reconciler;
  private cursors: SyncCursorStore;
  private tokens: TokenProvider;
  private options: SyncOptions;
  private now: () => number;
  private stopped = false;

  constructor(deps: SyncSchedulerDeps, options: SyncOptions) {
    this.reconciler = deps.reconciler;
    this.cursors = deps.cursors;
    this.tokens = deps.tokens;
    this.now = deps.now ?? Date.now;
    this.options = options;
  }

  /** Start the background loop for an account. The first tick runs immediately. */
  startAccount(accountId: string): void {
    if (this.loops.has(accountId)) {
      log.debug('sync_loop_already_running', { accountId });
      return;
    }
    this.stopped = false;
    this.cursors.ensure(accountId, this.now());

    const loop: AccountLoop = {
      accountId,
      state: 'idle',
      timer: null,
      nextRunAt: null,
      controller: new AbortController(),
      inFlight: null,
    };
    this.loops.set(accountId, loop);
    log.info('sync_loop_started', { accountId, intervalMs: this.options.intervalMs });
    this.schedule(loop, 0);
  }

  /** Stop one account's loop, aborting its tick between pages. */
  async stopAccount(accountId: string): Promise<void> {
    const loop = this.loops.get(accountId);
    if (!loop) return;
    this.loops.delete(accountId);
    await this.halt(loop);
    log.info('sync_loop_stopped', { accountId });
  }

  /** Stop every loop and wait for in-flight ticks. */
  async stop(): Promise<void> {
    this.stopped = true;
    const loops = [...this.loops.values()];
    this.loops.clear();
    await Promise.all(loops.map(loop => this.halt(loop)));
    log.info('sync_scheduler_stopped', { accounts: loops.length });
  }

  /**
   * Run a tick now, outside the loop's timing. Waits for a running tick
   * first. Errors go to the caller; a success clears a backoff.
   */
  async triggerSync(accountId: string): Promise<TickResult> {
    const result = await this.reconciler.runTick(accountId);
    const loop = this.loops.get(accountId);
    if (loop && (loop.state === 'backoff' || loop.state === 'unauthenticated')) {
      loop.state = 'idle';
      this.schedule(loop, this.options.intervalMs);
    }
    return result;
  }

  getStatus(accountId: string): AccountSyncStatus {
    const loop = this.loops.get(accountId);
    return {
      accountId,
      state: loop?.state ?? 'stopped',
      cursor: this.cursors.get(accountId),
      nextRunAt: loop?.nextRunAt ?? null,
    };
  }

  accounts(): string[] {
    return [...this.loops.keys()];
  }

  private async halt(loop: AccountLoop): Promise<void> {
    if (loop.timer) {
      clearTimeout(loop.timer);
      loop.timer = null;
    }
    loop.nextRunAt = null;
    loop.controller.abort();
    if (loop.inFlight) {
      await loop.inFlight;
    }
    loop.state = 'stopped';
  }

  private isActive(loop: AccountLoop): boolean {
    return !this.stopped && this.loops.get(loop.accountId) === loop;
  }

  private schedule(loop: AccountLoop, delayMs: number): void {
    if (!this.isActive(loop)) return;
    if (loop.timer) clearTimeout(loop.timer);

    loop.nextRunAt = this.now() + delayMs;
    loop.timer = setTimeout(() => {
      loop.timer = null;
      loop.nextRunAt = null;
      loop.inFlight = this.iterate(loop).finally(() => {
        loop.inFlight = null;
      });
    }, delayMs);
  }

  /** One loop step. Never rejects. */
  private async iterate(loop: AccountLoop): Promise<void> {
    if (loop.state === 'unauthenticated') {
      const resumed = await this.checkToken(loop.accountId);
      if (!resumed) {
        this.schedule(loop, this.options.authRecheckMs);
        return;
      }
      log.info('sync_resumed', { accountId: loop.accountId });
    }

    loop.state = 'syncing';
    try {
      const result = await this.reconciler.runTick(loop.accountId, { signal: loop.controller.signal });
      if (!this.isActive(loop)) return;
      loop.state = 'idle';
      const drainNow = result.hasMore && !result.cancelled;
      this.schedule(loop, drainNow ? 0 : this.options.intervalMs);
    } catch (error) {
      if (!this.isActive(loop)) return;
      if (error instanceof AuthenticationError) {
        await this.suspend(loop);
        return;
      }

      const failures = this.cursors.get(loop.accountId)?.consecutiveFailures ?? 1;
      const delay = computeBackoffMs(failures, this.options.backoffBaseMs, this.options.backoffMaxMs);
      loop.state = 'backoff';
      log.warn('sync_backoff', {
        accountId: loop.accountId,
        failures,
        delayMs: delay,
        code: error instanceof AppError ? error.code : 'INTERNAL',
      });
      this.schedule(loop, delay);
    }
  }

  /** Park the loop until the token provider has a valid token again. */
  private async suspend(loop: AccountLoop): Promise<void> {
    loop.state = 'unauthenticated';
    log.warn('sync_suspended_unauthenticated', { accountId: loop.accountId });
    try {
      await this.tokens.reportAuthFailure?.(loop.accountId);
    } catch (error) {
      log.error('report_auth_failure_failed', {
        accountId: loop.accountId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    this.schedule(loop, this.options.authRecheckMs);
  }

  private async checkToken(accountId: string): Promise<boolean> {
    try {
      const token = await this.tokens.getValidToken(accountId);
      return token.status === 'ok';
    } catch (error) {
      log.warn('token_check_failed', {
        accountId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
