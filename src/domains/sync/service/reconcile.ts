/**
 * @fileoverview One reconciliation tick for one account.
 *
 * A tick pushes pending local trashes outward, then pulls remote pages.
 * Each page commits in a single transaction together with its extraction
 * passes and the cursor advance; a page that throws leaves nothing behind
 * and is fetched again next tick.
 */

import { scoreUrgency } from '../../actions/service/urgency.js';
import type { ActionExtractor } from '../../actions/service/extractor.js';
import { mergeRemoteRecord, remoteToNewEmail } from '../../mailbox/service/merge.js';
import type { Email, FetchPage, MailboxAdapter, TokenProvider } from '../../mailbox/types.js';
import type { Notifier } from '../../notifications/service/notifier.js';
import type { ChangeEvent } from '../../notifications/types.js';
import type { LocalStore } from '../../../services/store/index.js';
import { AppError, AuthenticationError, ProviderError, isRemoteNotFound } from '../../../utils/errors.js';
import { KeyedMutex } from '../../../utils/keyed-mutex.js';
import { createLogger, createRunId, withLogContext } from '../../../utils/observability/index.js';
import type { TickResult } from '../types.js';

const log = createLogger({ domain: 'sync' });

export interface ReconcilerDeps {
  store: LocalStore;
  adapter: MailboxAdapter;
  tokens: TokenProvider;
  extractor: ActionExtractor;
  notifier: Notifier;
  now?: () => number;
}

export interface ReconcilerOptions {
  pageSize: number;
  maxPagesPerTick: number;
  urgencyThreshold: number;
}

export interface RunTickOptions {
  /** Checked between pages; a page in progress always completes or rolls back */
  signal?: AbortSignal;
}

interface PageOutcome {
  created: number;
  updated: number;
  skipped: number;
  extractionPasses: number;
  actionItemsCreated: number;
  events: ChangeEvent[];
}

function urgencyFields(email: Pick<Email, 'sender' | 'senderName' | 'subject' | 'body' | 'snippet'>, threshold: number) {
  const urgency = scoreUrgency(email, threshold);
  return { isUrgent: urgency.isUrgent, urgencyScore: urgency.score, urgencyReason: urgency.reason };
}

export class Reconciler {
  private store: LocalStore;
  private adapter: MailboxAdapter;
  private tokens: TokenProvider;
  private extractor: ActionExtractor;
  private notifier: Notifier;
  private now: () => number;
  private options: ReconcilerOptions;
  private accountLocks = new KeyedMutex();

  constructor(deps: ReconcilerDeps, options: ReconcilerOptions) {
    this.store = deps.store;
    this.adapter = deps.adapter;
    this.tokens = deps.tokens;
    this.extractor = deps.extractor;
    this.notifier = deps.notifier;
    this.now = deps.now ?? Date.now;
    this.options = options;
  }

  /** True while a tick for the account runs or waits to run. */
  isSyncing(accountId: string): boolean {
    return this.accountLocks.isLocked(accountId);
  }

  /**
   * Run one tick. Ticks for the same account never overlap: a second
   * caller waits for the running tick, then runs its own.
   */
  async runTick(accountId: string, options: RunTickOptions = {}): Promise<TickResult> {
    return this.accountLocks.runExclusive(accountId, () =>
      withLogContext({ runId: createRunId('sync') }, async () => {
        try {
          const result = await this.tick(accountId, options.signal);
          this.store.cursors.recordSuccess(accountId, this.now());
          log.info('sync_tick_completed', { ...result });
          return result;
        } catch (error) {
          if (!(error instanceof AuthenticationError)) {
            const failures = this.store.cursors.recordFailure(
              accountId,
              error instanceof Error ? error.message : String(error),
              this.now()
            );
            log.warn('sync_tick_failed', {
              accountId,
              failures,
              code: error instanceof AppError ? error.code : 'INTERNAL',
              error: error instanceof Error ? error.message : String(error),
            });
          }
          throw error;
        }
      })
    );
  }

  private async tick(accountId: string, signal: AbortSignal | undefined): Promise<TickResult> {
    const token = await this.tokens.getValidToken(accountId);
    if (token.status !== 'ok') {
      throw new AuthenticationError(accountId);
    }

    const cursor = this.store.cursors.ensure(accountId, this.now());
    const result: TickResult = {
      accountId,
      pages: 0,
      created: 0,
      updated: 0,
      skipped: 0,
      trashPushed: await this.pushPendingTrash(accountId),
      extractionPasses: 0,
      actionItemsCreated: 0,
      cursor: cursor.position,
      hasMore: false,
      cancelled: false,
    };

    let position = cursor.position;
    while (result.pages < this.options.maxPagesPerTick) {
      if (signal?.aborted) {
        result.cancelled = true;
        log.info('sync_tick_cancelled', { accountId, pages: result.pages });
        break;
      }

      const page = await this.adapter.fetchSince(accountId, position, this.options.pageSize);
      const outcome = await this.applyPage(accountId, page);
      await this.notifier.publishAll(accountId, outcome.events);

      result.pages++;
      result.created += outcome.created;
      result.updated += outcome.updated;
      result.skipped += outcome.skipped;
      result.extractionPasses += outcome.extractionPasses;
      result.actionItemsCreated += outcome.actionItemsCreated;
      position = page.nextCursor;
      result.cursor = position;
      result.hasMore = page.hasMore;

      if (!page.hasMore) break;
    }

    return result;
  }

  /**
   * Push local trashes the provider has not seen yet.
   * Transient and auth failures end the tick. Any other rejection keeps
   * the email pending for the next tick, unless the message is gone remotely.
   */
  private async pushPendingTrash(accountId: string): Promise<number> {
    let pushed = 0;
    for (const pending of this.store.emails.listTrashPending(accountId)) {
      await this.store.withEmailLock(pending.id, async () => {
        const current = this.store.emails.getById(pending.id);
        if (!current || !current.trashPending || current.deletedAt === null) return;

        try {
          await this.adapter.trash(accountId, current.remoteId);
          pushed++;
        } catch (error) {
          if (!(error instanceof ProviderError)) throw error;
          if (!isRemoteNotFound(error)) {
            log.warn('trash_push_rejected', { emailId: current.id, code: error.code, error: error.message });
            return;
          }
          log.info('trash_push_message_gone', { emailId: current.id });
        }
        this.store.emails.update(current.id, { trashPending: false }, undefined, this.now());
      });
    }
    return pushed;
  }

  /**
   * Lock every local row the page touches, then commit it. A row created
   * while the locks were being taken (a sent copy, say) means the lock
   * set is short, so it is taken again with the new row included.
   */
  private async applyPage(accountId: string, page: FetchPage): Promise<PageOutcome> {
    const remoteIds = page.records.map(r => r.remoteId);
    let lockIds = [...this.store.emails.findIdsByRemoteIds(accountId, remoteIds).values()];

    for (;;) {
      const locked = new Set(lockIds);
      const outcome = await this.store.withEmailLocks(lockIds, () => {
        const current = [...this.store.emails.findIdsByRemoteIds(accountId, remoteIds).values()];
        if (current.some(id => !locked.has(id))) {
          lockIds = current;
          return null;
        }
        return this.commitPage(accountId, page);
      });
      if (outcome) return outcome;
      log.debug('sync_page_relock', { accountId, rows: lockIds.length });
    }
  }

  /** Upsert one page, run extraction, advance the cursor: all in one transaction. */
  private commitPage(accountId: string, page: FetchPage): PageOutcome {
    return this.store.transaction(() => {
      const now = this.now();
      const outcome: PageOutcome = {
        created: 0,
        updated: 0,
        skipped: 0,
        extractionPasses: 0,
        actionItemsCreated: 0,
        events: [],
      };

      const extract = (email: Email): void => {
        const items = this.extractor.run(email, now);
        outcome.extractionPasses++;
        outcome.actionItemsCreated += items.length;
        for (const item of items) {
          outcome.events.push({ type: 'ActionItemCreated', actionItemId: item.id });
        }
      };

      for (const record of page.records) {
        if (!record.remoteId || this.store.emails.isRemoteIdPurged(accountId, record.remoteId)) {
          outcome.skipped++;
          continue;
        }

        const existing = this.store.emails.getByRemoteId(accountId, record.remoteId);
        if (!existing) {
          const draft = remoteToNewEmail(accountId, record, now);
          const email = this.store.emails.insert(
            { ...draft, ...urgencyFields(draft, this.options.urgencyThreshold) },
            now
          );
          outcome.created++;
          outcome.events.push({ type: 'EmailCreated', emailId: email.id });
          if (email.deletedAt === null) extract(email);
          continue;
        }

        const merge = mergeRemoteRecord(existing, record, now);
        if (!merge.changed) continue;

        const patch = merge.contentChanged
          ? { ...merge.patch, ...urgencyFields({ ...existing, ...record }, this.options.urgencyThreshold) }
          : merge.patch;
        const email = this.store.emails.update(existing.id, patch, undefined, now);
        outcome.updated++;
        outcome.events.push({ type: 'EmailUpdated', emailId: email.id });
        if (merge.contentChanged || merge.restored) extract(email);
      }

      this.store.cursors.advance(accountId, page.nextCursor, now);
      return outcome;
    });
  }
}
