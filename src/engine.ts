/**
 * @fileoverview Mail engine facade.
 *
 * Wires the local store, the sync scheduler, the trash lifecycle and the
 * command interpreter around one database, one remote adapter and one
 * fanout. The request layer only talks to this object.
 */

import type Database from 'better-sqlite3';
import { ActionExtractor } from './domains/actions/service/extractor.js';
import { ActionItemService } from './domains/actions/service/items.js';
import type { ActionItem, ActionItemPatch, ActionStatus } from './domains/actions/types.js';
import { CommandInterpreter } from './domains/commands/service/interpreter.js';
import type { IntentOutcome, RawIntent } from './domains/commands/types.js';
import { HuddleService } from './domains/huddles/service/index.js';
import type { Huddle, HuddleStatus } from './domains/huddles/types.js';
import type { Email, EmailFilter, MailboxAdapter, TokenProvider } from './domains/mailbox/types.js';
import { Notifier } from './domains/notifications/service/notifier.js';
import type { NotificationFanout } from './domains/notifications/types.js';
import { Reconciler, SyncScheduler, type AccountSyncStatus, type SyncOptions, type TickResult } from './domains/sync/runtime/index.js';
import { TrashLifecycle, startTrashSweeper } from './domains/trash/runtime/index.js';
import { createLocalStore, type LocalStore } from './services/store/index.js';
import { AppError, UnsupportedIntentError } from './utils/errors.js';
import { createLogger, createRequestId, withLogContext } from './utils/observability/index.js';
import type { Poller } from './utils/poller.js';

const log = createLogger({ domain: 'engine' });

/** User-facing text for an intent outside the vocabulary. */
export const UNSUPPORTED_INTENT_MESSAGE = "I can't do that yet.";

export interface MailEngineOptions {
  sync: SyncOptions;
  trash: { retentionDays: number; sweepIntervalMs: number };
  extractor: { timezone: string; urgencyThreshold: number };
}

export interface MailEngineDeps {
  db: Database.Database;
  adapter: MailboxAdapter;
  tokens: TokenProvider;
  fanout: NotificationFanout;
  options: MailEngineOptions;
  now?: () => number;
}

export interface MailEngine {
  store: LocalStore;
  scheduler: SyncScheduler;
  trash: TrashLifecycle;
  huddles: HuddleService;
  actions: ActionItemService;
  /** Create the account's sync cursor and, if the engine is running, start its loop */
  registerAccount(accountId: string): void;
  triggerSync(accountId: string): Promise<TickResult>;
  executeIntent(accountId: string, intent: RawIntent): Promise<IntentOutcome>;
  listInbox(accountId: string, limit?: number): Email[];
  listTrash(accountId: string, limit?: number): Email[];
  searchEmails(accountId: string, filter: EmailFilter): Email[];
  getEmail(accountId: string, emailId: string): Email | null;
  listActionItems(accountId: string, status?: ActionStatus): ActionItem[];
  updateActionItem(accountId: string, id: string, patch: ActionItemPatch): Promise<ActionItem>;
  completeActionItem(accountId: string, id: string): Promise<ActionItem>;
  dismissActionItem(accountId: string, id: string): Promise<ActionItem>;
  deleteActionItem(accountId: string, id: string): Promise<void>;
  listHuddles(accountId: string, status?: HuddleStatus): Huddle[];
  getSyncState(accountId: string): AccountSyncStatus;
  /** Operator action: drop the cursor so the next tick lists the mailbox from scratch */
  resetSyncCursor(accountId: string): void;
  /** Start sync loops for the given accounts (and every registered one) plus the trash sweeper */
  start(accountIds?: string[]): void;
  stop(): Promise<void>;
}

export function createMailEngine(deps: MailEngineDeps): MailEngine {
  const now = deps.now ?? Date.now;
  const { options } = deps;

  const store = createLocalStore(deps.db);
  const notifier = new Notifier(deps.fanout);
  const extractor = new ActionExtractor(store.actionItems, { timezone: options.extractor.timezone });

  const reconciler = new Reconciler(
    { store, adapter: deps.adapter, tokens: deps.tokens, extractor, notifier, now },
    {
      pageSize: options.sync.pageSize,
      maxPagesPerTick: options.sync.maxPagesPerTick,
      urgencyThreshold: options.extractor.urgencyThreshold,
    }
  );
  const scheduler = new SyncScheduler(
    { reconciler, cursors: store.cursors, tokens: deps.tokens, now },
    options.sync
  );
  const trash = new TrashLifecycle({ store, adapter: deps.adapter, notifier, now });
  const huddles = new HuddleService(store, now);
  const actions = new ActionItemService(store, notifier, now);
  const interpreter = new CommandInterpreter({
    store,
    actions,
    adapter: deps.adapter,
    trash,
    huddles,
    notifier,
    now,
  });

  let sweeper: Poller | null = null;
  let running = false;

  return {
    store,
    scheduler,
    trash,
    huddles,
    actions,

    registerAccount(accountId: string): void {
      store.cursors.ensure(accountId, now());
      if (running) scheduler.startAccount(accountId);
    },

    triggerSync(accountId: string): Promise<TickResult> {
      store.cursors.ensure(accountId, now());
      return withLogContext({ requestId: createRequestId('sync') }, () => scheduler.triggerSync(accountId));
    },

    executeIntent(accountId: string, intent: RawIntent): Promise<IntentOutcome> {
      return withLogContext({ requestId: createRequestId('intent') }, async (): Promise<IntentOutcome> => {
        try {
          const result = await interpreter.execute(accountId, intent);
          return { status: 'ok', intent: intent.name, result };
        } catch (error) {
          if (!(error instanceof AppError)) throw error;

          log.warn('intent_rejected', { intent: intent.name, code: error.code, error: error.message });
          return {
            status: 'rejected',
            intent: intent.name,
            code: error.code,
            message: error instanceof UnsupportedIntentError ? UNSUPPORTED_INTENT_MESSAGE : error.message,
          };
        }
      });
    },

    listInbox(accountId: string, limit?: number): Email[] {
      return store.emails.listInbox(accountId, limit);
    },

    listTrash(accountId: string, limit?: number): Email[] {
      return store.emails.listTrash(accountId, limit);
    },

    searchEmails(accountId: string, filter: EmailFilter): Email[] {
      return store.emails.search(accountId, filter);
    },

    getEmail(accountId: string, emailId: string): Email | null {
      return store.emails.getForAccount(accountId, emailId);
    },

    listActionItems(accountId: string, status?: ActionStatus): ActionItem[] {
      return store.actionItems.list(accountId, { status });
    },

    updateActionItem(accountId: string, id: string, patch: ActionItemPatch): Promise<ActionItem> {
      return actions.update(accountId, id, patch);
    },

    completeActionItem(accountId: string, id: string): Promise<ActionItem> {
      return actions.complete(accountId, id);
    },

    dismissActionItem(accountId: string, id: string): Promise<ActionItem> {
      return actions.dismiss(accountId, id);
    },

    deleteActionItem(accountId: string, id: string): Promise<void> {
      return actions.delete(accountId, id);
    },

    listHuddles(accountId: string, status?: HuddleStatus): Huddle[] {
      return huddles.listForUser(accountId, status);
    },

    getSyncState(accountId: string): AccountSyncStatus {
      return scheduler.getStatus(accountId);
    },

    resetSyncCursor(accountId: string): void {
      store.cursors.reset(accountId, now());
      log.warn('sync_cursor_reset', { accountId });
    },

    start(accountIds: string[] = []): void {
      if (running) return;
      running = true;

      const accounts = new Set([...store.cursors.listAccounts(), ...accountIds]);
      for (const accountId of accounts) {
        scheduler.startAccount(accountId);
      }
      sweeper = startTrashSweeper(trash, {
        intervalMs: options.trash.sweepIntervalMs,
        retentionDays: options.trash.retentionDays,
      });
      log.info('engine_started', { accounts: accounts.size });
    },

    async stop(): Promise<void> {
      if (!running) return;
      running = false;
      await Promise.all([scheduler.stop(), sweeper?.stop()]);
      sweeper = null;
      log.info('engine_stopped');
    },
  };
}
