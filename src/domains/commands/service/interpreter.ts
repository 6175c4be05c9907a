/**
 * @fileoverview Executes validated intents against the local store and
 * the remote mailbox.
 *
 * Batch intents resolve their targets when they run, then mutate each
 * email on its own under its row lock. One target failing does not undo
 * the others; every target gets its own result.
 */

import type { ActionItemStore } from '../../actions/repo/sqlite.js';
import type { ActionItemService } from '../../actions/service/items.js';
import type { HuddleService } from '../../huddles/service/index.js';
import type {
  Email,
  EmailFilter,
  EmailPatch,
  FlagChange,
  MailboxAdapter,
  OutgoingMessage,
} from '../../mailbox/types.js';
import type { Notifier } from '../../notifications/service/notifier.js';
import type { TrashLifecycle } from '../../trash/service/lifecycle.js';
import type { LocalStore } from '../../../services/store/index.js';
import { ConflictError, NotFoundError, safeExecute } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { IntentResult, TargetResult } from '../types.js';
import {
  parseIntent,
  type CreateActionItemParams,
  type EmailFilterParams,
  type Intent,
  type RawIntent,
  type TargetParams,
} from './schema.js';

const log = createLogger({ domain: 'commands' });

const DEFAULT_SEARCH_LIMIT = 20;

export interface CommandInterpreterDeps {
  store: LocalStore;
  actions: ActionItemService;
  adapter: MailboxAdapter;
  trash: TrashLifecycle;
  huddles: HuddleService;
  notifier: Notifier;
  now?: () => number;
}

type FlagIntentName = 'markRead' | 'markUnread' | 'star' | 'unstar';

const FLAG_CHANGES: Record<FlagIntentName, { flags: FlagChange; patch: EmailPatch }> = {
  markRead: { flags: { read: true }, patch: { isRead: true } },
  markUnread: { flags: { read: false }, patch: { isRead: false } },
  star: { flags: { starred: true }, patch: { isStarred: true } },
  unstar: { flags: { starred: false }, patch: { isStarred: false } },
};

function toEmailFilter(params: EmailFilterParams | undefined, query?: string): EmailFilter {
  const filter: EmailFilter = { ...params };
  if (query) filter.query = query;
  return filter;
}

/** Subject for a reply: "Re: " added once. */
export function replySubject(subject: string): string {
  return /^re:/i.test(subject.trim()) ? subject.trim() : `Re: ${subject.trim()}`;
}

export class CommandInterpreter {
  private store: LocalStore;
  private actionItems: ActionItemStore;
  private actions: ActionItemService;
  private adapter: MailboxAdapter;
  private trash: TrashLifecycle;
  private huddles: HuddleService;
  private notifier: Notifier;
  private now: () => number;

  constructor(deps: CommandInterpreterDeps) {
    this.store = deps.store;
    this.actionItems = deps.store.actionItems;
    this.actions = deps.actions;
    this.adapter = deps.adapter;
    this.trash = deps.trash;
    this.huddles = deps.huddles;
    this.notifier = deps.notifier;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Validate and run an intent.
   * @throws UnsupportedIntentError / IncompleteIntentError before any side effect
   */
  async execute(accountId: string, raw: RawIntent): Promise<IntentResult> {
    const intent = parseIntent(raw);
    log.info('intent_started', { intent: intent.name });
    return this.dispatch(accountId, intent);
  }

  private async dispatch(accountId: string, intent: Intent): Promise<IntentResult> {
    switch (intent.name) {
      case 'search':
        return this.search(accountId, intent.params.query, intent.params.filters);
      case 'markRead':
      case 'markUnread':
      case 'star':
      case 'unstar': {
        const change = FLAG_CHANGES[intent.name];
        return this.runBatch(accountId, intent.name, intent.params, false, (emailId) =>
          this.applyFlags(accountId, emailId, change.flags, change.patch)
        );
      }
      case 'moveToTrash':
        return this.runBatch(accountId, intent.name, intent.params, false, async (emailId) => {
          await this.trash.moveToTrash(accountId, emailId);
        });
      case 'restore':
        return this.runBatch(accountId, intent.name, intent.params, true, async (emailId) => {
          await this.trash.restore(accountId, emailId);
        });
      case 'compose':
        return this.compose(accountId, {
          to: intent.params.to,
          cc: intent.params.cc ?? [],
          subject: intent.params.subject,
          body: intent.params.body,
          threadId: null,
        });
      case 'reply':
        return this.reply(accountId, intent.params.emailId, intent.params.body);
      case 'createActionItem':
        return this.createActionItem(accountId, intent.params);
      case 'completeActionItem':
        return { kind: 'actionItem', item: await this.actions.complete(accountId, intent.params.id) };
      case 'listActionItems':
        return {
          kind: 'actionItems',
          items: this.actionItems.list(accountId, { status: intent.params.status, limit: intent.params.limit }),
        };
      case 'createHuddle':
        return {
          kind: 'huddle',
          huddle: this.huddles.create({
            creator: accountId,
            name: intent.params.name,
            members: intent.params.members,
            description: intent.params.description ?? null,
          }),
        };
    }
  }

  private search(accountId: string, query: string, filters: EmailFilterParams): IntentResult {
    const filter = toEmailFilter(filters, query);
    filter.limit = filter.limit ?? DEFAULT_SEARCH_LIMIT;
    return { kind: 'emails', emails: this.store.emails.search(accountId, filter) };
  }

  /** Target ids for a batch intent, read from the store now. A filter matches every email unless it sets a limit. */
  private resolveTargets(accountId: string, target: TargetParams, inTrash: boolean): string[] {
    if (target.emailId) return [target.emailId];
    if (target.emailIds) return [...new Set(target.emailIds)];

    const filter = toEmailFilter(target.filter);
    filter.inTrash = inTrash;
    return this.store.emails.findMatchingIds(accountId, filter);
  }

  private async runBatch(
    accountId: string,
    operation: string,
    target: TargetParams,
    inTrash: boolean,
    mutate: (emailId: string) => Promise<void>
  ): Promise<IntentResult> {
    const ids = this.resolveTargets(accountId, target, inTrash);
    const results: TargetResult[] = [];

    for (const emailId of ids) {
      const outcome = await safeExecute(() => mutate(emailId), `intent.${operation}`);
      results.push(
        outcome.success
          ? { emailId, ok: true }
          : { emailId, ok: false, error: outcome.error, code: outcome.code }
      );
    }

    const succeeded = results.filter(r => r.ok).length;
    log.info('batch_intent_completed', {
      intent: operation,
      total: results.length,
      succeeded,
      failed: results.length - succeeded,
    });
    return { kind: 'batch', total: results.length, succeeded, failed: results.length - succeeded, results };
  }

  /**
   * Push a flag change to the provider, then write it locally.
   * A concurrent local write is retried once against the fresh row.
   */
  private async applyFlags(accountId: string, emailId: string, flags: FlagChange, patch: EmailPatch): Promise<void> {
    await this.store.withEmailLock(emailId, async () => {
      const email = this.requireEmail(accountId, emailId);
      await this.adapter.applyFlags(accountId, email.remoteId, flags);

      try {
        this.store.emails.update(emailId, patch, email.syncVersion, this.now());
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;
        const fresh = this.requireEmail(accountId, emailId);
        log.debug('flag_write_conflict_retry', { emailId });
        this.store.emails.update(emailId, patch, fresh.syncVersion, this.now());
      }
    });
    await this.notifier.publish(accountId, { type: 'EmailUpdated', emailId });
  }

  /** Send, then keep a read copy labelled SENT in the local store. */
  private async compose(accountId: string, message: OutgoingMessage): Promise<IntentResult> {
    const remoteId = await this.adapter.send(accountId, message);
    const { subject, body } = message;
    const recipients = [...message.to, ...(message.cc ?? [])];
    const now = this.now();

    const sent = this.store.transaction(() => {
      const existing = this.store.emails.getByRemoteId(accountId, remoteId);
      if (existing) return existing;
      return this.store.emails.insert({
        accountId,
        remoteId,
        threadId: message.threadId ?? null,
        messageId: null,
        sender: accountId,
        senderName: null,
        recipients,
        subject,
        body,
        snippet: body.slice(0, 200),
        receivedAt: now,
        isRead: true,
        isStarred: false,
        labels: ['SENT'],
        deletedAt: null,
        trashPending: false,
        isUrgent: false,
        urgencyScore: 0,
        urgencyReason: null,
      }, now);
    });

    await this.notifier.publish(accountId, { type: 'EmailCreated', emailId: sent.id });
    log.info('message_sent', { emailId: sent.id, recipientCount: recipients.length });
    return { kind: 'sent', emailId: sent.id, remoteId };
  }

  private async reply(accountId: string, emailId: string, body: string): Promise<IntentResult> {
    const original = this.requireEmail(accountId, emailId);
    return this.compose(accountId, {
      to: [original.sender],
      cc: [],
      subject: replySubject(original.subject),
      body,
      threadId: original.threadId,
      inReplyTo: original.messageId,
    });
  }

  private async createActionItem(
    accountId: string,
    params: CreateActionItemParams
  ): Promise<IntentResult> {
    if (params.emailId) {
      this.requireEmail(accountId, params.emailId);
    }

    const item = this.actionItems.create({
      accountId,
      emailId: params.emailId ?? null,
      title: params.title,
      description: params.description ?? null,
      dueDate: params.dueDate ?? null,
      priority: params.priority ?? 'medium',
      autoCreated: false,
    }, this.now());

    await this.notifier.publish(accountId, { type: 'ActionItemCreated', actionItemId: item.id });
    return { kind: 'actionItem', item };
  }

  private requireEmail(accountId: string, emailId: string): Email {
    const email = this.store.emails.getForAccount(accountId, emailId);
    if (!email) {
      throw new NotFoundError('Email', emailId);
    }
    return email;
  }
}
