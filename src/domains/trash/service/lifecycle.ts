/**
 * @fileoverview Trash lifecycle: Active → Trashed → (Active | Purged).
 *
 * Every transition runs under the email's row lock, so restore and purge
 * of the same id never interleave. Purged is terminal and leaves a
 * tombstone that later calls are checked against.
 */

import type { Email, EmailState, MailboxAdapter } from '../../mailbox/types.js';
import type { Notifier } from '../../notifications/service/notifier.js';
import type { ChangeEvent } from '../../notifications/types.js';
import type { LocalStore } from '../../../services/store/index.js';
import { InvalidStateError, NotFoundError } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';

const log = createLogger({ domain: 'trash' });

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_RETENTION_DAYS = 30;

export interface TrashLifecycleDeps {
  store: LocalStore;
  adapter: MailboxAdapter;
  notifier: Notifier;
  now?: () => number;
}

export class TrashLifecycle {
  private store: LocalStore;
  private adapter: MailboxAdapter;
  private notifier: Notifier;
  private now: () => number;

  constructor(deps: TrashLifecycleDeps) {
    this.store = deps.store;
    this.adapter = deps.adapter;
    this.notifier = deps.notifier;
    this.now = deps.now ?? Date.now;
  }

  /** Current lifecycle state, or null for an id this account never had. */
  getState(accountId: string, emailId: string): EmailState | null {
    const email = this.store.emails.getForAccount(accountId, emailId);
    if (email) return email.deletedAt === null ? 'active' : 'trashed';
    const purged = this.store.emails.getPurged(emailId);
    return purged && purged.accountId === accountId ? 'purged' : null;
  }

  /**
   * Soft-delete an email. Idempotent for an already trashed email.
   * The provider is told afterwards; if that fails the email stays
   * trash-pending and the next sync tick retries the push.
   */
  async moveToTrash(accountId: string, emailId: string): Promise<Email> {
    return this.store.withEmailLock(emailId, async () => {
      const email = this.requireEmail(accountId, emailId, 'trash');
      if (email.deletedAt !== null) return email;

      const trashed = this.store.emails.update(
        email.id,
        { deletedAt: this.now(), trashPending: true },
        undefined,
        this.now()
      );
      await this.notifier.publish(accountId, { type: 'EmailUpdated', emailId: email.id });

      try {
        await this.adapter.trash(accountId, email.remoteId);
      } catch (error) {
        log.warn('trash_push_deferred', {
          emailId: email.id,
          error: error instanceof Error ? error.message : String(error),
        });
        return trashed;
      }
      return this.store.emails.update(email.id, { trashPending: false }, undefined, this.now());
    });
  }

  /**
   * Bring a trashed email back. When the trash already reached the
   * provider, the provider is restored first and a failure aborts.
   */
  async restore(accountId: string, emailId: string): Promise<Email> {
    return this.store.withEmailLock(emailId, async () => {
      const email = this.requireEmail(accountId, emailId, 'restore');
      if (email.deletedAt === null) {
        throw new InvalidStateError(`Email ${emailId} is not in the trash`, { emailId, state: 'active' });
      }

      if (!email.trashPending) {
        await this.adapter.restore(accountId, email.remoteId);
      }

      const restored = this.store.emails.update(
        email.id,
        { deletedAt: null, trashPending: false },
        undefined,
        this.now()
      );
      await this.notifier.publish(accountId, { type: 'EmailUpdated', emailId: email.id });
      return restored;
    });
  }

  /** Permanently remove a trashed email. Linked action items are detached, not deleted. */
  async purge(accountId: string, emailId: string): Promise<void> {
    const events = await this.store.withEmailLock(emailId, () => {
      const email = this.requireEmail(accountId, emailId, 'purge');
      if (email.deletedAt === null) {
        throw new InvalidStateError(`Email ${emailId} must be trashed before purge`, { emailId, state: 'active' });
      }
      return this.purgeLocked(email);
    });
    await this.notifier.publishAll(accountId, events);
  }

  /**
   * Purge every email trashed strictly longer ago than the retention.
   * Each candidate is re-checked under its lock, so one restored
   * meanwhile survives. Returns the purged ids.
   */
  async sweepExpired(retentionDays: number = DEFAULT_RETENTION_DAYS): Promise<string[]> {
    const cutoff = this.now() - retentionDays * DAY_MS;
    const candidates = this.store.emails.listTrashedBefore(cutoff);
    const purged: string[] = [];

    for (const candidate of candidates) {
      try {
        const events = await this.store.withEmailLock(candidate.id, () => {
          const current = this.store.emails.getById(candidate.id);
          if (!current || current.deletedAt === null || current.deletedAt >= cutoff) return null;
          return this.purgeLocked(current);
        });
        if (events) {
          purged.push(candidate.id);
          await this.notifier.publishAll(candidate.accountId, events);
        }
      } catch (error) {
        log.error('sweep_purge_failed', {
          emailId: candidate.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (candidates.length > 0) {
      log.info('trash_swept', { candidates: candidates.length, purged: purged.length, retentionDays });
    }
    return purged;
  }

  /** Purge everything currently in an account's trash. Returns the purged ids. */
  async emptyTrash(accountId: string): Promise<string[]> {
    const trashed = this.store.emails.search(accountId, { inTrash: true, limit: 10000 });
    const purged: string[] = [];

    for (const candidate of trashed) {
      const events = await this.store.withEmailLock(candidate.id, () => {
        const current = this.store.emails.getById(candidate.id);
        if (!current || current.deletedAt === null) return null;
        return this.purgeLocked(current);
      });
      if (events) {
        purged.push(candidate.id);
        await this.notifier.publishAll(accountId, events);
      }
    }
    return purged;
  }

  /** Delete the row, write the tombstone and detach action items in one transaction. Caller holds the lock. */
  private purgeLocked(email: Email): ChangeEvent[] {
    const detached = this.store.transaction(() => {
      this.store.emails.purge(email, this.now());
      return this.store.actionItems.detachEmail(email.id, this.now());
    });
    log.info('email_purged', { emailId: email.id, detachedActionItems: detached.length });

    return [
      { type: 'TrashPurged', emailId: email.id },
      ...detached.map((id): ChangeEvent => ({ type: 'ActionItemUpdated', actionItemId: id })),
    ];
  }

  /** Load an email for a transition; a purged id is an InvalidStateError, an unknown one NotFoundError. */
  private requireEmail(accountId: string, emailId: string, operation: string): Email {
    const email = this.store.emails.getForAccount(accountId, emailId);
    if (email) return email;

    const purged = this.store.emails.getPurged(emailId);
    if (purged && purged.accountId === accountId) {
      throw new InvalidStateError(`Email ${emailId} was purged; cannot ${operation}`, { emailId, state: 'purged' });
    }
    throw new NotFoundError('Email', emailId);
  }
}
