/**
 * @fileoverview User-driven changes to action items.
 *
 * Every change runs under the item's lock and publishes ActionItemUpdated
 * once it is stored. Items belong to one account; an id from another
 * account reads as not found.
 */

import type { Notifier } from '../../notifications/service/notifier.js';
import type { LocalStore } from '../../../services/store/index.js';
import { InvalidStateError, NotFoundError } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { ActionItem, ActionItemPatch } from '../types.js';

const log = createLogger({ domain: 'actions' });

export class ActionItemService {
  private store: LocalStore;
  private notifier: Notifier;
  private now: () => number;

  constructor(store: LocalStore, notifier: Notifier, now: () => number = Date.now) {
    this.store = store;
    this.notifier = notifier;
    this.now = now;
  }

  /** Mark done. Completing a completed item changes nothing. */
  async complete(accountId: string, id: string): Promise<ActionItem> {
    return this.change(accountId, id, (current) =>
      current.status === 'completed' ? current : this.store.actionItems.setStatus(id, 'completed', this.now())
    );
  }

  /** Set aside without completing. */
  async dismiss(accountId: string, id: string): Promise<ActionItem> {
    return this.change(accountId, id, (current) =>
      current.status === 'dismissed' ? current : this.store.actionItems.setStatus(id, 'dismissed', this.now())
    );
  }

  async update(accountId: string, id: string, patch: ActionItemPatch): Promise<ActionItem> {
    if (patch.title !== undefined && !patch.title.trim()) {
      throw new InvalidStateError('Action item title is required', { id });
    }
    return this.change(accountId, id, () => this.store.actionItems.update(id, patch, this.now()));
  }

  async delete(accountId: string, id: string): Promise<void> {
    await this.store.withActionItemLock(id, () => {
      this.requireItem(accountId, id);
      this.store.actionItems.delete(id);
    });
    log.info('action_item_deleted', { actionItemId: id });
    await this.notifier.publish(accountId, { type: 'ActionItemUpdated', actionItemId: id });
  }

  private async change(
    accountId: string,
    id: string,
    apply: (current: ActionItem) => ActionItem
  ): Promise<ActionItem> {
    const item = await this.store.withActionItemLock(id, () => apply(this.requireItem(accountId, id)));
    await this.notifier.publish(accountId, { type: 'ActionItemUpdated', actionItemId: item.id });
    return item;
  }

  private requireItem(accountId: string, id: string): ActionItem {
    const item = this.store.actionItems.getById(id);
    if (!item || item.accountId !== accountId) {
      throw new NotFoundError('ActionItem', id);
    }
    return item;
  }
}
