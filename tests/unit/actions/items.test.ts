/**
 * Unit tests for ActionItemService.
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { ActionItemService } from '../../../src/domains/actions/service/items.js';
import { Notifier } from '../../../src/domains/notifications/service/notifier.js';
import type { LocalStore } from '../../../src/services/store/index.js';
import { InvalidStateError, NotFoundError } from '../../../src/utils/errors.js';
import { RecordingFanout } from '../../mocks/mailbox.js';
import { ACCOUNT, createTestStore } from '../../helpers/store.js';

const NOW = 1_700_000_100_000;

describe('ActionItemService', () => {
  let store: LocalStore;
  let fanout: RecordingFanout;
  let actions: ActionItemService;

  beforeEach(() => {
    store = createTestStore();
    fanout = new RecordingFanout();
    actions = new ActionItemService(store, new Notifier(fanout), () => NOW);
  });

  function createItem(title = 'Renew the lease') {
    return store.actionItems.create({ accountId: ACCOUNT, title, dueDate: 5000 }, 1);
  }

  it('updates the editable fields and renormalizes the title', async () => {
    const item = createItem();

    const updated = await actions.update(ACCOUNT, item.id, {
      title: '  Sign the LEASE ',
      priority: 'urgent',
      dueDate: null,
    });

    expect(updated).toMatchObject({
      title: 'Sign the LEASE',
      normalizedTitle: 'sign the lease',
      priority: 'urgent',
      dueDate: null,
      description: null,
      status: 'pending',
      updatedAt: NOW,
    });
    expect(store.actionItems.getById(item.id)).toEqual(updated);
    expect(fanout.events).toEqual([
      { accountId: ACCOUNT, event: { type: 'ActionItemUpdated', actionItemId: item.id } },
    ]);
  });

  it('rejects an empty title without touching the item', async () => {
    const item = createItem();

    await expect(actions.update(ACCOUNT, item.id, { title: '   ' })).rejects.toBeInstanceOf(InvalidStateError);
    expect(store.actionItems.getById(item.id)?.title).toBe('Renew the lease');
    expect(fanout.events).toEqual([]);
  });

  it('dismisses an item without completing it', async () => {
    const item = createItem();

    const dismissed = await actions.dismiss(ACCOUNT, item.id);

    expect(dismissed).toMatchObject({ status: 'dismissed', completedAt: null, updatedAt: NOW });
    expect(store.actionItems.list(ACCOUNT, { status: 'dismissed' }).map(i => i.id)).toEqual([item.id]);
  });

  it('completes an item once', async () => {
    const item = createItem();

    await actions.complete(ACCOUNT, item.id);
    const again = await actions.complete(ACCOUNT, item.id);

    expect(again).toMatchObject({ status: 'completed', completedAt: NOW });
  });

  it('deletes an item and publishes the change', async () => {
    const item = createItem();

    await actions.delete(ACCOUNT, item.id);

    expect(store.actionItems.getById(item.id)).toBeNull();
    expect(fanout.types()).toEqual(['ActionItemUpdated']);
    await expect(actions.delete(ACCOUNT, item.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('treats another account\'s item as not found', async () => {
    const item = createItem();

    await expect(actions.dismiss('someone@example.com', item.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(actions.delete('someone@example.com', item.id)).rejects.toBeInstanceOf(NotFoundError);
    expect(store.actionItems.getById(item.id)?.status).toBe('pending');
  });
});
