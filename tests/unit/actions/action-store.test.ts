/**
 * Unit tests for ActionItemStore.
 */

import { beforeEach, describe, expect, it } from 'vitest';
import type { LocalStore } from '../../../src/services/store/index.js';
import { NotFoundError } from '../../../src/utils/errors.js';
import { ACCOUNT, createTestStore } from '../../helpers/store.js';

describe('ActionItemStore', () => {
  let store: LocalStore;

  beforeEach(() => {
    store = createTestStore();
  });

  it('creates a pending item with defaults', () => {
    const item = store.actionItems.create({ accountId: ACCOUNT, title: '  Call the bank  ' }, 1000);

    expect(item).toMatchObject({
      accountId: ACCOUNT,
      emailId: null,
      title: 'Call the bank',
      normalizedTitle: 'call the bank',
      priority: 'medium',
      status: 'pending',
      autoCreated: false,
      completedAt: null,
      createdAt: 1000,
    });
    expect(store.actionItems.getById(item.id)).toEqual(item);
  });

  it('lists urgent first, then by earliest due date with undated last', () => {
    const undated = store.actionItems.create({ accountId: ACCOUNT, title: 'Undated', priority: 'high' }, 1);
    const later = store.actionItems.create({ accountId: ACCOUNT, title: 'Later', priority: 'high', dueDate: 900 }, 2);
    const sooner = store.actionItems.create({ accountId: ACCOUNT, title: 'Sooner', priority: 'high', dueDate: 500 }, 3);
    const urgent = store.actionItems.create({ accountId: ACCOUNT, title: 'Urgent', priority: 'urgent' }, 4);
    const low = store.actionItems.create({ accountId: ACCOUNT, title: 'Low', priority: 'low', dueDate: 100 }, 5);

    const ids = store.actionItems.list(ACCOUNT).map(i => i.id);

    expect(ids).toEqual([urgent.id, sooner.id, later.id, undated.id, low.id]);
  });

  it('filters by status', () => {
    const done = store.actionItems.create({ accountId: ACCOUNT, title: 'Done' }, 1);
    store.actionItems.create({ accountId: ACCOUNT, title: 'Open' }, 2);
    store.actionItems.setStatus(done.id, 'completed', 10);

    expect(store.actionItems.list(ACCOUNT, { status: 'completed' }).map(i => i.id)).toEqual([done.id]);
  });

  it('stamps completedAt when completing and clears it when reopening', () => {
    const item = store.actionItems.create({ accountId: ACCOUNT, title: 'Pay invoice' }, 1);

    const completed = store.actionItems.setStatus(item.id, 'completed', 50);
    expect(completed.completedAt).toBe(50);
    expect(completed.updatedAt).toBe(50);

    const reopened = store.actionItems.setStatus(item.id, 'pending', 60);
    expect(reopened.completedAt).toBeNull();
  });

  it('throws NotFoundError for an unknown id', () => {
    expect(() => store.actionItems.setStatus('missing', 'completed')).toThrow(NotFoundError);
  });

  it('detaches every item pointing at an email', () => {
    const a = store.actionItems.create({ accountId: ACCOUNT, title: 'A', emailId: 'email-1' }, 1);
    const b = store.actionItems.create({ accountId: ACCOUNT, title: 'B', emailId: 'email-1' }, 2);
    const other = store.actionItems.create({ accountId: ACCOUNT, title: 'C', emailId: 'email-2' }, 3);

    const detached = store.actionItems.detachEmail('email-1', 99);

    expect(detached.sort()).toEqual([a.id, b.id].sort());
    expect(store.actionItems.getById(a.id)?.emailId).toBeNull();
    expect(store.actionItems.getById(a.id)?.updatedAt).toBe(99);
    expect(store.actionItems.getById(other.id)?.emailId).toBe('email-2');
  });

  it('deletes an item', () => {
    const item = store.actionItems.create({ accountId: ACCOUNT, title: 'Scratch' }, 1);

    expect(store.actionItems.delete(item.id)).toBe(true);
    expect(store.actionItems.delete(item.id)).toBe(false);
    expect(store.actionItems.getById(item.id)).toBeNull();
  });

  it('finds only open items by email and normalized title', () => {
    const item = store.actionItems.create({ accountId: ACCOUNT, title: 'Sign the form', emailId: 'email-1' }, 1);

    expect(store.actionItems.findOpenByEmailAndTitle('email-1', 'sign the form')?.id).toBe(item.id);

    store.actionItems.setStatus(item.id, 'completed', 2);
    expect(store.actionItems.findOpenByEmailAndTitle('email-1', 'sign the form')).toBeNull();
  });
});
