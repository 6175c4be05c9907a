/**
 * Unit tests for the trash lifecycle and retention sweep.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Notifier } from '../../../src/domains/notifications/service/notifier.js';
import { TrashLifecycle } from '../../../src/domains/trash/service/lifecycle.js';
import type { LocalStore } from '../../../src/services/store/index.js';
import {
  InvalidStateError,
  NotFoundError,
  ProviderError,
  TransientProviderError,
} from '../../../src/utils/errors.js';
import { FakeMailboxAdapter, RecordingFanout, deferred } from '../../mocks/mailbox.js';
import { ACCOUNT, createTestStore, seedEmail } from '../../helpers/store.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = 1_700_000_100_000;

describe('TrashLifecycle', () => {
  let store: LocalStore;
  let adapter: FakeMailboxAdapter;
  let fanout: RecordingFanout;
  let trash: TrashLifecycle;

  beforeEach(() => {
    store = createTestStore();
    adapter = new FakeMailboxAdapter();
    fanout = new RecordingFanout();
    trash = new TrashLifecycle({ store, adapter, notifier: new Notifier(fanout), now: () => NOW });
  });

  describe('moveToTrash', () => {
    it('soft-deletes locally and tells the provider', async () => {
      const email = seedEmail(store);

      const trashed = await trash.moveToTrash(ACCOUNT, email.id);

      expect(trashed).toMatchObject({ deletedAt: NOW, trashPending: false });
      expect(adapter.trashCalls).toEqual([email.remoteId]);
      expect(store.emails.listInbox(ACCOUNT)).toEqual([]);
      expect(store.emails.listTrash(ACCOUNT).map(e => e.id)).toEqual([email.id]);
      expect(trash.getState(ACCOUNT, email.id)).toBe('trashed');
      expect(fanout.types()).toEqual(['EmailUpdated']);
    });

    it('keeps the email trashed and pending when the provider call fails', async () => {
      const email = seedEmail(store);
      adapter.trashError = new TransientProviderError('timeout');

      const trashed = await trash.moveToTrash(ACCOUNT, email.id);

      expect(trashed).toMatchObject({ deletedAt: NOW, trashPending: true });
      expect(store.emails.getById(email.id)?.trashPending).toBe(true);
    });

    it('is a no-op for an email already in the trash', async () => {
      const email = seedEmail(store, { deletedAt: 1000 });

      const result = await trash.moveToTrash(ACCOUNT, email.id);

      expect(result.deletedAt).toBe(1000);
      expect(adapter.trashCalls).toEqual([]);
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(trash.moveToTrash(ACCOUNT, 'missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('does not reach into another account', async () => {
      const email = seedEmail(store, { accountId: 'other@example.com' });

      await expect(trash.moveToTrash(ACCOUNT, email.id)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('restore', () => {
    it('restores a synced trash on the provider first', async () => {
      const email = seedEmail(store, { deletedAt: 1000 });

      const restored = await trash.restore(ACCOUNT, email.id);

      expect(restored.deletedAt).toBeNull();
      expect(adapter.restoreCalls).toEqual([email.remoteId]);
      expect(trash.getState(ACCOUNT, email.id)).toBe('active');
    });

    it('skips the provider when the trash never reached it', async () => {
      const email = seedEmail(store, { deletedAt: 1000, trashPending: true });

      const restored = await trash.restore(ACCOUNT, email.id);

      expect(restored).toMatchObject({ deletedAt: null, trashPending: false });
      expect(adapter.restoreCalls).toEqual([]);
    });

    it('stays trashed when the provider restore fails', async () => {
      const email = seedEmail(store, { deletedAt: 1000 });
      adapter.restoreError = new ProviderError('gmail.restore: forbidden');

      await expect(trash.restore(ACCOUNT, email.id)).rejects.toBeInstanceOf(ProviderError);
      expect(store.emails.getById(email.id)?.deletedAt).toBe(1000);
    });

    it('rejects restoring an active email', async () => {
      const email = seedEmail(store);

      await expect(trash.restore(ACCOUNT, email.id)).rejects.toBeInstanceOf(InvalidStateError);
    });
  });

  describe('purge', () => {
    it('rejects purging an active email', async () => {
      const email = seedEmail(store);

      await expect(trash.purge(ACCOUNT, email.id)).rejects.toBeInstanceOf(InvalidStateError);
      expect(store.emails.getById(email.id)).not.toBeNull();
    });

    it('is irreversible', async () => {
      const email = seedEmail(store, { deletedAt: 1000 });

      await trash.purge(ACCOUNT, email.id);

      expect(store.emails.getById(email.id)).toBeNull();
      expect(trash.getState(ACCOUNT, email.id)).toBe('purged');
      await expect(trash.restore(ACCOUNT, email.id)).rejects.toBeInstanceOf(InvalidStateError);
      await expect(trash.purge(ACCOUNT, email.id)).rejects.toBeInstanceOf(InvalidStateError);
      await expect(trash.moveToTrash(ACCOUNT, email.id)).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('detaches linked action items instead of deleting them', async () => {
      const email = seedEmail(store, { deletedAt: 1000 });
      const item = store.actionItems.create({ accountId: ACCOUNT, title: 'Sign the form', emailId: email.id }, 1);

      await trash.purge(ACCOUNT, email.id);

      expect(store.actionItems.getById(item.id)).toMatchObject({ title: 'Sign the form', emailId: null });
      expect(fanout.events.map(e => e.event)).toEqual([
        { type: 'TrashPurged', emailId: email.id },
        { type: 'ActionItemUpdated', actionItemId: item.id },
      ]);
    });

    it('waits for a running restore on the same email', async () => {
      const email = seedEmail(store, { deletedAt: 1000 });
      const gate = deferred();
      adapter.restoreGate = gate.promise;

      const restoring = trash.restore(ACCOUNT, email.id);
      const purging = trash.purge(ACCOUNT, email.id);
      gate.resolve();

      await expect(restoring).resolves.toMatchObject({ deletedAt: null });
      await expect(purging).rejects.toBeInstanceOf(InvalidStateError);
      expect(store.emails.getById(email.id)).not.toBeNull();
    });
  });

  describe('sweepExpired', () => {
    it('purges trash older than the retention and keeps newer trash', async () => {
      const expired = seedEmail(store, { deletedAt: NOW - 31 * DAY_MS });
      const recent = seedEmail(store, { deletedAt: NOW - 29 * DAY_MS });
      const active = seedEmail(store);

      const purged = await trash.sweepExpired(30);

      expect(purged).toEqual([expired.id]);
      expect(store.emails.getById(expired.id)).toBeNull();
      expect(store.emails.getById(recent.id)).not.toBeNull();
      expect(store.emails.getById(active.id)).not.toBeNull();
    });

    it('keeps an email trashed exactly at the cutoff', async () => {
      const boundary = seedEmail(store, { deletedAt: NOW - 30 * DAY_MS });

      expect(await trash.sweepExpired(30)).toEqual([]);
      expect(store.emails.getById(boundary.id)).not.toBeNull();
    });

    it('skips a candidate restored before its lock was taken', async () => {
      const email = seedEmail(store, { deletedAt: NOW - 31 * DAY_MS, trashPending: true });
      const gate = deferred();
      const release = store.withEmailLock(email.id, async () => {
        await gate.promise;
        store.emails.update(email.id, { deletedAt: null, trashPending: false });
      });

      const sweeping = trash.sweepExpired(30);
      gate.resolve();
      await release;

      expect(await sweeping).toEqual([]);
      expect(store.emails.getById(email.id)?.deletedAt).toBeNull();
    });

    it('keeps sweeping after one purge fails', async () => {
      const first = seedEmail(store, { deletedAt: NOW - 40 * DAY_MS });
      const second = seedEmail(store, { deletedAt: NOW - 35 * DAY_MS });
      const detach = vi.spyOn(store.actionItems, 'detachEmail').mockImplementationOnce(() => {
        throw new Error('disk full');
      });

      const purged = await trash.sweepExpired(30);

      expect(purged).toEqual([second.id]);
      expect(store.emails.getById(first.id)).not.toBeNull();
      detach.mockRestore();
    });
  });

  it('empties the whole trash of an account', async () => {
    const a = seedEmail(store, { deletedAt: 1000 });
    const b = seedEmail(store, { deletedAt: 2000 });
    seedEmail(store);

    const purged = await trash.emptyTrash(ACCOUNT);

    expect(purged.sort()).toEqual([a.id, b.id].sort());
    expect(store.emails.listTrash(ACCOUNT)).toEqual([]);
    expect(store.emails.listInbox(ACCOUNT)).toHaveLength(1);
  });

  it('returns null state for an id the account never had', () => {
    expect(trash.getState(ACCOUNT, 'missing')).toBeNull();
  });
});
