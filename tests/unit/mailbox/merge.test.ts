/**
 * Unit tests for the remote-to-local merge rules.
 */

import { describe, expect, it } from 'vitest';
import { mergeRemoteRecord, remoteToNewEmail } from '../../../src/domains/mailbox/service/merge.js';
import type { Email, RemoteEmailRecord } from '../../../src/domains/mailbox/types.js';

const NOW = 1_700_000_100_000;

function localEmail(overrides: Partial<Email> = {}): Email {
  return {
    id: 'local-1',
    accountId: 'owner@example.com',
    remoteId: 'r-1',
    threadId: 't-1',
    messageId: '<lunch-1@mail.example.com>',
    sender: 'alice@example.com',
    senderName: 'Alice',
    recipients: ['owner@example.com'],
    subject: 'Lunch',
    body: 'Noon works for me.',
    snippet: 'Noon works',
    receivedAt: 1_700_000_000_000,
    isRead: false,
    isStarred: false,
    labels: ['INBOX', 'UNREAD'],
    deletedAt: null,
    trashPending: false,
    syncVersion: 3,
    isUrgent: false,
    urgencyScore: 0,
    urgencyReason: null,
    createdAt: 1_700_000_000_000,
    updatedAt: 1_700_000_000_000,
    ...overrides,
  };
}

function remoteFor(email: Email, overrides: Partial<RemoteEmailRecord> = {}): RemoteEmailRecord {
  return {
    remoteId: email.remoteId,
    threadId: email.threadId,
    messageId: email.messageId,
    sender: email.sender,
    senderName: email.senderName,
    recipients: email.recipients,
    subject: email.subject,
    body: email.body,
    snippet: email.snippet,
    receivedAt: email.receivedAt,
    labels: email.labels,
    isRead: email.isRead,
    isStarred: email.isStarred,
    isTrashed: email.deletedAt !== null,
    ...overrides,
  };
}

describe('mergeRemoteRecord', () => {
  it('reports no change for an identical record', () => {
    const email = localEmail();

    const result = mergeRemoteRecord(email, remoteFor(email), NOW);

    expect(result).toEqual({ patch: {}, contentChanged: false, changed: false, restored: false });
  });

  it('takes remote flags and labels over local ones', () => {
    const email = localEmail({ isRead: true, labels: ['INBOX'] });

    const result = mergeRemoteRecord(
      email,
      remoteFor(email, { isRead: false, isStarred: true, labels: ['INBOX', 'UNREAD', 'STARRED'] }),
      NOW
    );

    expect(result.patch).toEqual({ isRead: false, isStarred: true, labels: ['INBOX', 'UNREAD', 'STARRED'] });
    expect(result.changed).toBe(true);
    expect(result.contentChanged).toBe(false);
  });

  it('flags content changes so extraction runs again', () => {
    const email = localEmail();

    const result = mergeRemoteRecord(email, remoteFor(email, { body: 'Make it 1pm instead.' }), NOW);

    expect(result.patch).toEqual({ body: 'Make it 1pm instead.' });
    expect(result.contentChanged).toBe(true);
  });

  it('trashes locally when the provider reports the message trashed', () => {
    const email = localEmail();

    const result = mergeRemoteRecord(email, remoteFor(email, { isTrashed: true }), NOW);

    expect(result.patch.deletedAt).toBe(NOW);
  });

  it('keeps the original deletedAt when already trashed locally', () => {
    const email = localEmail({ deletedAt: 1000, trashPending: true });

    const result = mergeRemoteRecord(email, remoteFor(email, { isTrashed: true }), NOW);

    expect(result.patch).toEqual({ trashPending: false });
  });

  it('keeps a pending local trash when the remote record is not trashed yet', () => {
    const email = localEmail({ deletedAt: 1000, trashPending: true });

    const result = mergeRemoteRecord(email, remoteFor(email, { isTrashed: false }), NOW);

    expect(result.patch.deletedAt).toBeUndefined();
    expect(result.changed).toBe(false);
  });

  it('restores when the provider took a pushed trash back', () => {
    const email = localEmail({ deletedAt: 1000, trashPending: false });

    const result = mergeRemoteRecord(email, remoteFor(email, { isTrashed: false }), NOW);

    expect(result.patch).toEqual({ deletedAt: null });
    expect(result.restored).toBe(true);
    expect(result.contentChanged).toBe(false);
  });

  it('does not count a pending local trash as restored', () => {
    const email = localEmail({ deletedAt: 1000, trashPending: true });

    expect(mergeRemoteRecord(email, remoteFor(email, { isTrashed: false }), NOW).restored).toBe(false);
  });

  it('takes a Message-ID the provider reports later', () => {
    const email = localEmail({ messageId: null });

    const result = mergeRemoteRecord(email, remoteFor(email, { messageId: '<lunch-1@mail.example.com>' }), NOW);

    expect(result.patch).toEqual({ messageId: '<lunch-1@mail.example.com>' });
  });

  it('carries the provider version without counting it as a change', () => {
    const email = localEmail();

    const result = mergeRemoteRecord(email, remoteFor(email, { version: 77 }), NOW);

    expect(result.patch).toEqual({ providerVersion: 77 });
    expect(result.changed).toBe(false);
  });
});

describe('remoteToNewEmail', () => {
  it('marks a record that arrives trashed as deleted now', () => {
    const email = localEmail();
    const draft = remoteToNewEmail('owner@example.com', remoteFor(email, { isTrashed: true, version: 9 }), NOW);

    expect(draft.deletedAt).toBe(NOW);
    expect(draft.trashPending).toBe(false);
    expect(draft.syncVersion).toBe(9);
    expect(draft.messageId).toBe('<lunch-1@mail.example.com>');
  });
});
