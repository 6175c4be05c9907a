/**
 * @fileoverview Field-level merge of a remote record into a local email.
 *
 * Remote state wins for every provider-visible field. The one exception is
 * a local trash that has not reached the provider yet (trashPending): its
 * deletedAt stays until the outward trash call succeeds.
 */

import type { Email, EmailPatch, NewEmail, RemoteEmailRecord } from '../types.js';

export interface MergeResult {
  patch: EmailPatch;
  /** Subject or body changed, so extraction must run again */
  contentChanged: boolean;
  /** Anything at all differs from the stored row */
  changed: boolean;
  /** Provider took the email out of its trash; it needs its extraction pass */
  restored: boolean;
}

function sameList(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

/** Local row for a record seen for the first time. */
export function remoteToNewEmail(accountId: string, remote: RemoteEmailRecord, now: number): NewEmail {
  return {
    accountId,
    remoteId: remote.remoteId,
    threadId: remote.threadId,
    messageId: remote.messageId,
    sender: remote.sender,
    senderName: remote.senderName,
    recipients: remote.recipients,
    subject: remote.subject,
    body: remote.body,
    snippet: remote.snippet,
    receivedAt: remote.receivedAt,
    isRead: remote.isRead,
    isStarred: remote.isStarred,
    labels: remote.labels,
    deletedAt: remote.isTrashed ? now : null,
    trashPending: false,
    syncVersion: remote.version,
    isUrgent: false,
    urgencyScore: 0,
    urgencyReason: null,
  };
}

export function mergeRemoteRecord(existing: Email, remote: RemoteEmailRecord, now: number): MergeResult {
  const patch: EmailPatch = {};

  if (existing.threadId !== remote.threadId) patch.threadId = remote.threadId;
  if (existing.messageId !== remote.messageId) patch.messageId = remote.messageId;
  if (existing.sender !== remote.sender) patch.sender = remote.sender;
  if (existing.senderName !== remote.senderName) patch.senderName = remote.senderName;
  if (!sameList(existing.recipients, remote.recipients)) patch.recipients = remote.recipients;
  if (existing.subject !== remote.subject) patch.subject = remote.subject;
  if (existing.body !== remote.body) patch.body = remote.body;
  if (existing.snippet !== remote.snippet) patch.snippet = remote.snippet;
  if (existing.receivedAt !== remote.receivedAt) patch.receivedAt = remote.receivedAt;
  if (existing.isRead !== remote.isRead) patch.isRead = remote.isRead;
  if (existing.isStarred !== remote.isStarred) patch.isStarred = remote.isStarred;
  if (!sameList(existing.labels, remote.labels)) patch.labels = remote.labels;

  if (remote.isTrashed) {
    if (existing.deletedAt === null) patch.deletedAt = now;
    // Provider has it trashed, so the outward call is no longer owed
    if (existing.trashPending) patch.trashPending = false;
  } else if (existing.deletedAt !== null && !existing.trashPending) {
    // Restored on the provider side
    patch.deletedAt = null;
  }

  const contentChanged = patch.subject !== undefined || patch.body !== undefined;
  const restored = patch.deletedAt === null;
  const changed = Object.keys(patch).length > 0;
  if (remote.version !== undefined) patch.providerVersion = remote.version;

  return { patch, contentChanged, changed, restored };
}
