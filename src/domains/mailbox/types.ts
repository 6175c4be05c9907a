/**
 * @fileoverview Mailbox type definitions.
 *
 * The locally mirrored Email entity, the normalized record the remote
 * mailbox hands back, and the adapter contract the engine consumes.
 */

/** Lifecycle state of a local email. Purged emails only exist as tombstones. */
export type EmailState = 'active' | 'trashed' | 'purged';

/** An email mirrored into the local store. Timestamps are Unix milliseconds. */
export interface Email {
  id: string;
  accountId: string;
  /** Provider message id; unique per account and never reassigned */
  remoteId: string;
  threadId: string | null;
  /** RFC 822 Message-ID header, used to thread replies */
  messageId: string | null;
  sender: string;
  senderName: string | null;
  recipients: string[];
  subject: string;
  body: string;
  snippet: string;
  receivedAt: number;
  isRead: boolean;
  isStarred: boolean;
  labels: string[];
  deletedAt: number | null;
  /** Trashed locally, provider not told yet */
  trashPending: boolean;
  syncVersion: number;
  isUrgent: boolean;
  urgencyScore: number;
  urgencyReason: string | null;
  createdAt: number;
  updatedAt: number;
}

/** Fields a caller supplies when inserting an email. */
export type NewEmail = Omit<Email, 'id' | 'createdAt' | 'updatedAt' | 'syncVersion'> & {
  syncVersion?: number;
};

/** Fields that may change after insert. */
export type EmailPatch = Partial<Pick<Email,
  | 'threadId'
  | 'messageId'
  | 'sender'
  | 'senderName'
  | 'recipients'
  | 'subject'
  | 'body'
  | 'snippet'
  | 'receivedAt'
  | 'isRead'
  | 'isStarred'
  | 'labels'
  | 'deletedAt'
  | 'trashPending'
  | 'isUrgent'
  | 'urgencyScore'
  | 'urgencyReason'
>> & {
  /** Provider version observed with this change, if any */
  providerVersion?: number;
};

/** Filter evaluated against the local store (search and batch intents). */
export interface EmailFilter {
  /** Case-insensitive substring over subject, body and sender */
  query?: string;
  /** Case-insensitive substring over the sender address/name */
  from?: string;
  isRead?: boolean;
  isStarred?: boolean;
  label?: string;
  receivedAfter?: number;
  receivedBefore?: number;
  /** Only trashed emails */
  inTrash?: boolean;
  limit?: number;
}

/** A message as the remote mailbox reports it. */
export interface RemoteEmailRecord {
  remoteId: string;
  threadId: string | null;
  messageId: string | null;
  sender: string;
  senderName: string | null;
  recipients: string[];
  subject: string;
  body: string;
  snippet: string;
  receivedAt: number;
  labels: string[];
  isRead: boolean;
  isStarred: boolean;
  isTrashed: boolean;
  /** Monotonic provider version (e.g. Gmail historyId) */
  version?: number;
}

/** One page of remote changes. */
export interface FetchPage {
  records: RemoteEmailRecord[];
  /** Cursor to persist once this page is committed */
  nextCursor: string | null;
  hasMore: boolean;
}

/** Flag/label change pushed to the remote mailbox. */
export interface FlagChange {
  read?: boolean;
  starred?: boolean;
  addLabels?: string[];
  removeLabels?: string[];
}

export interface OutgoingMessage {
  to: string[];
  cc?: string[];
  subject: string;
  body: string;
  threadId?: string | null;
  /** Message-ID header of the email being replied to */
  inReplyTo?: string | null;
}

/**
 * Remote mailbox contract.
 *
 * Implementations throw TransientProviderError for network/rate-limit
 * failures, AuthenticationError for expired or revoked tokens, and
 * ProviderError for permanent rejections.
 */
export interface MailboxAdapter {
  fetchSince(accountId: string, cursor: string | null, pageSize: number): Promise<FetchPage>;
  applyFlags(accountId: string, remoteId: string, flags: FlagChange): Promise<void>;
  trash(accountId: string, remoteId: string): Promise<void>;
  /** Take a message back out of the provider's trash */
  restore(accountId: string, remoteId: string): Promise<void>;
  /** Send a message and return the provider id of the sent copy */
  send(accountId: string, message: OutgoingMessage): Promise<string>;
}

export type TokenResult =
  | { status: 'ok'; accessToken: string }
  | { status: 'unauthenticated' };

/** Supplies valid access tokens; refreshing them is someone else's job. */
export interface TokenProvider {
  getValidToken(accountId: string): Promise<TokenResult>;
  /** Told when the provider rejected a token, so it can be refreshed or re-consented */
  reportAuthFailure?(accountId: string): Promise<void> | void;
}
