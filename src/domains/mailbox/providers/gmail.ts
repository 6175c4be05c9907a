/**
 * @fileoverview Gmail implementation of the MailboxAdapter.
 *
 * First sync lists the mailbox page by page under a snapshot historyId;
 * once the listing is exhausted the cursor switches to the History API.
 * The cursor handed to the engine is an opaque JSON string.
 */

import { google, type gmail_v1 } from 'googleapis';
import {
  AuthenticationError,
  ProviderError,
  classifyProviderError,
  getErrorStatus,
} from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type {
  FetchPage,
  FlagChange,
  MailboxAdapter,
  OutgoingMessage,
  RemoteEmailRecord,
  TokenProvider,
} from '../types.js';

const log = createLogger({ domain: 'gmail' });

const BODY_LIMIT = 20000;

type GmailCursor =
  | { mode: 'list'; historyId: string; pageToken: string }
  | { mode: 'history'; historyId: string; pageToken?: string };

export interface GmailOAuthClientConfig {
  clientId?: string;
  clientSecret?: string;
}

/**
 * Parse a stored cursor. Anything unreadable counts as "no cursor",
 * which restarts the initial listing.
 */
export function parseCursor(raw: string | null): GmailCursor | null {
  if (!raw) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    log.warn('cursor_unreadable', { cursorLength: raw.length });
    return null;
  }
  if (!parsed || typeof parsed !== 'object') return null;
  if (!('mode' in parsed) || !('historyId' in parsed)) return null;

  const { mode, historyId } = parsed;
  if (typeof historyId !== 'string') return null;
  const pageToken = 'pageToken' in parsed && typeof parsed.pageToken === 'string'
    ? parsed.pageToken
    : undefined;

  if (mode === 'list' && pageToken) return { mode, historyId, pageToken };
  if (mode === 'history') return { mode, historyId, pageToken };
  return null;
}

function serializeCursor(cursor: GmailCursor): string {
  return JSON.stringify(cursor);
}

/** Split `Name <addr>` into its parts. A bare address has no name. */
export function parseAddress(value: string): { email: string; name: string | null } {
  const match = value.match(/^\s*"?([^"<]*?)"?\s*<([^>]+)>\s*$/);
  if (match) {
    const name = match[1].trim();
    return { email: match[2].trim().toLowerCase(), name: name || null };
  }
  return { email: value.trim().toLowerCase(), name: null };
}

function parseAddressList(value: string): string[] {
  if (!value) return [];
  // Commas inside quoted display names are not separators
  const parts = value.match(/(?:"[^"]*"|[^,])+/g) ?? [];
  return parts
    .map(part => parseAddress(part).email)
    .filter(email => email.length > 0);
}

/**
 * Normalize a Gmail message into a RemoteEmailRecord.
 *
 * Extracts headers, decodes body content (preferring text/plain),
 * strips HTML tags and maps system labels onto flags.
 */
export function normalizeGmailMessage(message: gmail_v1.Schema$Message): RemoteEmailRecord {
  const headers = message.payload?.headers ?? [];
  const getHeader = (name: string): string =>
    headers.find(h => h.name?.toLowerCase() === name.toLowerCase())?.value ?? '';

  const from = parseAddress(getHeader('From'));
  const labels = message.labelIds ?? [];
  const internalDate = Number(message.internalDate);
  const headerDate = Date.parse(getHeader('Date'));
  const version = Number(message.historyId);

  return {
    remoteId: message.id ?? '',
    threadId: message.threadId ?? null,
    messageId: getHeader('Message-ID') || null,
    sender: from.email,
    senderName: from.name,
    recipients: [...parseAddressList(getHeader('To')), ...parseAddressList(getHeader('Cc'))],
    subject: getHeader('Subject'),
    body: normalizeWhitespace(extractBody(message.payload)).slice(0, BODY_LIMIT),
    snippet: message.snippet ?? '',
    receivedAt: Number.isFinite(internalDate) && internalDate > 0
      ? internalDate
      : Number.isFinite(headerDate) ? headerDate : 0,
    labels,
    isRead: !labels.includes('UNREAD'),
    isStarred: labels.includes('STARRED'),
    isTrashed: labels.includes('TRASH'),
    version: Number.isFinite(version) ? version : undefined,
  };
}

/** Walk MIME parts for body text; text/plain wins over text/html. */
function extractBody(payload: gmail_v1.Schema$MessagePart | undefined | null): string {
  if (!payload) return '';
  let plainText = '';
  let htmlText = '';

  function walkParts(part: gmail_v1.Schema$MessagePart): void {
    const mimeType = part.mimeType ?? '';
    const bodyData = part.body?.data;
    const isAttachment = Boolean(part.filename);

    if (mimeType === 'text/plain' && bodyData && !isAttachment) {
      plainText += decodeBodyData(bodyData);
    } else if (mimeType === 'text/html' && bodyData && !isAttachment) {
      htmlText += decodeBodyData(bodyData);
    }

    for (const child of part.parts ?? []) {
      walkParts(child);
    }
  }

  walkParts(payload);
  return plainText || stripHtmlTags(htmlText);
}

function decodeBodyData(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

function stripHtmlTags(html: string): string {
  if (!html) return '';

  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/p>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/gi, ' ')
    .replace(/&amp;/gi, '&')
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;/gi, "'");
}

function normalizeWhitespace(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/** Encode a MIME header value when it is not plain ASCII. */
function encodeHeader(value: string): string {
  return /^[\x00-\x7F]*$/.test(value)
    ? value
    : `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

/** Build the base64url RFC 822 payload messages.send expects. */
export function buildRawMessage(message: OutgoingMessage): string {
  const lines = [
    `To: ${message.to.join(', ')}`,
  ];
  if (message.cc && message.cc.length > 0) {
    lines.push(`Cc: ${message.cc.join(', ')}`);
  }
  lines.push(`Subject: ${encodeHeader(message.subject)}`);
  if (message.inReplyTo) {
    lines.push(`In-Reply-To: ${message.inReplyTo}`);
    lines.push(`References: ${message.inReplyTo}`);
  }
  lines.push('MIME-Version: 1.0');
  lines.push('Content-Type: text/plain; charset="UTF-8"');
  lines.push('Content-Transfer-Encoding: 8bit');
  lines.push('');
  lines.push(message.body);

  return Buffer.from(lines.join('\r\n'), 'utf-8').toString('base64url');
}

function flagsToLabelChanges(flags: FlagChange): { add: string[]; remove: string[] } {
  const add = [...(flags.addLabels ?? [])];
  const remove = [...(flags.removeLabels ?? [])];

  if (flags.read === true) remove.push('UNREAD');
  if (flags.read === false) add.push('UNREAD');
  if (flags.starred === true) add.push('STARRED');
  if (flags.starred === false) remove.push('STARRED');

  return { add, remove };
}

export class GmailMailboxAdapter implements MailboxAdapter {
  private tokens: TokenProvider;
  private oauth: GmailOAuthClientConfig;

  constructor(tokens: TokenProvider, oauth: GmailOAuthClientConfig = {}) {
    this.tokens = tokens;
    this.oauth = oauth;
  }

  /**
   * Gmail client for an account, authorized with its current access token.
   * @throws AuthenticationError when the token provider has no valid token
   */
  private async client(accountId: string): Promise<gmail_v1.Gmail> {
    const token = await this.tokens.getValidToken(accountId);
    if (token.status !== 'ok') {
      throw new AuthenticationError(accountId);
    }

    const oauth2Client = new google.auth.OAuth2(this.oauth.clientId, this.oauth.clientSecret);
    oauth2Client.setCredentials({ access_token: token.accessToken });
    return google.gmail({ version: 'v1', auth: oauth2Client });
  }

  private async call<T>(accountId: string, operation: string, fn: (gmail: gmail_v1.Gmail) => Promise<T>): Promise<T> {
    const gmail = await this.client(accountId);
    try {
      return await fn(gmail);
    } catch (error) {
      throw classifyProviderError(error, accountId, operation);
    }
  }

  async fetchSince(accountId: string, cursor: string | null, pageSize: number): Promise<FetchPage> {
    const position = parseCursor(cursor);

    return this.call(accountId, 'gmail.fetchSince', async (gmail) => {
      if (!position) {
        const profile = await gmail.users.getProfile({ userId: 'me' });
        const historyId = profile.data.historyId;
        if (!historyId) {
          throw new ProviderError('Gmail profile returned no historyId', 'PROVIDER_REJECTED');
        }
        return this.listPage(gmail, historyId, undefined, pageSize);
      }
      if (position.mode === 'list') {
        return this.listPage(gmail, position.historyId, position.pageToken, pageSize);
      }
      return this.historyPage(gmail, position.historyId, position.pageToken, pageSize);
    });
  }

  /** One page of the initial mailbox listing. */
  private async listPage(
    gmail: gmail_v1.Gmail,
    historyId: string,
    pageToken: string | undefined,
    pageSize: number
  ): Promise<FetchPage> {
    const response = await gmail.users.messages.list({
      userId: 'me',
      maxResults: pageSize,
      pageToken,
      includeSpamTrash: false,
    });

    const ids = (response.data.messages ?? [])
      .map(m => m.id)
      .filter((id): id is string => typeof id === 'string');
    const records = await this.getMessages(gmail, ids);
    const nextPageToken = response.data.nextPageToken ?? undefined;

    const next: GmailCursor = nextPageToken
      ? { mode: 'list', historyId, pageToken: nextPageToken }
      : { mode: 'history', historyId };

    return { records, nextCursor: serializeCursor(next), hasMore: Boolean(nextPageToken) };
  }

  /** One page of history since the stored historyId. */
  private async historyPage(
    gmail: gmail_v1.Gmail,
    startHistoryId: string,
    pageToken: string | undefined,
    pageSize: number
  ): Promise<FetchPage> {
    const history = await gmail.users.history
      .list({
        userId: 'me',
        startHistoryId,
        pageToken,
        maxResults: pageSize,
        historyTypes: ['messageAdded', 'labelAdded', 'labelRemoved'],
      })
      .then(response => response.data)
      .catch((error: unknown) => {
        if (getErrorStatus(error) === 404) {
          throw new ProviderError(
            `History cursor ${startHistoryId} expired; reset the sync cursor`,
            'CURSOR_EXPIRED',
            { startHistoryId }
          );
        }
        throw error;
      });

    const ids = new Set<string>();
    for (const entry of history.history ?? []) {
      const touched = [
        ...(entry.messagesAdded ?? []),
        ...(entry.labelsAdded ?? []),
        ...(entry.labelsRemoved ?? []),
      ];
      for (const change of touched) {
        if (change.message?.id) ids.add(change.message.id);
      }
    }

    const records = await this.getMessages(gmail, [...ids]);
    const nextPageToken = history.nextPageToken ?? undefined;
    const next: GmailCursor = nextPageToken
      ? { mode: 'history', historyId: startHistoryId, pageToken: nextPageToken }
      : { mode: 'history', historyId: history.historyId ?? startHistoryId };

    return { records, nextCursor: serializeCursor(next), hasMore: Boolean(nextPageToken) };
  }

  /** Fetch full messages; ones deleted since the listing are skipped. */
  private async getMessages(gmail: gmail_v1.Gmail, ids: string[]): Promise<RemoteEmailRecord[]> {
    const records: RemoteEmailRecord[] = [];
    for (const id of ids) {
      try {
        const response = await gmail.users.messages.get({ userId: 'me', id, format: 'full' });
        records.push(normalizeGmailMessage(response.data));
      } catch (error) {
        if (getErrorStatus(error) === 404) {
          log.debug('message_gone', { messageId: id });
          continue;
        }
        throw error;
      }
    }
    return records;
  }

  async applyFlags(accountId: string, remoteId: string, flags: FlagChange): Promise<void> {
    const { add, remove } = flagsToLabelChanges(flags);
    if (add.length === 0 && remove.length === 0) return;

    await this.call(accountId, 'gmail.applyFlags', (gmail) =>
      gmail.users.messages.modify({
        userId: 'me',
        id: remoteId,
        requestBody: { addLabelIds: add, removeLabelIds: remove },
      })
    );
  }

  async trash(accountId: string, remoteId: string): Promise<void> {
    await this.call(accountId, 'gmail.trash', (gmail) =>
      gmail.users.messages.trash({ userId: 'me', id: remoteId })
    );
  }

  async restore(accountId: string, remoteId: string): Promise<void> {
    await this.call(accountId, 'gmail.restore', (gmail) =>
      gmail.users.messages.untrash({ userId: 'me', id: remoteId })
    );
  }

  async send(accountId: string, message: OutgoingMessage): Promise<string> {
    const response = await this.call(accountId, 'gmail.send', (gmail) =>
      gmail.users.messages.send({
        userId: 'me',
        requestBody: {
          raw: buildRawMessage(message),
          threadId: message.threadId ?? undefined,
        },
      })
    );

    const id = response.data.id;
    if (!id) {
      throw new ProviderError('Gmail send returned no message id', 'PROVIDER_REJECTED');
    }
    return id;
  }
}
