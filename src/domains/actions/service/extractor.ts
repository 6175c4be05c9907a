/**
 * @fileoverview Heuristic action item extraction.
 *
 * Scans subject and body for request phrasing, obligations, imperative
 * sentences and deadline phrases. Deadlines are parsed with chrono-node
 * relative to `now` in the configured timezone (Luxon); a date that cannot
 * be pinned to a day stays null rather than being guessed.
 */

import * as chrono from 'chrono-node';
import { DateTime } from 'luxon';
import { createLogger } from '../../../utils/observability/index.js';
import type { Email } from '../../mailbox/types.js';
import type { ActionItemStore } from '../repo/sqlite.js';
import type { ActionItem, ActionItemCandidate, ActionPriority } from '../types.js';
import { normalizeTitle } from './normalize.js';

const log = createLogger({ domain: 'action-extractor' });

const MAX_ITEMS_PER_EMAIL = 5;
const MAX_TITLE_LENGTH = 120;
const MAX_SENTENCE_LENGTH = 400;
const DAY_MS = 24 * 60 * 60 * 1000;

export type ExtractableEmail = Pick<Email, 'id' | 'accountId' | 'subject' | 'body'>;

export interface ExtractOptions {
  now: number;
  /** IANA timezone deadlines are read in */
  timezone: string;
}

const SENTENCE_SPLIT = /(?<=[.?!])\s+|\n+/;

const REQUEST_PATTERN = /\b(?:please|kindly|could you|can you|would you|will you)\s+(?:please\s+)?(.+)/i;
const OBLIGATION_PATTERN = /\b(?:need you to|you need to|you must|action required:?)\s+(.+)/i;

const IMPERATIVE_VERBS = [
  'review', 'send', 'submit', 'sign', 'approve', 'confirm', 'complete',
  'update', 'schedule', 'call', 'reply', 'respond', 'prepare', 'finish',
  'book', 'pay', 'fill out', 'share', 'check', 'forward', 'register',
  'provide', 'remember to', "don't forget to",
];
const IMPERATIVE_PATTERN = new RegExp(`^(?:${IMPERATIVE_VERBS.join('|')})\\b`, 'i');

const DEADLINE_PATTERN = /\b(?:by|before|due(?: on| by)?|deadline(?: is|:)?|no later than|until)\s+([^.,;!?\n]{2,40})/i;
const STRONG_DEADLINE_PATTERN = /\b(?:due|deadline|no later than)\b/i;
const END_OF_DAY_PATTERN = /^(?:the\s+)?(?:end of (?:the )?day|eod|cob|close of business)\b/i;

const COURTESY_PATTERN = /^(?:thanks|thank you|many thanks|regards|best|cheers|sincerely|kind regards|hope you)\b/i;

const URGENT_PATTERN = /\b(?:urgent|asap|immediately|emergency|critical)\b/i;
const LOW_PRIORITY_PATTERN = /\b(?:no rush|whenever|when you get time|eventually)\b/i;
const URGENT_SUBJECT_PATTERN = /\b(?:urgent|asap|emergency|critical)\b|\[(?:urgent|action|priority)\]/i;

function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_SPLIT)
    .map(s => s.trim())
    .filter(s => s.length > 0 && s.length <= MAX_SENTENCE_LENGTH);
}

function toTitle(action: string): string | null {
  const cleaned = action.trim().replace(/[.?!:;,\s]+$/, '');
  if (cleaned.length < 3) return null;
  const title = cleaned.charAt(0).toUpperCase() + cleaned.slice(1);
  return title.length > MAX_TITLE_LENGTH ? title.slice(0, MAX_TITLE_LENGTH).trimEnd() : title;
}

/** The requested action in a sentence, if it asks for one. */
function matchAction(sentence: string): string | null {
  const request = sentence.match(REQUEST_PATTERN);
  if (request) return request[1];

  const obligation = sentence.match(OBLIGATION_PATTERN);
  if (obligation) return obligation[1];

  if (IMPERATIVE_PATTERN.test(sentence)) return sentence;
  return null;
}

function resolveTimezone(timezone: string): string {
  if (DateTime.now().setZone(timezone).isValid) return timezone;
  log.warn('invalid_timezone', { timezone });
  return 'UTC';
}

/**
 * Resolve a deadline phrase to Unix ms.
 * Returns undefined when the sentence has no deadline phrase, null when it
 * has one that does not name a definite day.
 */
export function resolveDeadline(sentence: string, options: ExtractOptions): number | null | undefined {
  const match = sentence.match(DEADLINE_PATTERN);
  if (!match) return undefined;

  const phrase = match[1].trim();
  const timezone = resolveTimezone(options.timezone);
  const reference = DateTime.fromMillis(options.now, { zone: timezone });

  if (END_OF_DAY_PATTERN.test(phrase)) {
    return reference.endOf('day').toMillis();
  }

  const [result] = chrono.parse(
    phrase,
    { instant: reference.toJSDate(), timezone: reference.offset },
    { forwardDate: true }
  );
  if (!result) return null;

  const start = result.start;
  if (!start.isCertain('day') && !start.isCertain('weekday')) {
    return null;
  }

  const parsed = DateTime.fromJSDate(start.date(), { zone: timezone });
  return start.isCertain('hour') ? parsed.toMillis() : parsed.endOf('day').toMillis();
}

function assignPriority(content: string, dueDate: number | null, now: number): ActionPriority {
  if (URGENT_PATTERN.test(content)) return 'urgent';
  if (dueDate !== null && dueDate - now <= DAY_MS) return 'high';
  if (LOW_PRIORITY_PATTERN.test(content)) return 'low';
  return 'medium';
}

/**
 * Propose action items for an email. Pure: no store access.
 * No request, obligation, deadline or urgent subject means no candidates.
 */
export function extractActionItems(
  email: Pick<Email, 'subject' | 'body'>,
  options: ExtractOptions
): ActionItemCandidate[] {
  const content = `${email.subject}\n${email.body}`;
  const sentences = splitSentences(content);
  const candidates: ActionItemCandidate[] = [];
  const seen = new Set<string>();
  let deadlineSentence: string | null = null;

  for (const sentence of sentences) {
    if (COURTESY_PATTERN.test(sentence)) continue;
    if (!deadlineSentence && DEADLINE_PATTERN.test(sentence)) {
      deadlineSentence = sentence;
    }

    const action = matchAction(sentence);
    if (!action) continue;
    const title = toTitle(action);
    if (!title) continue;

    const normalized = normalizeTitle(title);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);

    const dueDate = resolveDeadline(sentence, options) ?? null;
    candidates.push({
      title,
      description: null,
      dueDate,
      priority: assignPriority(content, dueDate, options.now),
      sourceQuote: sentence,
    });
    if (candidates.length >= MAX_ITEMS_PER_EMAIL) break;
  }

  if (candidates.length > 0) return candidates;

  // A deadline or urgent subject with no explicit ask: one item for the whole email
  const subjectTitle = toTitle(email.subject);
  if (!subjectTitle) return [];

  const dueDate = deadlineSentence ? resolveDeadline(deadlineSentence, options) ?? null : null;
  const hasDeadline = deadlineSentence !== null
    && (dueDate !== null || STRONG_DEADLINE_PATTERN.test(deadlineSentence));
  if (!hasDeadline && !URGENT_SUBJECT_PATTERN.test(email.subject)) return [];

  return [{
    title: subjectTitle,
    description: null,
    dueDate,
    priority: assignPriority(content, dueDate, options.now),
    sourceQuote: deadlineSentence ?? email.subject,
  }];
}

/**
 * Runs extraction for one email and persists the new candidates.
 * Synchronous, so it can run inside the store transaction that ingested the email.
 */
export class ActionExtractor {
  private store: ActionItemStore;
  private timezone: string;

  constructor(store: ActionItemStore, options: { timezone: string }) {
    this.store = store;
    this.timezone = options.timezone;
  }

  /** One extraction pass. Returns the items it created. */
  run(email: ExtractableEmail, now: number): ActionItem[] {
    const candidates = extractActionItems(email, { now, timezone: this.timezone });
    const created: ActionItem[] = [];

    for (const candidate of candidates) {
      const existing = this.store.findOpenByEmailAndTitle(email.id, normalizeTitle(candidate.title));
      if (existing) continue;

      created.push(this.store.create({
        accountId: email.accountId,
        emailId: email.id,
        title: candidate.title,
        description: candidate.description,
        dueDate: candidate.dueDate,
        priority: candidate.priority,
        autoCreated: true,
        sourceQuote: candidate.sourceQuote,
      }, now));
    }

    if (created.length > 0) {
      log.debug('action_items_extracted', {
        emailId: email.id,
        candidates: candidates.length,
        created: created.length,
      });
    }
    return created;
  }
}
