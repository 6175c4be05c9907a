/**
 * Unit tests for heuristic action item extraction.
 */

import { beforeEach, describe, expect, it } from 'vitest';
import {
  ActionExtractor,
  extractActionItems,
  resolveDeadline,
} from '../../../src/domains/actions/service/extractor.js';
import { normalizeTitle } from '../../../src/domains/actions/service/normalize.js';
import type { LocalStore } from '../../../src/services/store/index.js';
import { createTestStore, seedEmail } from '../../helpers/store.js';

// Monday 2025-03-10, 09:00 UTC
const NOW = Date.parse('2025-03-10T09:00:00Z');
const OPTIONS = { now: NOW, timezone: 'UTC' };

describe('normalizeTitle', () => {
  it('lowercases, strips punctuation and drops a leading please', () => {
    expect(normalizeTitle('Please, Review the Q3 budget!!')).toBe('review the q3 budget');
  });
});

describe('resolveDeadline', () => {
  it('returns undefined when the sentence has no deadline phrase', () => {
    expect(resolveDeadline('Send the report.', OPTIONS)).toBeUndefined();
  });

  it('resolves a weekday to the end of that day', () => {
    expect(resolveDeadline('Review it by Friday.', OPTIONS)).toBe(Date.parse('2025-03-14T23:59:59.999Z'));
  });

  it('resolves end of day against now', () => {
    expect(resolveDeadline('Send it by end of day.', OPTIONS)).toBe(Date.parse('2025-03-10T23:59:59.999Z'));
  });

  it('reads the deadline in the configured timezone', () => {
    const due = resolveDeadline('Send it by end of day.', { now: NOW, timezone: 'America/New_York' });

    // 09:00 UTC is 05:00 EDT; the day ends at 03:59:59.999 UTC on the 11th
    expect(due).toBe(Date.parse('2025-03-11T03:59:59.999Z'));
  });

  it('returns null for a phrase that names no definite day', () => {
    expect(resolveDeadline('Send the slides by sometime soon.', OPTIONS)).toBeNull();
  });
});

describe('extractActionItems', () => {
  it('turns a request with a weekday deadline into one item', () => {
    const items = extractActionItems({
      subject: 'Budget review',
      body: 'Hi Sam,\nCould you review the Q3 budget by Friday? Thanks!',
    }, OPTIONS);

    expect(items).toEqual([{
      title: 'Review the Q3 budget by Friday',
      description: null,
      dueDate: Date.parse('2025-03-14T23:59:59.999Z'),
      priority: 'medium',
      sourceQuote: 'Could you review the Q3 budget by Friday?',
    }]);
  });

  it('marks a deadline within a day as high priority', () => {
    const [item] = extractActionItems({
      subject: 'Report',
      body: 'Please send the report by end of day.',
    }, OPTIONS);

    expect(item.title).toBe('Send the report by end of day');
    expect(item.dueDate).toBe(Date.parse('2025-03-10T23:59:59.999Z'));
    expect(item.priority).toBe('high');
  });

  it('marks urgent wording as urgent priority', () => {
    const items = extractActionItems({
      subject: 'URGENT: server down',
      body: 'Please restart the API server immediately.',
    }, OPTIONS);

    expect(items).toHaveLength(1);
    expect(items[0].title).toBe('Restart the API server immediately');
    expect(items[0].priority).toBe('urgent');
    expect(items[0].dueDate).toBeNull();
  });

  it('marks relaxed wording as low priority', () => {
    const [item] = extractActionItems({
      subject: 'Docs',
      body: 'Could you update the wiki page when you get time?',
    }, OPTIONS);

    expect(item.title).toBe('Update the wiki page when you get time');
    expect(item.priority).toBe('low');
  });

  it('leaves the due date null when the deadline is ambiguous', () => {
    const [item] = extractActionItems({
      subject: 'Slides',
      body: 'Could you send the slides by sometime soon?',
    }, OPTIONS);

    expect(item.title).toBe('Send the slides by sometime soon');
    expect(item.dueDate).toBeNull();
  });

  it('falls back to the subject when a deadline has no explicit ask', () => {
    const items = extractActionItems({
      subject: 'Quarterly report',
      body: 'The report is due on March 14.',
    }, OPTIONS);

    expect(items).toEqual([{
      title: 'Quarterly report',
      description: null,
      dueDate: Date.parse('2025-03-14T23:59:59.999Z'),
      priority: 'medium',
      sourceQuote: 'The report is due on March 14.',
    }]);
  });

  it('returns nothing for an email without any ask', () => {
    const items = extractActionItems({
      subject: 'Lunch photos',
      body: 'Here are the photos from Saturday. Thanks for coming!',
    }, OPTIONS);

    expect(items).toEqual([]);
  });

  it('caps the number of items per email', () => {
    const body = [1, 2, 3, 4, 5, 6, 7].map(n => `Please do task ${n}.`).join(' ');

    const items = extractActionItems({ subject: 'Chores', body }, OPTIONS);

    expect(items.map(i => i.title)).toEqual(['Do task 1', 'Do task 2', 'Do task 3', 'Do task 4', 'Do task 5']);
  });

  it('collapses the same ask repeated in one email', () => {
    const items = extractActionItems({
      subject: 'Forms',
      body: 'Please sign the form. Sign the form!',
    }, OPTIONS);

    expect(items.map(i => i.title)).toEqual(['Sign the form']);
  });
});

describe('ActionExtractor', () => {
  let store: LocalStore;
  let extractor: ActionExtractor;

  beforeEach(() => {
    store = createTestStore();
    extractor = new ActionExtractor(store.actionItems, { timezone: 'UTC' });
  });

  it('persists candidates as auto-created items linked to the email', () => {
    const email = seedEmail(store, { subject: 'Report', body: 'Please send the report by end of day.' });

    const [item] = extractor.run(email, NOW);

    expect(item).toMatchObject({
      accountId: email.accountId,
      emailId: email.id,
      title: 'Send the report by end of day',
      normalizedTitle: 'send the report by end of day',
      autoCreated: true,
      status: 'pending',
      createdAt: NOW,
    });
    expect(store.actionItems.getById(item.id)).toEqual(item);
  });

  it('does not duplicate an open item on a second pass', () => {
    const email = seedEmail(store, { subject: 'Report', body: 'Please send the report by end of day.' });

    expect(extractor.run(email, NOW)).toHaveLength(1);
    expect(extractor.run(email, NOW)).toHaveLength(0);
    expect(store.actionItems.list(email.accountId)).toHaveLength(1);
  });

  it('creates the item again once the earlier one is completed', () => {
    const email = seedEmail(store, { subject: 'Report', body: 'Please send the report by end of day.' });
    const [first] = extractor.run(email, NOW);
    store.actionItems.setStatus(first.id, 'completed', NOW);

    expect(extractor.run(email, NOW)).toHaveLength(1);
  });

  it('falls back to UTC for an unknown timezone', () => {
    const lenient = new ActionExtractor(store.actionItems, { timezone: 'Mars/Olympus_Mons' });
    const email = seedEmail(store, { subject: 'Report', body: 'Please send the report by end of day.' });

    const [item] = lenient.run(email, NOW);

    expect(item.dueDate).toBe(Date.parse('2025-03-10T23:59:59.999Z'));
  });
});
