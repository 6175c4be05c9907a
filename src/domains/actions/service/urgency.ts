/**
 * @fileoverview Keyword and sender based urgency scoring.
 *
 * Scores 0-100 from independent signals; an email is urgent when the
 * score reaches the configured threshold.
 */

export interface UrgencyInput {
  sender: string;
  senderName: string | null;
  subject: string;
  body: string;
  snippet?: string;
}

export interface UrgencyScore {
  score: number;
  isUrgent: boolean;
  /** Signals that contributed, joined with "; " */
  reason: string;
}

const HIGH_PRIORITY_KEYWORDS = [
  'urgent', 'asap', 'critical', 'emergency', 'immediate',
  'crisis', 'escalation', 'blocker', 'showstopper',
];

const TIME_SENSITIVE_KEYWORDS = [
  'today', 'tomorrow', 'eod', 'cob', 'deadline', 'due date',
  'by end of', 'within', 'expires', 'expiring', 'overdue',
];

const ACTION_KEYWORDS = [
  'please review', 'need approval', 'waiting for', 'action required',
  'please confirm', 'please respond', 'need your', 'require your',
  'can you', 'could you', 'would you', 'will you',
];

const FOLLOWUP_KEYWORDS = [
  'follow up', 'following up', 'reminder', 'second request',
  "haven't heard", 'checking in', 'any update', 'status update',
];

const IMPORTANT_TITLES = [
  'ceo', 'cto', 'cfo', 'coo', 'president', 'vice president', 'vp',
  'director', 'manager', 'supervisor', 'head of', 'chief', 'executive',
];

const IMPORTANT_DOMAINS = ['legal', 'compliance', 'finance', 'hr', 'security'];

const MAX_ACTION_MATCHES = 2;

function containsWord(haystack: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^a-z0-9])${escaped}($|[^a-z0-9])`).test(haystack);
}

function senderImportance(sender: string, senderName: string | null): { points: number; reason: string } | null {
  const address = sender.toLowerCase();
  const name = (senderName ?? '').toLowerCase();
  const localPart = address.split('@')[0] ?? '';
  const domain = address.split('@')[1] ?? '';

  for (const title of IMPORTANT_TITLES) {
    if (containsWord(name, title) || containsWord(localPart, title)) {
      return { points: 40, reason: `Important sender title: ${title}` };
    }
  }
  for (const keyword of IMPORTANT_DOMAINS) {
    if (containsWord(localPart, keyword) || containsWord(domain, keyword)) {
      return { points: 30, reason: `Important domain: ${keyword}` };
    }
  }
  return null;
}

function hasAllCapsWord(subject: string): boolean {
  return subject
    .split(/\s+/)
    .some(word => word.length > 2 && word === word.toUpperCase() && word !== word.toLowerCase());
}

export function scoreUrgency(email: UrgencyInput, threshold = 40): UrgencyScore {
  let score = 0;
  const reasons: string[] = [];
  const content = `${email.subject} ${email.body || email.snippet || ''}`.toLowerCase();

  const highPriority = HIGH_PRIORITY_KEYWORDS.find(k => containsWord(content, k));
  if (highPriority) {
    score += 30;
    reasons.push(`High-priority keyword: ${highPriority}`);
  }

  const timeSensitive = TIME_SENSITIVE_KEYWORDS.find(k => containsWord(content, k));
  if (timeSensitive) {
    score += 20;
    reasons.push(`Time-sensitive: ${timeSensitive}`);
  }

  const actions = ACTION_KEYWORDS.filter(k => containsWord(content, k)).slice(0, MAX_ACTION_MATCHES);
  for (const action of actions) {
    score += 15;
    reasons.push(`Action required: ${action}`);
  }

  const followUp = FOLLOWUP_KEYWORDS.find(k => containsWord(content, k));
  if (followUp) {
    score += 15;
    reasons.push(`Follow-up detected: ${followUp}`);
  }

  const sender = senderImportance(email.sender, email.senderName);
  if (sender) {
    score += sender.points;
    reasons.push(sender.reason);
  }

  if (hasAllCapsWord(email.subject)) {
    score += 10;
    reasons.push('All-caps words in subject');
  }
  if (email.subject.includes('!!')) {
    score += 10;
    reasons.push('Multiple exclamation marks');
  }
  if (/\[(urgent|important|action|priority)\]/i.test(email.subject)) {
    score += 20;
    reasons.push('Priority tag in subject');
  }

  const replyCount = (email.subject.toLowerCase().match(/\bre:/g) ?? []).length;
  if (replyCount >= 2) {
    score += 15;
    reasons.push(`Multiple replies in thread (${replyCount})`);
  }

  score = Math.min(score, 100);
  return {
    score,
    isUrgent: score >= threshold,
    reason: reasons.length > 0 ? reasons.join('; ') : 'No specific urgency indicators',
  };
}
