/**
 * @fileoverview Action item type definitions.
 */

/** Ordered low → urgent. */
export const ACTION_PRIORITIES = ['low', 'medium', 'high', 'urgent'] as const;
export type ActionPriority = (typeof ACTION_PRIORITIES)[number];

export const ACTION_STATUSES = ['pending', 'completed', 'dismissed'] as const;
export type ActionStatus = (typeof ACTION_STATUSES)[number];

export interface ActionItem {
  id: string;
  accountId: string;
  /** Weak reference to the originating email; cleared when the email is purged */
  emailId: string | null;
  title: string;
  normalizedTitle: string;
  description: string | null;
  dueDate: number | null; // Unix ms
  priority: ActionPriority;
  status: ActionStatus;
  /** True when created by the extractor rather than a user/assistant command */
  autoCreated: boolean;
  /** Sentence the extractor derived the item from */
  sourceQuote: string | null;
  createdAt: number;
  completedAt: number | null;
  updatedAt: number;
}

export interface CreateActionItemInput {
  accountId: string;
  emailId?: string | null;
  title: string;
  description?: string | null;
  dueDate?: number | null;
  priority?: ActionPriority;
  autoCreated?: boolean;
  sourceQuote?: string | null;
}

/** Editable fields; status moves through complete/dismiss instead. */
export type ActionItemPatch = Partial<Pick<ActionItem, 'title' | 'description' | 'dueDate' | 'priority'>>;

/** What the extractor proposes before de-duplication and persistence. */
export interface ActionItemCandidate {
  title: string;
  description: string | null;
  dueDate: number | null;
  priority: ActionPriority;
  sourceQuote: string;
}

export interface ActionItemListOptions {
  status?: ActionStatus;
  emailId?: string;
  limit?: number;
}

export function isActionPriority(value: string): value is ActionPriority {
  return ACTION_PRIORITIES.some(p => p === value);
}

export function isActionStatus(value: string): value is ActionStatus {
  return ACTION_STATUSES.some(s => s === value);
}
