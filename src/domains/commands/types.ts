/**
 * @fileoverview Command interpreter result types.
 */

import type { ActionItem } from '../actions/types.js';
import type { HuddleDetail } from '../huddles/types.js';
import type { Email } from '../mailbox/types.js';

export type { Intent, IntentName, RawIntent } from './service/schema.js';

/** Outcome for one email of a batch intent. */
export interface TargetResult {
  emailId: string;
  ok: boolean;
  error?: string;
  code?: string;
}

export type IntentResult =
  | { kind: 'emails'; emails: Email[] }
  | { kind: 'batch'; total: number; succeeded: number; failed: number; results: TargetResult[] }
  | { kind: 'sent'; emailId: string; remoteId: string }
  | { kind: 'actionItem'; item: ActionItem }
  | { kind: 'actionItems'; items: ActionItem[] }
  | { kind: 'huddle'; huddle: HuddleDetail };

/** What executeIntent hands back to the request layer. */
export type IntentOutcome =
  | { status: 'ok'; intent: string; result: IntentResult }
  | { status: 'rejected'; intent: string; code: string; message: string };
