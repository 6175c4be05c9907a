/**
 * @fileoverview Intent parameter schemas.
 *
 * The closed intent vocabulary. Anything outside it is unsupported;
 * anything inside it with missing or malformed parameters is incomplete
 * and never executed.
 */

import { z } from 'zod';
import { IncompleteIntentError, UnsupportedIntentError } from '../../../utils/errors.js';
import { ACTION_PRIORITIES, ACTION_STATUSES } from '../../actions/types.js';

const isoDateString = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), 'Invalid ISO date string');

/** ISO string or Unix ms, normalized to Unix ms. */
const timestamp = z.union([z.number().int().nonnegative(), isoDateString.transform((s) => Date.parse(s))]);

const nonEmpty = z.string().trim().min(1);

const address = z.string().trim().email();

/** One address or a list of them, normalized to a list. */
const addressList = z
  .union([address, z.array(address)])
  .transform((value) => (Array.isArray(value) ? value : [value]));

export const EmailFilterSchema = z.object({
  query: z.string().optional(),
  from: z.string().optional(),
  isRead: z.boolean().optional(),
  isStarred: z.boolean().optional(),
  label: z.string().optional(),
  receivedAfter: timestamp.optional(),
  receivedBefore: timestamp.optional(),
  limit: z.number().int().positive().max(500).optional(),
});

/** emailId, emailIds or a filter evaluated at execution time. */
export const TargetSchema = z
  .object({
    emailId: nonEmpty.optional(),
    emailIds: z.array(nonEmpty).min(1).optional(),
    filter: EmailFilterSchema.optional(),
  })
  .superRefine((value, ctx) => {
    if (!value.emailId && !value.emailIds && !value.filter) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['emailId'],
        message: 'One of emailId, emailIds or filter is required',
      });
    }
  });

export const SearchSchema = z.object({
  query: z.string().default(''),
  filters: EmailFilterSchema.default({}),
});

export const ComposeSchema = z.object({
  to: addressList.refine((list) => list.length > 0, 'At least one recipient is required'),
  cc: addressList.optional(),
  subject: nonEmpty,
  body: nonEmpty,
});

export const ReplySchema = z.object({
  emailId: nonEmpty,
  body: nonEmpty,
});

export const CreateActionItemSchema = z.object({
  title: nonEmpty.max(500),
  dueDate: timestamp.nullable().optional(),
  priority: z.enum(ACTION_PRIORITIES).optional(),
  description: z.string().nullable().optional(),
  emailId: nonEmpty.optional(),
});

export const CompleteActionItemSchema = z.object({
  id: nonEmpty,
});

export const ListActionItemsSchema = z.object({
  status: z.enum(ACTION_STATUSES).optional(),
  limit: z.number().int().positive().max(500).optional(),
});

export const CreateHuddleSchema = z.object({
  name: nonEmpty,
  members: z.array(address).default([]),
  description: z.string().nullable().optional(),
});

export type EmailFilterParams = z.infer<typeof EmailFilterSchema>;
export type TargetParams = z.infer<typeof TargetSchema>;
export type CreateActionItemParams = z.infer<typeof CreateActionItemSchema>;

export type Intent =
  | { name: 'search'; params: z.infer<typeof SearchSchema> }
  | { name: 'markRead'; params: TargetParams }
  | { name: 'markUnread'; params: TargetParams }
  | { name: 'star'; params: TargetParams }
  | { name: 'unstar'; params: TargetParams }
  | { name: 'moveToTrash'; params: TargetParams }
  | { name: 'restore'; params: TargetParams }
  | { name: 'compose'; params: z.infer<typeof ComposeSchema> }
  | { name: 'reply'; params: z.infer<typeof ReplySchema> }
  | { name: 'createActionItem'; params: z.infer<typeof CreateActionItemSchema> }
  | { name: 'completeActionItem'; params: z.infer<typeof CompleteActionItemSchema> }
  | { name: 'listActionItems'; params: z.infer<typeof ListActionItemsSchema> }
  | { name: 'createHuddle'; params: z.infer<typeof CreateHuddleSchema> };

export type IntentName = Intent['name'];

/** Structured intent as the language-model collaborator hands it over. */
export interface RawIntent {
  name: string;
  params?: unknown;
}

function validate<T extends z.ZodTypeAny>(name: string, schema: T, params: unknown): z.output<T> {
  const result = schema.safeParse(params ?? {});
  if (result.success) {
    return result.data;
  }

  const fields = [...new Set(result.error.issues.map((issue) => issue.path.join('.') || '(params)'))];
  const details = result.error.issues
    .map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`)
    .join('; ');
  throw new IncompleteIntentError(name, fields, `Intent ${name} is incomplete: ${details}`);
}

/**
 * Validate a raw intent against the vocabulary.
 * @throws UnsupportedIntentError for an unknown name
 * @throws IncompleteIntentError when parameters are missing or malformed
 */
export function parseIntent(raw: RawIntent): Intent {
  const { name, params } = raw;
  switch (name) {
    case 'search':
      return { name, params: validate(name, SearchSchema, params) };
    case 'markRead':
    case 'markUnread':
    case 'star':
    case 'unstar':
    case 'moveToTrash':
    case 'restore':
      return { name, params: validate(name, TargetSchema, params) };
    case 'compose':
      return { name, params: validate(name, ComposeSchema, params) };
    case 'reply':
      return { name, params: validate(name, ReplySchema, params) };
    case 'createActionItem':
      return { name, params: validate(name, CreateActionItemSchema, params) };
    case 'completeActionItem':
      return { name, params: validate(name, CompleteActionItemSchema, params) };
    case 'listActionItems':
      return { name, params: validate(name, ListActionItemsSchema, params) };
    case 'createHuddle':
      return { name, params: validate(name, CreateHuddleSchema, params) };
    default:
      throw new UnsupportedIntentError(name);
  }
}
