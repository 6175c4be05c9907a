/**
 * @fileoverview Huddle (shared discussion space) type definitions.
 */

export type HuddleStatus = 'active' | 'archived';
export type HuddleRole = 'owner' | 'admin' | 'member';

export interface Huddle {
  id: string;
  name: string;
  description: string | null;
  createdBy: string;
  status: HuddleStatus;
  createdAt: number;
  updatedAt: number;
}

export interface HuddleMember {
  huddleId: string;
  userEmail: string;
  role: HuddleRole;
  joinedAt: number;
}

export interface HuddleMessage {
  id: string;
  huddleId: string;
  senderEmail: string;
  text: string;
  createdAt: number;
}

export interface HuddleSharedEmail {
  huddleId: string;
  emailId: string;
  sharedBy: string;
  sharedAt: number;
}

/** A huddle with its ordered members and messages. */
export interface HuddleDetail extends Huddle {
  members: HuddleMember[];
  messages: HuddleMessage[];
  sharedEmails: HuddleSharedEmail[];
}
