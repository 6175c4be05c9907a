/**
 * @fileoverview Huddle rules on top of the huddle store.
 *
 * The creator is the owner. Owners and admins add members; only the
 * owner removes them and the owner can never be removed. Archived
 * huddles are read-only.
 */

import type { LocalStore } from '../../../services/store/index.js';
import { ForbiddenError, InvalidStateError, NotFoundError } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import type { Huddle, HuddleDetail, HuddleMember, HuddleMessage, HuddleRole, HuddleStatus } from '../types.js';

const log = createLogger({ domain: 'huddles' });

export interface CreateHuddleInput {
  creator: string;
  name: string;
  members?: string[];
  description?: string | null;
}

export class HuddleService {
  private store: LocalStore;
  private now: () => number;

  constructor(store: LocalStore, now: () => number = Date.now) {
    this.store = store;
    this.now = now;
  }

  /** Create a huddle. Duplicate and self entries in `members` collapse. */
  create(input: CreateHuddleInput): HuddleDetail {
    const name = input.name.trim();
    if (!name) {
      throw new InvalidStateError('Huddle name is required');
    }

    const huddle = this.store.transaction(() => {
      const now = this.now();
      const created = this.store.huddles.create(
        { name, description: input.description ?? null, createdBy: input.creator.toLowerCase() },
        now
      );
      this.store.huddles.addMember(created.id, input.creator, 'owner', now);
      for (const member of input.members ?? []) {
        if (member.trim()) {
          this.store.huddles.addMember(created.id, member.trim(), 'member', now);
        }
      }
      return created;
    });

    log.info('huddle_created', { huddleId: huddle.id, memberCount: (input.members ?? []).length + 1 });
    return this.get(huddle.id);
  }

  get(huddleId: string): HuddleDetail {
    const huddle = this.requireHuddle(huddleId);
    return {
      ...huddle,
      members: this.store.huddles.listMembers(huddleId),
      messages: this.store.huddles.listMessages(huddleId),
      sharedEmails: this.store.huddles.listSharedEmails(huddleId),
    };
  }

  listForUser(userEmail: string, status?: HuddleStatus): Huddle[] {
    return this.store.huddles.listForUser(userEmail, status);
  }

  /** Add a member. Adding someone already present changes nothing. */
  addMember(huddleId: string, actor: string, userEmail: string, role: HuddleRole = 'member'): HuddleMember {
    this.requireActive(huddleId);
    const actorRole = this.requireMember(huddleId, actor).role;
    if (actorRole !== 'owner' && actorRole !== 'admin') {
      throw new ForbiddenError('Only owners and admins can add members', { huddleId });
    }
    if (role === 'owner') {
      throw new InvalidStateError('A huddle has exactly one owner', { huddleId });
    }

    const now = this.now();
    if (this.store.huddles.addMember(huddleId, userEmail, role, now)) {
      this.store.huddles.touch(huddleId, now);
    }
    return this.requireMember(huddleId, userEmail);
  }

  removeMember(huddleId: string, actor: string, userEmail: string): void {
    this.requireActive(huddleId);
    if (this.requireMember(huddleId, actor).role !== 'owner') {
      throw new ForbiddenError('Only the owner can remove members', { huddleId });
    }
    const target = this.store.huddles.getMember(huddleId, userEmail);
    if (!target) {
      throw new NotFoundError('HuddleMember', userEmail);
    }
    if (target.role === 'owner') {
      throw new InvalidStateError('Cannot remove the huddle owner', { huddleId });
    }
    this.store.huddles.removeMember(huddleId, userEmail);
    this.store.huddles.touch(huddleId, this.now());
  }

  postMessage(huddleId: string, sender: string, text: string): HuddleMessage {
    this.requireActive(huddleId);
    this.requireMember(huddleId, sender);
    if (!text.trim()) {
      throw new InvalidStateError('Message text is required', { huddleId });
    }

    const now = this.now();
    const message = this.store.transaction(() => {
      const posted = this.store.huddles.addMessage(huddleId, sender, text, now);
      this.store.huddles.touch(huddleId, now);
      return posted;
    });
    return message;
  }

  /** Share one of the sharer's emails with the huddle. Sharing twice is a no-op. */
  shareEmail(huddleId: string, sharer: string, emailId: string): void {
    this.requireActive(huddleId);
    this.requireMember(huddleId, sharer);

    const email = this.store.emails.getForAccount(sharer, emailId);
    if (!email) {
      throw new NotFoundError('Email', emailId);
    }
    const now = this.now();
    if (this.store.huddles.shareEmail(huddleId, emailId, sharer, now)) {
      this.store.huddles.touch(huddleId, now);
    }
  }

  /** Archive a huddle. Only the owner may; archiving twice is a no-op. */
  archive(huddleId: string, actor: string): Huddle {
    const huddle = this.requireHuddle(huddleId);
    if (this.requireMember(huddleId, actor).role !== 'owner') {
      throw new ForbiddenError('Only the owner can archive a huddle', { huddleId });
    }
    if (huddle.status !== 'archived') {
      this.store.huddles.setStatus(huddleId, 'archived', this.now());
    }
    return this.requireHuddle(huddleId);
  }

  private requireHuddle(huddleId: string): Huddle {
    const huddle = this.store.huddles.getById(huddleId);
    if (!huddle) {
      throw new NotFoundError('Huddle', huddleId);
    }
    return huddle;
  }

  private requireActive(huddleId: string): Huddle {
    const huddle = this.requireHuddle(huddleId);
    if (huddle.status === 'archived') {
      throw new InvalidStateError(`Huddle ${huddleId} is archived`, { huddleId });
    }
    return huddle;
  }

  private requireMember(huddleId: string, userEmail: string): HuddleMember {
    const member = this.store.huddles.getMember(huddleId, userEmail);
    if (!member) {
      throw new ForbiddenError('Not a member of this huddle', { huddleId });
    }
    return member;
  }
}
