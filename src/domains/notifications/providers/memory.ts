/**
 * @fileoverview In-process fanout backed by an EventEmitter.
 */

import { EventEmitter } from 'events';
import type { ChangeEvent, ChangeListener, NotificationFanout } from '../types.js';

const ALL_ACCOUNTS = '*';

export class InMemoryFanout implements NotificationFanout {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(0);
  }

  publish(accountId: string, event: ChangeEvent): void {
    this.emitter.emit(accountId, event, accountId);
    this.emitter.emit(ALL_ACCOUNTS, event, accountId);
  }

  /**
   * Listen for one account's events, or every account's with '*'.
   * Returns an unsubscribe function.
   */
  subscribe(accountId: string, listener: ChangeListener): () => void {
    this.emitter.on(accountId, listener);
    return () => {
      this.emitter.off(accountId, listener);
    };
  }

  listenerCount(accountId: string): number {
    return this.emitter.listenerCount(accountId);
  }
}
