/**
 * @fileoverview Publishes change events after commits.
 *
 * Fanout failures are logged and dropped: the write they describe has
 * already committed.
 */

import { createLogger } from '../../../utils/observability/index.js';
import type { ChangeEvent, NotificationFanout } from '../types.js';

const log = createLogger({ domain: 'notifications' });

export class Notifier {
  private fanout: NotificationFanout;

  constructor(fanout: NotificationFanout) {
    this.fanout = fanout;
  }

  async publish(accountId: string, event: ChangeEvent): Promise<void> {
    try {
      await this.fanout.publish(accountId, event);
    } catch (error) {
      log.warn('publish_failed', {
        accountId,
        eventType: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async publishAll(accountId: string, events: ChangeEvent[]): Promise<void> {
    for (const event of events) {
      await this.publish(accountId, event);
    }
  }
}
