/**
 * @fileoverview Change events published to connected clients.
 */

export type ChangeEvent =
  | { type: 'EmailCreated'; emailId: string }
  | { type: 'EmailUpdated'; emailId: string }
  | { type: 'ActionItemCreated'; actionItemId: string }
  | { type: 'ActionItemUpdated'; actionItemId: string }
  | { type: 'TrashPurged'; emailId: string };

/** Delivery of change events to whoever is listening for an account. */
export interface NotificationFanout {
  publish(accountId: string, event: ChangeEvent): Promise<void> | void;
}

export type ChangeListener = (event: ChangeEvent, accountId: string) => void;
