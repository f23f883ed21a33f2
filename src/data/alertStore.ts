/**
 * Alert Store — durable storage plus change notification for alert rows.
 *
 * Writers go through `AlertService`; sessions only read and subscribe, so they depend on
 * the narrower `AlertFeed`.
 */

import type { NetworkError } from '../core/errors.js';
import type { Alert, AlertResponse, NewAlert } from '../core/types.js';

export interface ResponsePatch {
  value: AlertResponse;
  message: string | null;
  respondedAt: number;
  /** Apply only when the row has no response yet (first-write-wins). */
  onlyIfUnanswered: boolean;
}

/**
 * `readAt` is applied only while the row is unread. A response patch also sets
 * `readAt` to `respondedAt` when the row is unread, in the same write.
 */
export interface AlertPatch {
  readAt?: number;
  response?: ResponsePatch;
}

export type UpdateOutcome =
  | { status: 'updated'; alert: Alert }
  | { status: 'unchanged'; alert: Alert }
  | { status: 'not_found' };

export interface AlertStreamHandlers {
  /** Current state of one row. Delivery is at-least-once; treat it as a snapshot, not a delta. */
  onRow(alert: Alert): void;
  /** The subscription is dead after this call. */
  onError(error: NetworkError): void;
  /** The subscription is established and rows will flow. */
  onReady?(): void;
}

export interface AlertSubscription {
  unsubscribe(): void;
}

export interface AlertFeed {
  findById(id: string): Promise<Alert | null>;
  queryByReceiver(userId: string): Promise<Alert[]>;
  queryBySender(userId: string): Promise<Alert[]>;
  subscribeByReceiver(userId: string, handlers: AlertStreamHandlers): AlertSubscription;
  subscribeBySender(userId: string, handlers: AlertStreamHandlers): AlertSubscription;
}

export interface AlertStore extends AlertFeed {
  /** Assigns `id` and `createdAt`. */
  insert(alert: NewAlert): Promise<Alert>;
  updateReadAndResponse(id: string, patch: AlertPatch): Promise<UpdateOutcome>;
  markPushSent(id: string, at: number): Promise<void>;
}
