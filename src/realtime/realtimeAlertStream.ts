import type { NetworkError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Alert } from '../core/types.js';
import type { AlertFeed, AlertSubscription } from '../data/alertStore.js';

export type StreamDirection = 'incoming' | 'outgoing';

export const STREAM_DIRECTIONS: readonly StreamDirection[] = ['incoming', 'outgoing'];

export interface StreamListener {
  onRow(direction: StreamDirection, alert: Alert): void;
  onError(direction: StreamDirection, error: NetworkError): void;
  onReady?(direction: StreamDirection): void;
}

/**
 * One user's two logical subscriptions: incoming (rows where the user is the receiver)
 * and outgoing (rows the user sent). Rows are pushed as current state, at least once.
 * A failed subscription is dropped and reported; resubscribing is the owner's call.
 */
export class RealtimeAlertStream {
  private readonly active = new Map<StreamDirection, AlertSubscription>();

  constructor(
    private readonly feed: AlertFeed,
    private readonly userId: string,
    private readonly listener: StreamListener,
    private readonly logger?: Logger
  ) {}

  /** Replaces any live subscription for the direction. */
  subscribe(direction: StreamDirection): void {
    this.unsubscribe(direction);

    // Callbacks from a replaced subscription must not reach the listener.
    let handle: AlertSubscription | undefined;
    const current = (): boolean => handle !== undefined && this.active.get(direction) === handle;
    const handlers = {
      onRow: (alert: Alert) => {
        if (current()) this.listener.onRow(direction, alert);
      },
      onError: (error: NetworkError) => {
        if (!current()) return;
        this.active.delete(direction);
        this.logger?.warn('alert stream dropped', { direction, error: error.message });
        this.listener.onError(direction, error);
      },
      onReady: () => {
        if (current()) this.listener.onReady?.(direction);
      }
    };

    handle =
      direction === 'incoming'
        ? this.feed.subscribeByReceiver(this.userId, handlers)
        : this.feed.subscribeBySender(this.userId, handlers);
    this.active.set(direction, handle);
    this.logger?.debug('alert stream subscribed', { direction });
  }

  unsubscribe(direction: StreamDirection): void {
    const existing = this.active.get(direction);
    if (!existing) return;
    this.active.delete(direction);
    existing.unsubscribe();
  }

  isActive(direction: StreamDirection): boolean {
    return this.active.has(direction);
  }

  close(): void {
    for (const direction of STREAM_DIRECTIONS) this.unsubscribe(direction);
  }
}
