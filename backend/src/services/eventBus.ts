/**
 * EventBus — typed pub/sub between the alert store and everything that streams rows.
 *
 * The store publishes every inserted or updated alert row on `alertChanged`; store
 * subscriptions and the WebSocket gateway listen on it. One bus per store instance,
 * created by whoever builds the store.
 */

import { EventEmitter } from 'node:events';
import type { Alert } from '../../../src/core/types.js';

// ── Channel payload types ────────────────────────────────────────────────────

export interface AlertChangedEvent {
  change: 'inserted' | 'updated';
  alert: Alert;
  timestamp: number;
}

export interface StoreClosedEvent {
  reason: string;
  timestamp: number;
}

// ── Channel map ──────────────────────────────────────────────────────────────

export interface ChannelPayloads {
  alertChanged: AlertChangedEvent;
  storeClosed: StoreClosedEvent;
}

export type Channel = keyof ChannelPayloads;

// ── EventBus class ───────────────────────────────────────────────────────────

export class EventBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    // Two listeners (incoming + outgoing) per connected session.
    this.emitter.setMaxListeners(0);
  }

  /** Publish an event on a channel. */
  emit<C extends Channel>(channel: C, payload: ChannelPayloads[C]): void {
    this.emitter.emit(channel, payload);
  }

  /** Subscribe to a channel. Returns an unsubscribe function. */
  on<C extends Channel>(channel: C, handler: (payload: ChannelPayloads[C]) => void): () => void {
    this.emitter.on(channel, handler);
    return () => this.emitter.off(channel, handler);
  }

  /** Current listener count for a channel. */
  listenerCount(channel: Channel): number {
    return this.emitter.listenerCount(channel);
  }
}
