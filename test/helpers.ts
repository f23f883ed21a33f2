/**
 * Shared test helpers — mock factories, a manual clock and in-memory stand-ins.
 */

import { NetworkError } from '../src/core/errors.js';
import type { Clock } from '../src/core/clock.js';
import type { Logger, LogLevel } from '../src/core/logger.js';
import type { Metrics } from '../src/core/metrics.js';
import type { Alert } from '../src/core/types.js';
import { loadConfig } from '../src/config/load.js';
import type { AppConfig } from '../src/config/types.js';
import type {
  AlertFeed,
  AlertPatch,
  AlertStore,
  AlertStreamHandlers,
  AlertSubscription,
  UpdateOutcome
} from '../src/data/alertStore.js';
import type { NewAlert } from '../src/core/types.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
}

export const createMockLogger = (
  entries: LogEntry[] = [],
  bindings: Record<string, unknown> = {}
): Logger & { entries: LogEntry[] } => {
  const write = (level: LogLevel) => (message: string, context?: Record<string, unknown>) => {
    entries.push({ level, message, context: { ...bindings, ...context } });
  };
  return {
    entries,
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (more) => createMockLogger(entries, { ...bindings, ...more })
  };
};

// ── Mock Metrics ────────────────────────────────────────────────────

export const createMockMetrics = (): Metrics & { counters: Map<string, number> } => {
  const counters = new Map<string, number>();
  return {
    counters,
    increment(name: string, value = 1) { counters.set(name, (counters.get(name) ?? 0) + value); },
    gauge() {},
  };
};

// ── Clock ───────────────────────────────────────────────────────────

/** 2026-01-15T12:00:00.000Z */
export const T0 = Date.UTC(2026, 0, 15, 12, 0, 0);

export class ManualClock implements Clock {
  constructor(public current = T0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

// ── Config ──────────────────────────────────────────────────────────

export const testConfig = (env: Record<string, string> = {}): AppConfig =>
  loadConfig({ NODE_ENV: 'test', DB_PATH: ':memory:', MARKER_DB_PATH: ':memory:', ...env });

// ── Alert Factory ───────────────────────────────────────────────────

let alertSeq = 0;

export function makeAlert(overrides: Partial<Alert> = {}): Alert {
  alertSeq++;
  return {
    id: `alert-${alertSeq}`,
    senderId: 'user-a',
    receiverId: 'user-b',
    plateFingerprint: 'a'.repeat(64),
    message: null,
    response: null,
    responseMessage: null,
    createdAt: T0,
    readAt: null,
    respondedAt: null,
    pushSentAt: null,
    ...overrides,
  };
}

// ── In-memory feed with controllable subscriptions ──────────────────

type Direction = 'incoming' | 'outgoing';

interface FakeSubscription {
  direction: Direction;
  userId: string;
  handlers: AlertStreamHandlers;
  active: boolean;
}

export class FakeFeed implements AlertFeed {
  readonly rows = new Map<string, Alert>();
  readonly subscriptions: FakeSubscription[] = [];
  queryCalls = 0;

  put(alert: Alert): void {
    this.rows.set(alert.id, alert);
  }

  async findById(id: string): Promise<Alert | null> {
    return this.rows.get(id) ?? null;
  }

  async queryByReceiver(userId: string): Promise<Alert[]> {
    this.queryCalls++;
    return [...this.rows.values()].filter((a) => a.receiverId === userId);
  }

  async queryBySender(userId: string): Promise<Alert[]> {
    this.queryCalls++;
    return [...this.rows.values()].filter((a) => a.senderId === userId);
  }

  subscribeByReceiver(userId: string, handlers: AlertStreamHandlers): AlertSubscription {
    return this.track('incoming', userId, handlers);
  }

  subscribeBySender(userId: string, handlers: AlertStreamHandlers): AlertSubscription {
    return this.track('outgoing', userId, handlers);
  }

  /** Store the row and push it to every live subscription that matches. */
  push(alert: Alert): void {
    this.put(alert);
    for (const sub of this.live()) {
      const match = sub.direction === 'incoming' ? alert.receiverId === sub.userId : alert.senderId === sub.userId;
      if (match) sub.handlers.onRow(alert);
    }
  }

  fail(direction: Direction): void {
    for (const sub of this.live(direction)) {
      sub.active = false;
      sub.handlers.onError(new NetworkError(`${direction} stream dropped`));
    }
  }

  ready(direction: Direction): void {
    for (const sub of this.live(direction)) sub.handlers.onReady?.();
  }

  activeCount(direction?: Direction): number {
    return this.live(direction).length;
  }

  subscribeCount(direction: Direction): number {
    return this.subscriptions.filter((s) => s.direction === direction).length;
  }

  private live(direction?: Direction): FakeSubscription[] {
    return this.subscriptions.filter((s) => s.active && (direction === undefined || s.direction === direction));
  }

  private track(direction: Direction, userId: string, handlers: AlertStreamHandlers): AlertSubscription {
    const sub: FakeSubscription = { direction, userId, handlers, active: true };
    this.subscriptions.push(sub);
    return { unsubscribe: () => { sub.active = false; } };
  }
}

// ── Store wrapper that fails inserts for chosen receivers ───────────

export class FailingInsertStore implements AlertStore {
  constructor(
    private readonly inner: AlertStore,
    private readonly failFor: Set<string>
  ) {}

  async insert(alert: NewAlert): Promise<Alert> {
    if (this.failFor.has(alert.receiverId)) throw new Error(`disk full for ${alert.receiverId}`);
    return this.inner.insert(alert);
  }

  findById(id: string): Promise<Alert | null> { return this.inner.findById(id); }
  updateReadAndResponse(id: string, patch: AlertPatch): Promise<UpdateOutcome> { return this.inner.updateReadAndResponse(id, patch); }
  markPushSent(id: string, at: number): Promise<void> { return this.inner.markPushSent(id, at); }
  queryByReceiver(userId: string): Promise<Alert[]> { return this.inner.queryByReceiver(userId); }
  queryBySender(userId: string): Promise<Alert[]> { return this.inner.queryBySender(userId); }
  subscribeByReceiver(userId: string, handlers: AlertStreamHandlers): AlertSubscription { return this.inner.subscribeByReceiver(userId, handlers); }
  subscribeBySender(userId: string, handlers: AlertStreamHandlers): AlertSubscription { return this.inner.subscribeBySender(userId, handlers); }
}
