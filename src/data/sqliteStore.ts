import type Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { EventBus } from '../../backend/src/services/eventBus.js';
import { systemClock, type Clock } from '../core/clock.js';
import { NetworkError, errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Alert, EntitlementState, NewAlert, PlateRegistration, Tier, UserStats } from '../core/types.js';
import { decodeResponse, encodeResponse } from '../alerts/response.js';
import type {
  AlertPatch,
  AlertStore,
  AlertStreamHandlers,
  AlertSubscription,
  UpdateOutcome
} from './alertStore.js';
import type { ConsumeOutcome, ConsumeRequest, EntitlementStore } from './entitlementStore.js';
import { openDatabase } from './openDatabase.js';
import type { PlateDirectory, RegisterOutcome } from './plateDirectory.js';
import type { StatField, StatsStore } from './statsStore.js';

interface AlertRow {
  id: string;
  sender_id: string;
  receiver_id: string;
  plate_hash: string;
  message: string | null;
  response: string | null;
  response_message: string | null;
  created_at: number;
  read_at: number | null;
  response_at: number | null;
  push_sent_at: number | null;
}

interface EntitlementRow {
  tier: Tier;
  daily_used: number;
  window_start: number;
}

const STAT_COLUMNS: Record<StatField, string> = {
  alertsSent: 'alerts_sent',
  responsesGiven: 'responses_given',
  carsFreed: 'cars_freed'
};

const mapAlertRow = (row: AlertRow): Alert => ({
  id: row.id,
  senderId: row.sender_id,
  receiverId: row.receiver_id,
  plateFingerprint: row.plate_hash,
  message: row.message,
  response: decodeResponse(row.response),
  responseMessage: row.response_message,
  createdAt: row.created_at,
  readAt: row.read_at,
  respondedAt: row.response_at,
  pushSentAt: row.push_sent_at
});

export interface SqliteStoreOptions {
  bus?: EventBus;
  clock?: Clock;
  logger?: Logger;
  /** Rows returned by history queries. */
  queryLimit?: number;
}

/**
 * SQLite-backed alert store, plate directory, entitlement store and stats store.
 *
 * Every write that matters under concurrent sessions is a single conditional statement,
 * so two connections on the same database file cannot over-grant quota or let two
 * first-write-wins responses both land.
 */
export class SqliteStore implements AlertStore, PlateDirectory, EntitlementStore, StatsStore {
  readonly bus: EventBus;
  private readonly db: Database.Database;
  private readonly clock: Clock;
  private readonly logger?: Logger;
  private readonly queryLimit: number;
  private closed = false;

  constructor(dbPath = './data/alerts.sqlite', options: SqliteStoreOptions = {}) {
    this.db = openDatabase(dbPath);
    this.bus = options.bus ?? new EventBus();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
    this.queryLimit = options.queryLimit ?? 200;
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS alerts (
        id TEXT PRIMARY KEY,
        sender_id TEXT NOT NULL,
        receiver_id TEXT NOT NULL,
        plate_hash TEXT NOT NULL,
        message TEXT,
        response TEXT,
        response_message TEXT,
        created_at INTEGER NOT NULL,
        read_at INTEGER,
        response_at INTEGER,
        push_sent_at INTEGER,
        CHECK (response IS NULL OR (response_at IS NOT NULL AND read_at IS NOT NULL))
      );

      CREATE TABLE IF NOT EXISTS plates (
        user_id TEXT NOT NULL,
        plate_hash TEXT NOT NULL,
        registered_at INTEGER NOT NULL,
        PRIMARY KEY (user_id, plate_hash)
      );

      CREATE TABLE IF NOT EXISTS entitlements (
        user_id TEXT PRIMARY KEY,
        tier TEXT NOT NULL DEFAULT 'free' CHECK (tier IN ('free', 'premium', 'lifetime')),
        daily_used INTEGER NOT NULL DEFAULT 0,
        window_start INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS user_stats (
        user_id TEXT PRIMARY KEY,
        alerts_sent INTEGER NOT NULL DEFAULT 0,
        responses_given INTEGER NOT NULL DEFAULT 0,
        cars_freed INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_alerts_receiver ON alerts(receiver_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_alerts_sender ON alerts(sender_id, created_at);
      CREATE INDEX IF NOT EXISTS idx_plates_hash ON plates(plate_hash);
    `);
  }

  // ── Alerts ────────────────────────────────────────────────────────────────

  async insert(alert: NewAlert): Promise<Alert> {
    const row: AlertRow = {
      id: randomUUID(),
      sender_id: alert.senderId,
      receiver_id: alert.receiverId,
      plate_hash: alert.plateFingerprint,
      message: alert.message,
      response: null,
      response_message: null,
      created_at: this.clock.now(),
      read_at: null,
      response_at: null,
      push_sent_at: null
    };
    this.db.prepare(`
      INSERT INTO alerts(id, sender_id, receiver_id, plate_hash, message, created_at)
      VALUES(@id, @sender_id, @receiver_id, @plate_hash, @message, @created_at)
    `).run(row);
    const inserted = mapAlertRow(row);
    this.publish('inserted', inserted);
    return inserted;
  }

  async findById(id: string): Promise<Alert | null> {
    const row = this.selectRow(id);
    return row ? mapAlertRow(row) : null;
  }

  async updateReadAndResponse(id: string, patch: AlertPatch): Promise<UpdateOutcome> {
    let changes = 0;
    if (patch.response) {
      changes = this.db.prepare(`
        UPDATE alerts SET
          response = @response,
          response_message = @responseMessage,
          response_at = @respondedAt,
          read_at = COALESCE(read_at, @respondedAt)
        WHERE id = @id AND (@onlyIfUnanswered = 0 OR response IS NULL)
      `).run({
        id,
        response: encodeResponse(patch.response.value),
        responseMessage: patch.response.message,
        respondedAt: patch.response.respondedAt,
        onlyIfUnanswered: patch.response.onlyIfUnanswered ? 1 : 0
      }).changes;
    } else if (patch.readAt !== undefined) {
      changes = this.db.prepare(
        'UPDATE alerts SET read_at = @readAt WHERE id = @id AND read_at IS NULL'
      ).run({ id, readAt: patch.readAt }).changes;
    }

    const row = this.selectRow(id);
    if (!row) return { status: 'not_found' };
    const alert = mapAlertRow(row);
    if (changes === 0) return { status: 'unchanged', alert };
    this.publish('updated', alert);
    return { status: 'updated', alert };
  }

  async markPushSent(id: string, at: number): Promise<void> {
    this.db.prepare('UPDATE alerts SET push_sent_at = ? WHERE id = ? AND push_sent_at IS NULL').run(at, id);
  }

  async queryByReceiver(userId: string): Promise<Alert[]> {
    const rows = this.db.prepare(
      'SELECT * FROM alerts WHERE receiver_id = ? ORDER BY created_at DESC LIMIT ?'
    ).all(userId, this.queryLimit) as AlertRow[];
    return rows.map(mapAlertRow);
  }

  async queryBySender(userId: string): Promise<Alert[]> {
    const rows = this.db.prepare(
      'SELECT * FROM alerts WHERE sender_id = ? ORDER BY created_at DESC LIMIT ?'
    ).all(userId, this.queryLimit) as AlertRow[];
    return rows.map(mapAlertRow);
  }

  subscribeByReceiver(userId: string, handlers: AlertStreamHandlers): AlertSubscription {
    return this.subscribe((alert) => alert.receiverId === userId, handlers);
  }

  subscribeBySender(userId: string, handlers: AlertStreamHandlers): AlertSubscription {
    return this.subscribe((alert) => alert.senderId === userId, handlers);
  }

  private subscribe(match: (alert: Alert) => boolean, handlers: AlertStreamHandlers): AlertSubscription {
    let active = true;
    if (this.closed) {
      queueMicrotask(() => handlers.onError(new NetworkError('alert store is closed')));
      return { unsubscribe: () => { active = false; } };
    }

    const offRow = this.bus.on('alertChanged', ({ alert }) => {
      if (!active || !match(alert)) return;
      try {
        handlers.onRow(alert);
      } catch (err) {
        this.logger?.warn('alert subscriber threw', { alertId: alert.id, error: errorMessage(err) });
      }
    });
    const offClosed = this.bus.on('storeClosed', ({ reason }) => {
      if (!active) return;
      stop();
      handlers.onError(new NetworkError(reason));
    });
    const stop = (): void => {
      active = false;
      offRow();
      offClosed();
    };

    queueMicrotask(() => {
      if (active) handlers.onReady?.();
    });
    return { unsubscribe: stop };
  }

  private selectRow(id: string): AlertRow | undefined {
    return this.db.prepare('SELECT * FROM alerts WHERE id = ?').get(id) as AlertRow | undefined;
  }

  private publish(change: 'inserted' | 'updated', alert: Alert): void {
    this.bus.emit('alertChanged', { change, alert, timestamp: this.clock.now() });
  }

  // ── Plates ────────────────────────────────────────────────────────────────

  async resolveOwners(plateFingerprint: string): Promise<string[]> {
    const rows = this.db.prepare(
      'SELECT DISTINCT user_id FROM plates WHERE plate_hash = ? ORDER BY user_id'
    ).all(plateFingerprint) as Array<{ user_id: string }>;
    return rows.map((r) => r.user_id);
  }

  async registerPlate(userId: string, plateFingerprint: string, maxPlates: number): Promise<RegisterOutcome> {
    const register = this.db.transaction((): RegisterOutcome => {
      const existing = this.db.prepare(
        'SELECT 1 FROM plates WHERE user_id = ? AND plate_hash = ?'
      ).get(userId, plateFingerprint);
      if (existing) return 'already_registered';
      const { count } = this.db.prepare(
        'SELECT COUNT(*) AS count FROM plates WHERE user_id = ?'
      ).get(userId) as { count: number };
      if (count >= maxPlates) return 'limit_reached';
      this.db.prepare(
        'INSERT INTO plates(user_id, plate_hash, registered_at) VALUES(?, ?, ?)'
      ).run(userId, plateFingerprint, this.clock.now());
      return 'registered';
    });
    return register.immediate();
  }

  async unregisterPlate(userId: string, plateFingerprint: string): Promise<boolean> {
    const info = this.db.prepare('DELETE FROM plates WHERE user_id = ? AND plate_hash = ?').run(userId, plateFingerprint);
    return info.changes > 0;
  }

  async listPlates(userId: string): Promise<PlateRegistration[]> {
    const rows = this.db.prepare(
      'SELECT user_id, plate_hash, registered_at FROM plates WHERE user_id = ? ORDER BY registered_at, plate_hash'
    ).all(userId) as Array<{ user_id: string; plate_hash: string; registered_at: number }>;
    return rows.map((r) => ({ ownerUserId: r.user_id, plateFingerprint: r.plate_hash, registeredAt: r.registered_at }));
  }

  // ── Entitlements ──────────────────────────────────────────────────────────

  async getState(userId: string): Promise<EntitlementState> {
    const row = this.db.prepare(
      'SELECT tier, daily_used, window_start FROM entitlements WHERE user_id = ?'
    ).get(userId) as EntitlementRow | undefined;
    return {
      userId,
      tier: row?.tier ?? 'free',
      dailyAlertsUsed: row?.daily_used ?? 0,
      usageWindowStart: row?.window_start ?? 0
    };
  }

  async setTier(userId: string, tier: Tier): Promise<void> {
    this.db.prepare(`
      INSERT INTO entitlements(user_id, tier) VALUES(?, ?)
      ON CONFLICT(user_id) DO UPDATE SET tier = excluded.tier
    `).run(userId, tier);
  }

  async consume(request: ConsumeRequest): Promise<ConsumeOutcome> {
    const consume = this.db.transaction((req: ConsumeRequest): ConsumeOutcome => {
      this.db.prepare(
        'INSERT INTO entitlements(user_id, window_start) VALUES(?, ?) ON CONFLICT(user_id) DO NOTHING'
      ).run(req.userId, req.windowStart);

      // Check and increment in one statement; the window resets in the same write.
      const granted = this.db.prepare(`
        UPDATE entitlements SET
          daily_used = CASE WHEN window_start < @windowCutoff THEN 1 ELSE daily_used + 1 END,
          window_start = CASE WHEN window_start < @windowCutoff THEN @windowStart ELSE window_start END
        WHERE user_id = @userId
          AND (CASE tier WHEN 'free' THEN @freeQuota ELSE @paidQuota END) > 0
          AND (window_start < @windowCutoff
               OR daily_used < (CASE tier WHEN 'free' THEN @freeQuota ELSE @paidQuota END))
        RETURNING daily_used, tier
      `).get(req) as { daily_used: number; tier: Tier } | undefined;
      if (granted) return { allowed: true, used: granted.daily_used, tier: granted.tier };

      const row = this.db.prepare(
        'SELECT tier, daily_used, window_start FROM entitlements WHERE user_id = ?'
      ).get(req.userId) as EntitlementRow;
      const used = row.window_start < req.windowCutoff ? 0 : row.daily_used;
      return { allowed: false, used, tier: row.tier };
    });
    return consume.immediate(request);
  }

  async refund(userId: string, windowCutoff: number): Promise<void> {
    this.db.prepare(`
      UPDATE entitlements SET daily_used = daily_used - 1
      WHERE user_id = ? AND daily_used > 0 AND window_start >= ?
    `).run(userId, windowCutoff);
  }

  // ── Stats ─────────────────────────────────────────────────────────────────

  async bumpStat(userId: string, field: StatField): Promise<void> {
    const column = STAT_COLUMNS[field];
    this.db.prepare(`
      INSERT INTO user_stats(user_id, ${column}) VALUES(?, 1)
      ON CONFLICT(user_id) DO UPDATE SET ${column} = ${column} + 1
    `).run(userId);
  }

  async getStats(userId: string): Promise<UserStats> {
    const row = this.db.prepare(
      'SELECT alerts_sent, responses_given, cars_freed FROM user_stats WHERE user_id = ?'
    ).get(userId) as { alerts_sent: number; responses_given: number; cars_freed: number } | undefined;
    return {
      userId,
      alertsSent: row?.alerts_sent ?? 0,
      responsesGiven: row?.responses_given ?? 0,
      carsFreed: row?.cars_freed ?? 0
    };
  }

  /** Ends every live subscription with a NetworkError, then closes the database. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.bus.emit('storeClosed', { reason: 'alert store is closed', timestamp: this.clock.now() });
    this.db.close();
  }
}
