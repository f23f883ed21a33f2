/**
 * AlertService — the only write path for alert rows.
 *
 * sendAlert: validate → quota → resolve owners → one insert per distinct owner →
 * push to owners without a live session. Every primary operation returns a `Result`;
 * auxiliary bookkeeping (push receipts, stats) logs at warn and continues.
 */

import { systemClock, type Clock } from '../core/clock.js';
import {
  ConflictError,
  NetworkError,
  NotFoundError,
  PartialFailureError,
  PersistenceError,
  RateLimitExceededError,
  ValidationError,
  errorMessage,
  toPersistenceError,
  type FailedRecipient
} from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { err, ok, type Result } from '../core/result.js';
import type { Alert, PlateRegistration } from '../core/types.js';
import type { AlertPolicyConfig } from '../config/types.js';
import type { AlertStore } from '../data/alertStore.js';
import type { PlateDirectory, RegisterOutcome } from '../data/plateDirectory.js';
import type { StatField, StatsStore } from '../data/statsStore.js';
import type { EntitlementGate } from '../entitlement/entitlementGate.js';
import { fingerprintPlate, isWellFormedFingerprint } from './plateFingerprint.js';
import type { PushSink } from './pushSink.js';
import { decodeResponse, describeResponse, isWireResponse } from './response.js';

export interface SendAlertReceipt {
  alertIds: string[];
  recipientCount: number;
}

/** Command side shared by the in-process service and the remote client. */
export interface AlertCommands {
  sendAlert(targetPlateFingerprint: string, senderId: string, message?: string | null): Promise<Result<SendAlertReceipt>>;
  markAlertRead(alertId: string): Promise<Result<Alert>>;
  sendResponse(alertId: string, response: string, responseMessage?: string | null): Promise<Result<Alert>>;
}

export interface ConnectivityGate {
  isOnline(): boolean;
}

export interface PresenceRegistry {
  isConnected(userId: string): boolean;
}

export interface AlertServiceDeps {
  store: AlertStore;
  plates: PlateDirectory;
  gate: EntitlementGate;
  config: AlertPolicyConfig;
  logger: Logger;
  metrics?: Metrics;
  clock?: Clock;
  stats?: StatsStore;
  push?: PushSink;
  presence?: PresenceRegistry;
  connectivity?: ConnectivityGate;
}

export class AlertService implements AlertCommands {
  private readonly clock: Clock;

  constructor(private readonly deps: AlertServiceDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async sendAlert(
    targetPlateFingerprint: string,
    senderId: string,
    message?: string | null
  ): Promise<Result<SendAlertReceipt>> {
    const { store, plates, gate, logger, metrics } = this.deps;

    if (!senderId) return err(new ValidationError('senderId is required'));
    if (!isWellFormedFingerprint(targetPlateFingerprint)) {
      return err(new ValidationError('plate fingerprint must be 64 lowercase hex characters'));
    }
    const body = this.normalizeMessage(message);
    if (!body.ok) return body;
    if (this.isOffline()) return err(new NetworkError('offline: alert not sent'));

    let allowed: boolean;
    let quota: number;
    try {
      const decision = await gate.tryConsume(senderId);
      allowed = decision.allowed;
      quota = decision.quota;
    } catch (e) {
      return err(toPersistenceError(e, 'tryConsume'));
    }
    if (!allowed) {
      metrics?.increment('alerts_rejected_total', 1, { reason: 'rate_limit' });
      return err(new RateLimitExceededError(`daily alert limit of ${quota} reached`, quota));
    }

    let owners: string[];
    try {
      owners = [...new Set(await plates.resolveOwners(targetPlateFingerprint))];
    } catch (e) {
      await this.refund(senderId);
      return err(toPersistenceError(e, 'resolveOwners'));
    }
    if (owners.length === 0) {
      await this.refund(senderId);
      metrics?.increment('alerts_rejected_total', 1, { reason: 'not_registered' });
      return err(new NotFoundError('License plate not registered', { plateFingerprint: targetPlateFingerprint }));
    }

    const settled = await Promise.allSettled(
      owners.map((receiverId) =>
        store.insert({ senderId, receiverId, plateFingerprint: targetPlateFingerprint, message: body.value })
      )
    );
    const inserted: Alert[] = [];
    const failed: FailedRecipient[] = [];
    settled.forEach((outcome, i) => {
      const receiverId = owners[i] ?? '';
      if (outcome.status === 'fulfilled') inserted.push(outcome.value);
      else failed.push({ receiverId, error: errorMessage(outcome.reason) });
    });

    if (inserted.length === 0) {
      await this.refund(senderId);
      logger.error('alert fan-out failed for every recipient', { senderId, recipients: owners.length, failed });
      return err(new PersistenceError('no alert rows could be written', { failed }));
    }

    metrics?.increment('alerts_sent_total', inserted.length);
    await Promise.all(inserted.map((alert) => this.pushIfAway(alert.receiverId, alert, {
      title: 'Someone needs you to move your car',
      body: alert.message ?? 'Your vehicle is blocking access.'
    })));
    await this.bump(senderId, 'alertsSent');

    const alertIds = inserted.map((a) => a.id);
    if (failed.length > 0) {
      logger.warn('alert fan-out partially failed', { senderId, succeeded: alertIds.length, failed });
      return err(new PartialFailureError(alertIds, failed));
    }
    logger.info('alert sent', { senderId, recipients: alertIds.length });
    return ok({ alertIds, recipientCount: alertIds.length });
  }

  async markAlertRead(alertId: string): Promise<Result<Alert>> {
    if (!alertId) return err(new ValidationError('alertId is required'));
    if (this.isOffline()) return err(new NetworkError('offline: read receipt not sent'));
    try {
      const outcome = await this.deps.store.updateReadAndResponse(alertId, { readAt: this.clock.now() });
      if (outcome.status === 'not_found') return err(new NotFoundError('alert not found', { alertId }));
      return ok(outcome.alert);
    } catch (e) {
      return err(toPersistenceError(e, 'markAlertRead'));
    }
  }

  async sendResponse(alertId: string, response: string, responseMessage?: string | null): Promise<Result<Alert>> {
    const { store, config, logger } = this.deps;

    if (!alertId) return err(new ValidationError('alertId is required'));
    if (!isWireResponse(response)) {
      return err(new ValidationError(`unknown response value: ${response}`, { response }));
    }
    const value = decodeResponse(response);
    if (!value) return err(new ValidationError('response is required'));
    const note = this.normalizeMessage(responseMessage);
    if (!note.ok) return note;
    if (this.isOffline()) return err(new NetworkError('offline: response not sent'));

    const firstWriteWins = config.responsePolicy === 'first_write_wins';
    let alert: Alert;
    try {
      const previous = firstWriteWins ? null : await store.findById(alertId);
      const outcome = await store.updateReadAndResponse(alertId, {
        response: {
          value,
          message: note.value,
          respondedAt: this.clock.now(),
          onlyIfUnanswered: firstWriteWins
        }
      });
      if (outcome.status === 'not_found') return err(new NotFoundError('alert not found', { alertId }));
      if (outcome.status === 'unchanged') {
        return err(new ConflictError('alert already has a response', { alertId }));
      }
      if (previous?.response) {
        logger.warn('alert response overwritten', {
          alertId,
          previous: describeResponse(previous.response),
          current: describeResponse(value)
        });
      }
      alert = outcome.alert;
    } catch (e) {
      return err(toPersistenceError(e, 'sendResponse'));
    }

    this.deps.metrics?.increment('responses_total', 1, { response });
    await this.pushIfAway(alert.senderId, alert, {
      title: 'Your alert was answered',
      body: describeResponse(value)
    });
    await this.bump(alert.receiverId, 'responsesGiven');
    if (value.kind === 'moving_now') await this.bump(alert.receiverId, 'carsFreed');
    return ok(alert);
  }

  async listIncoming(userId: string): Promise<Result<Alert[]>> {
    if (!userId) return err(new ValidationError('userId is required'));
    try {
      return ok(await this.deps.store.queryByReceiver(userId));
    } catch (e) {
      return err(toPersistenceError(e, 'queryByReceiver'));
    }
  }

  async listOutgoing(userId: string): Promise<Result<Alert[]>> {
    if (!userId) return err(new ValidationError('userId is required'));
    try {
      return ok(await this.deps.store.queryBySender(userId));
    } catch (e) {
      return err(toPersistenceError(e, 'queryBySender'));
    }
  }

  async getAlert(alertId: string): Promise<Result<Alert>> {
    try {
      const alert = await this.deps.store.findById(alertId);
      return alert ? ok(alert) : err(new NotFoundError('alert not found', { alertId }));
    } catch (e) {
      return err(toPersistenceError(e, 'findById'));
    }
  }

  /** Accepts raw plate text (normalized and hashed here) or a ready fingerprint. */
  async registerPlate(
    userId: string,
    plate: string
  ): Promise<Result<{ plateFingerprint: string; outcome: Exclude<RegisterOutcome, 'limit_reached'> }>> {
    if (!userId) return err(new ValidationError('userId is required'));
    if (plate.trim() === '') return err(new ValidationError('plate is required'));
    const plateFingerprint = isWellFormedFingerprint(plate) ? plate : fingerprintPlate(plate);
    const max = this.deps.config.maxPlatesPerUser;
    try {
      const outcome = await this.deps.plates.registerPlate(userId, plateFingerprint, max);
      if (outcome === 'limit_reached') {
        return err(new ValidationError(`a user may register at most ${max} plates`, { maxPlates: max }));
      }
      this.deps.logger.info('plate registered', { userId, plateFingerprint, outcome });
      return ok({ plateFingerprint, outcome });
    } catch (e) {
      return err(toPersistenceError(e, 'registerPlate'));
    }
  }

  async unregisterPlate(userId: string, plateFingerprint: string): Promise<Result<void>> {
    try {
      const removed = await this.deps.plates.unregisterPlate(userId, plateFingerprint);
      return removed ? ok(undefined) : err(new NotFoundError('plate not registered for user', { userId, plateFingerprint }));
    } catch (e) {
      return err(toPersistenceError(e, 'unregisterPlate'));
    }
  }

  async listPlates(userId: string): Promise<Result<PlateRegistration[]>> {
    try {
      return ok(await this.deps.plates.listPlates(userId));
    } catch (e) {
      return err(toPersistenceError(e, 'listPlates'));
    }
  }

  private normalizeMessage(message: string | null | undefined): Result<string | null> {
    const text = message?.trim() ?? '';
    if (text === '') return ok(null);
    const max = this.deps.config.messageMaxLength;
    // Count code points so an emoji counts once.
    if ([...text].length > max) {
      return err(new ValidationError(`message exceeds ${max} characters`, { maxLength: max }));
    }
    return ok(text);
  }

  private isOffline(): boolean {
    return this.deps.connectivity ? !this.deps.connectivity.isOnline() : false;
  }

  private async refund(userId: string): Promise<void> {
    try {
      await this.deps.gate.refund(userId);
    } catch (e) {
      this.deps.logger.warn('quota refund failed', { userId, error: errorMessage(e) });
    }
  }

  private async pushIfAway(userId: string, alert: Alert, content: { title: string; body: string }): Promise<void> {
    const { push, presence, logger, metrics, store } = this.deps;
    if (!push || presence?.isConnected(userId)) return;
    try {
      await push.deliver({
        alertId: alert.id,
        userId,
        title: content.title,
        body: content.body,
        data: { alertId: alert.id, type: alert.response ? 'alert_response' : 'alert' }
      });
      if (!alert.response) await store.markPushSent(alert.id, this.clock.now());
      metrics?.increment('push_sent_total');
    } catch (e) {
      metrics?.increment('push_failed_total');
      logger.warn('push delivery failed', { alertId: alert.id, userId, error: errorMessage(e) });
    }
  }

  private async bump(userId: string, field: StatField): Promise<void> {
    if (!this.deps.stats) return;
    try {
      await this.deps.stats.bumpStat(userId, field);
    } catch (e) {
      this.deps.logger.warn('user stat update failed', { userId, field, error: errorMessage(e) });
    }
  }
}
