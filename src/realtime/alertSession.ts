/**
 * AlertSession — everything one signed-in user's client holds while it runs.
 *
 * Owns the deduplicator, acknowledgment tracker, realtime stream, connectivity reconciler,
 * periodic reconcile and banner timers. Nothing here is global: two sessions in one
 * process share no state, and `dispose()` stops every subscription and timer.
 */

import type { AlertCommands, SendAlertReceipt } from '../alerts/alertService.js';
import { systemClock, type Clock } from '../core/clock.js';
import { NetworkError, PartialFailureError, RateLimitExceededError, errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { err, type Result } from '../core/result.js';
import type { BackoffConfig } from '../core/retry.js';
import type { Alert, PlateRegistration } from '../core/types.js';
import type { SessionConfig } from '../config/types.js';
import type { AlertFeed } from '../data/alertStore.js';
import type { MarkerStore } from '../data/markerStore.js';
import type { EntitlementSnapshot } from '../entitlement/entitlementGate.js';
import { Scheduler } from '../jobs/scheduler.js';
import { AcknowledgmentTracker, type AckSummary, type ReconcileReport, type UnacknowledgedCount } from './acknowledgmentTracker.js';
import { ConnectivityReconciler } from './connectivityReconciler.js';
import { DeliveryDeduplicator } from './deliveryDeduplicator.js';
import { RealtimeAlertStream, type StreamDirection } from './realtimeAlertStream.js';

/** UI side of a session: shows and hides the incoming-alert banner. */
export interface AlertPresenter {
  present(alert: Alert): void;
  dismiss(alertId: string): void;
  /** One of this user's sent alerts got its first response. */
  answered?(alert: Alert): void;
}

export interface SnapshotSource {
  entitlement(userId: string): Promise<EntitlementSnapshot>;
  plates(userId: string): Promise<PlateRegistration[]>;
}

export interface AlertSessionOptions {
  userId: string;
  feed: AlertFeed;
  /** Where this session's sends, reads and responses go. */
  commands: AlertCommands;
  markers: MarkerStore;
  presenter: AlertPresenter;
  config: SessionConfig;
  backoff: BackoffConfig;
  logger: Logger;
  metrics?: Metrics;
  clock?: Clock;
  snapshots?: SnapshotSource;
  startOffline?: boolean;
}

export class AlertSession {
  readonly userId: string;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly dedup: DeliveryDeduplicator;
  private readonly tracker: AcknowledgmentTracker;
  private readonly stream: RealtimeAlertStream;
  private readonly reconciler: ConnectivityReconciler;
  private readonly scheduler: Scheduler;
  private readonly banners = new Map<string, NodeJS.Timeout>();
  private entitlementSnapshot: EntitlementSnapshot | null = null;
  private plateSnapshot: PlateRegistration[] = [];
  private disposed = false;

  constructor(private readonly options: AlertSessionOptions) {
    const clock = options.clock ?? systemClock;
    this.clock = clock;
    this.userId = options.userId;
    this.logger = options.logger.child({ userId: options.userId });
    this.dedup = new DeliveryDeduplicator(options.config.freshnessWindowMs, clock);
    this.tracker = new AcknowledgmentTracker({
      userId: options.userId,
      feed: options.feed,
      markers: options.markers,
      ackTimeoutMs: options.config.ackTimeoutMs,
      ackRetentionMs: options.config.ackRetentionMs,
      logger: this.logger,
      clock,
      onAnswered: (alert) => {
        if (!this.disposed) options.presenter.answered?.(alert);
      }
    });
    this.stream = new RealtimeAlertStream(
      options.feed,
      options.userId,
      {
        onRow: (direction, alert) => this.route(direction, alert),
        onError: (direction, error) => this.reconciler.handleStreamError(direction, error),
        onReady: (direction) => this.reconciler.handleStreamReady(direction)
      },
      this.logger
    );
    this.reconciler = new ConnectivityReconciler({
      stream: this.stream,
      tracker: this.tracker,
      backoff: options.backoff,
      logger: this.logger,
      metrics: options.metrics,
      refreshers: this.buildRefreshers(options.snapshots),
      initialState: options.startOffline ? 'offline' : 'online'
    });
    this.scheduler = new Scheduler(this.logger);
  }

  async start(): Promise<ReconcileReport | null> {
    this.scheduler.add('reconcile', this.options.config.reconcileIntervalMs, async () => {
      if (this.reconciler.isOnline()) await this.reconciler.resync();
    });
    const report = await this.reconciler.start();
    this.logger.info('alert session started', { online: this.reconciler.isOnline() });
    return report;
  }

  setOnline(online: boolean): Promise<ReconcileReport | null> {
    return this.reconciler.setOnline(online);
  }

  /** Connectivity gate for commands issued from this session. */
  isOnline(): boolean {
    return this.reconciler.isOnline();
  }

  /**
   * Send as this session's user. Fails fast while offline or when the last entitlement
   * snapshot shows an exhausted window; every row that was written gets a marker.
   */
  async sendAlert(targetPlateFingerprint: string, message?: string | null): Promise<Result<SendAlertReceipt>> {
    if (!this.isOnline()) return err(new NetworkError('offline: alert not sent'));
    const snapshot = this.entitlementSnapshot;
    if (snapshot && snapshot.remaining <= 0 && (snapshot.resetsAt === null || this.clock.now() < snapshot.resetsAt)) {
      return err(new RateLimitExceededError(`daily alert limit of ${snapshot.quota} reached`, snapshot.quota));
    }

    const result = await this.options.commands.sendAlert(targetPlateFingerprint, this.userId, message);
    if (result.ok) {
      this.noteConsumed();
      await this.markSent(result.value.alertIds);
    } else if (result.error instanceof PartialFailureError) {
      this.noteConsumed();
      await this.markSent(result.error.succeeded);
    } else if (result.error instanceof RateLimitExceededError && snapshot) {
      this.entitlementSnapshot = { ...snapshot, used: snapshot.quota, remaining: 0 };
    }
    return result;
  }

  async markAlertRead(alertId: string): Promise<Result<Alert>> {
    if (!this.isOnline()) return err(new NetworkError('offline: read receipt not sent'));
    return this.options.commands.markAlertRead(alertId);
  }

  async sendResponse(alertId: string, response: string, responseMessage?: string | null): Promise<Result<Alert>> {
    if (!this.isOnline()) return err(new NetworkError('offline: response not sent'));
    return this.options.commands.sendResponse(alertId, response, responseMessage);
  }

  unacknowledgedCount(): Promise<UnacknowledgedCount> {
    return this.tracker.unacknowledgedCount();
  }

  acknowledgmentSummary(): Promise<AckSummary> {
    return this.tracker.summary();
  }

  reconcile(): Promise<ReconcileReport | null> {
    return this.reconciler.resync();
  }

  get entitlement(): EntitlementSnapshot | null {
    return this.entitlementSnapshot;
  }

  get plates(): PlateRegistration[] {
    return this.plateSnapshot;
  }

  /** Hide a banner before its auto-dismiss fires. */
  dismiss(alertId: string): void {
    const timer = this.banners.get(alertId);
    if (!timer) return;
    clearTimeout(timer);
    this.banners.delete(alertId);
    this.options.presenter.dismiss(alertId);
  }

  get visibleBanners(): string[] {
    return [...this.banners.keys()];
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.scheduler.shutdown();
    this.reconciler.dispose();
    for (const timer of this.banners.values()) clearTimeout(timer);
    this.banners.clear();
    this.logger.info('alert session disposed');
  }

  private route(direction: StreamDirection, alert: Alert): void {
    if (this.disposed) return;
    if (direction === 'outgoing') {
      void this.tracker.observeOutgoing(alert).catch((e: unknown) => {
        this.logger.warn('acknowledgment update failed', { alertId: alert.id, error: errorMessage(e) });
      });
      return;
    }

    this.tracker.observeIncoming(alert);
    if (alert.readAt !== null || alert.response !== null) this.dismiss(alert.id);
    if (!this.dedup.observe(alert)) return;

    this.options.presenter.present(alert);
    this.options.metrics?.increment('alerts_presented_total');
    this.banners.set(
      alert.id,
      setTimeout(() => {
        this.banners.delete(alert.id);
        if (!this.disposed) this.options.presenter.dismiss(alert.id);
      }, this.options.config.bannerAutoDismissMs)
    );
  }

  private noteConsumed(): void {
    const snapshot = this.entitlementSnapshot;
    if (!snapshot) return;
    this.entitlementSnapshot = { ...snapshot, used: snapshot.used + 1, remaining: Math.max(0, snapshot.remaining - 1) };
  }

  // Rows are already written; a missing marker only affects the sent count.
  private async markSent(alertIds: string[]): Promise<void> {
    try {
      await this.tracker.trackSent(alertIds);
    } catch (e) {
      this.logger.warn('acknowledgment markers not recorded', { alertIds, error: errorMessage(e) });
    }
  }

  private buildRefreshers(source: SnapshotSource | undefined): Array<() => Promise<void>> {
    if (!source) return [];
    return [
      async () => {
        this.entitlementSnapshot = await source.entitlement(this.userId);
      },
      async () => {
        this.plateSnapshot = await source.plates(this.userId);
      }
    ];
  }
}
