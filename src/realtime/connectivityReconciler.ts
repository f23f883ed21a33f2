import type { NetworkError } from '../core/errors.js';
import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import { backoffDelay, type BackoffConfig } from '../core/retry.js';
import type { AcknowledgmentTracker, ReconcileReport } from './acknowledgmentTracker.js';
import { STREAM_DIRECTIONS, type RealtimeAlertStream, type StreamDirection } from './realtimeAlertStream.js';

export type ConnectivityState = 'online' | 'offline';

export interface ConnectivityReconcilerOptions {
  stream: RealtimeAlertStream;
  tracker: AcknowledgmentTracker;
  backoff: BackoffConfig;
  logger: Logger;
  metrics?: Metrics;
  /** Snapshot refreshes run after every reconcile (entitlements, plate registrations). */
  refreshers?: Array<() => Promise<void>>;
  initialState?: ConnectivityState;
}

/**
 * Online ⇄ Offline state machine for one session.
 *
 * Offline: both streams closed, pending resubscribes cancelled, commands fail fast.
 * Online: both streams resubscribed, then reconcile and snapshot refresh. Each transition
 * bumps `generation`; resync work from an older generation is discarded.
 */
export class ConnectivityReconciler {
  private state: ConnectivityState;
  private generation = 0;
  private disposed = false;
  private readonly attempts = new Map<StreamDirection, number>();
  private readonly timers = new Map<StreamDirection, NodeJS.Timeout>();
  private readonly recoveryTimers = new Map<StreamDirection, NodeJS.Timeout>();

  constructor(private readonly options: ConnectivityReconcilerOptions) {
    this.state = options.initialState ?? 'online';
  }

  isOnline(): boolean {
    return this.state === 'online' && !this.disposed;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  /** Subscribe and reconcile for the initial state. */
  async start(): Promise<ReconcileReport | null> {
    if (this.state !== 'online' || this.disposed) return null;
    this.generation += 1;
    this.subscribeAll();
    return this.resync();
  }

  async setOnline(online: boolean): Promise<ReconcileReport | null> {
    if (this.disposed) return null;
    const next: ConnectivityState = online ? 'online' : 'offline';
    if (next === this.state) return null;

    this.state = next;
    this.generation += 1;
    this.cancelTimers();
    this.attempts.clear();
    this.options.logger.info('connectivity changed', { state: next, generation: this.generation });
    this.options.metrics?.increment('connectivity_transitions_total', 1, { state: next });

    if (next === 'offline') {
      this.options.stream.close();
      return null;
    }
    this.subscribeAll();
    return this.resync();
  }

  handleStreamError(direction: StreamDirection, error: NetworkError): void {
    if (!this.isOnline()) return;
    this.clearRecoveryTimer(direction);
    const attempt = (this.attempts.get(direction) ?? 0) + 1;
    this.attempts.set(direction, attempt);
    const delay = backoffDelay(attempt, this.options.backoff);

    if (delay === null) {
      this.clearTimer(direction);
      if (attempt > this.options.backoff.maxAttempts + 1) return;
      this.options.logger.error('alert stream resubscribe attempts exhausted', {
        direction,
        attempts: attempt - 1,
        error: error.message
      });
      this.options.metrics?.increment('stream_resubscribe_exhausted_total', 1, { direction });
      return;
    }

    this.options.metrics?.increment('stream_resubscribe_total', 1, { direction });
    if (delay === 0) {
      this.options.stream.subscribe(direction);
      return;
    }

    const generation = this.generation;
    this.clearTimer(direction);
    this.options.logger.debug('alert stream resubscribe scheduled', { direction, attempt, delayMs: delay });
    this.timers.set(
      direction,
      setTimeout(() => {
        this.timers.delete(direction);
        if (generation !== this.generation || !this.isOnline()) return;
        this.options.stream.subscribe(direction);
      }, delay)
    );
  }

  /**
   * A recovering subscription counts as healthy once it has stayed up for `baseDelayMs`;
   * only then are its attempts reset and a reconcile run. A drop before that keeps backing off.
   */
  handleStreamReady(direction: StreamDirection): void {
    if (!this.isOnline() || !this.attempts.has(direction) || this.recoveryTimers.has(direction)) return;
    const generation = this.generation;
    this.recoveryTimers.set(
      direction,
      setTimeout(() => {
        this.recoveryTimers.delete(direction);
        if (generation !== this.generation || !this.isOnline()) return;
        this.attempts.delete(direction);
        this.options.logger.info('alert stream recovered', { direction });
        void this.resync();
      }, this.options.backoff.baseDelayMs)
    );
  }

  pendingAttempts(direction: StreamDirection): number {
    return this.attempts.get(direction) ?? 0;
  }

  /**
   * Reconcile and refresh snapshots. Returns null when the work was superseded by a newer
   * transition or failed; failures are logged.
   */
  async resync(): Promise<ReconcileReport | null> {
    const generation = this.generation;
    const stale = (): boolean => generation !== this.generation || this.disposed;
    try {
      const report = await this.options.tracker.reconcile();
      if (stale()) return this.discard(generation);
      for (const refresh of this.options.refreshers ?? []) {
        await refresh();
        if (stale()) return this.discard(generation);
      }
      return report;
    } catch (e) {
      if (stale()) return this.discard(generation);
      this.options.logger.warn('resync failed', { generation, error: errorMessage(e) });
      return null;
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.generation += 1;
    this.cancelTimers();
    this.attempts.clear();
    this.options.stream.close();
  }

  private discard(generation: number): null {
    this.options.logger.debug('stale resync discarded', { generation, current: this.generation });
    return null;
  }

  private subscribeAll(): void {
    for (const direction of STREAM_DIRECTIONS) this.options.stream.subscribe(direction);
  }

  private clearTimer(direction: StreamDirection): void {
    const timer = this.timers.get(direction);
    if (timer) clearTimeout(timer);
    this.timers.delete(direction);
  }

  private clearRecoveryTimer(direction: StreamDirection): void {
    const timer = this.recoveryTimers.get(direction);
    if (timer) clearTimeout(timer);
    this.recoveryTimers.delete(direction);
  }

  private cancelTimers(): void {
    for (const timer of [...this.timers.values(), ...this.recoveryTimers.values()]) clearTimeout(timer);
    this.timers.clear();
    this.recoveryTimers.clear();
  }
}
