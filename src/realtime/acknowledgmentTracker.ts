import { systemClock, type Clock } from '../core/clock.js';
import { errorMessage } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { AckMarker, Alert } from '../core/types.js';
import type { AlertFeed } from '../data/alertStore.js';
import type { MarkerStore } from '../data/markerStore.js';

export interface UnacknowledgedCount {
  /** Sent alerts still waiting for an observed response. */
  sent: number;
  /** Received alerts this user has not answered. */
  received: number;
}

export interface ReconcileReport {
  acknowledged: number;
  dropped: number;
  pruned: number;
  receivedChanged: number;
  /** Sum of the above; zero on a run that found nothing new. */
  changes: number;
}

export interface AckSummary {
  pending: AckMarker[];
  timedOut: AckMarker[];
  acknowledged: AckMarker[];
}

export interface AcknowledgmentTrackerOptions {
  userId: string;
  feed: AlertFeed;
  markers: MarkerStore;
  ackTimeoutMs: number;
  ackRetentionMs: number;
  logger: Logger;
  clock?: Clock;
  /** Fired exactly once per alert, when its marker flips to acknowledged. */
  onAnswered?: (alert: Alert) => void;
}

export class AcknowledgmentTracker {
  private readonly clock: Clock;
  private readonly awaitingReply = new Map<string, Alert>();

  constructor(private readonly options: AcknowledgmentTrackerOptions) {
    this.clock = options.clock ?? systemClock;
  }

  async trackSent(alertIds: string[]): Promise<void> {
    const sentAt = this.clock.now();
    for (const id of alertIds) await this.options.markers.create(id, sentAt);
  }

  /** Acknowledge the sender's marker when the row carries a response. True if this call flipped it. */
  async observeOutgoing(alert: Alert): Promise<boolean> {
    if (alert.senderId !== this.options.userId || alert.response === null) return false;
    const flipped = await this.options.markers.acknowledge(alert.id, this.clock.now());
    if (flipped) this.fireAnswered(alert);
    return flipped;
  }

  observeIncoming(alert: Alert): void {
    if (alert.receiverId !== this.options.userId) return;
    if (alert.response === null) this.awaitingReply.set(alert.id, alert);
    else this.awaitingReply.delete(alert.id);
  }

  async unacknowledgedCount(): Promise<UnacknowledgedCount> {
    const markers = await this.options.markers.list();
    return {
      sent: markers.filter((m) => !m.acknowledged).length,
      received: this.awaitingReply.size
    };
  }

  /**
   * Re-read both directions from authoritative storage, acknowledge what was answered
   * while the stream was down, rebuild the awaiting-reply set, and prune markers.
   */
  async reconcile(): Promise<ReconcileReport> {
    const { feed, markers, userId, ackRetentionMs } = this.options;
    const [outgoing, incoming] = await Promise.all([feed.queryBySender(userId), feed.queryByReceiver(userId)]);
    const now = this.clock.now();
    const outgoingById = new Map(outgoing.map((a) => [a.id, a]));

    let acknowledged = 0;
    let dropped = 0;
    let pruned = 0;
    for (const marker of await markers.list()) {
      const alert = outgoingById.get(marker.alertId) ?? (await feed.findById(marker.alertId));
      if (!alert) {
        await markers.remove(marker.alertId);
        dropped += 1;
        continue;
      }
      if (!marker.acknowledged && alert.response !== null) {
        if (await markers.acknowledge(marker.alertId, now)) {
          acknowledged += 1;
          this.fireAnswered(alert);
        }
        continue;
      }
      if (marker.acknowledged && marker.acknowledgedAt !== null && now - marker.acknowledgedAt > ackRetentionMs) {
        await markers.remove(marker.alertId);
        pruned += 1;
      }
    }

    const unanswered = new Map(
      incoming.filter((a) => a.receiverId === userId && a.response === null).map((a) => [a.id, a])
    );
    let receivedChanged = 0;
    for (const id of this.awaitingReply.keys()) if (!unanswered.has(id)) receivedChanged += 1;
    for (const id of unanswered.keys()) if (!this.awaitingReply.has(id)) receivedChanged += 1;
    this.awaitingReply.clear();
    for (const [id, alert] of unanswered) this.awaitingReply.set(id, alert);

    const report = { acknowledged, dropped, pruned, receivedChanged, changes: acknowledged + dropped + pruned + receivedChanged };
    if (report.changes > 0) this.options.logger.info('acknowledgments reconciled', { ...report });
    return report;
  }

  async summary(): Promise<AckSummary> {
    const now = this.clock.now();
    const result: AckSummary = { pending: [], timedOut: [], acknowledged: [] };
    for (const marker of await this.options.markers.list()) {
      if (marker.acknowledged) result.acknowledged.push(marker);
      else if (now - marker.sentAt > this.options.ackTimeoutMs) result.timedOut.push(marker);
      else result.pending.push(marker);
    }
    return result;
  }

  private fireAnswered(alert: Alert): void {
    try {
      this.options.onAnswered?.(alert);
    } catch (e) {
      this.options.logger.warn('answered handler threw', { alertId: alert.id, error: errorMessage(e) });
    }
  }
}
