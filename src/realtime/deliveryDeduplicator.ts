import { systemClock, type Clock } from '../core/clock.js';
import type { Alert } from '../core/types.js';

/**
 * Session-scoped seen-set. An alert is surfaced at most once per session, and only while
 * it is unread, unanswered and fresher than the window.
 */
export class DeliveryDeduplicator {
  private readonly seen = new Set<string>();

  constructor(
    private readonly freshnessWindowMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  /** Records the id and reports whether this observation should be presented. */
  observe(alert: Alert): boolean {
    const firstSighting = !this.seen.has(alert.id);
    this.seen.add(alert.id);
    return (
      firstSighting &&
      alert.response === null &&
      alert.readAt === null &&
      this.clock.now() - alert.createdAt < this.freshnessWindowMs
    );
  }

  hasSeen(alertId: string): boolean {
    return this.seen.has(alertId);
  }

  get size(): number {
    return this.seen.size;
  }
}
