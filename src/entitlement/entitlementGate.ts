import { systemClock, type Clock } from '../core/clock.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { ConsumeDecision, Tier } from '../core/types.js';
import type { QuotaConfig } from '../config/types.js';
import type { EntitlementStore } from '../data/entitlementStore.js';
import { currentWindow, windowResetsAt } from './usageWindow.js';

export interface EntitlementSnapshot {
  userId: string;
  tier: Tier;
  quota: number;
  used: number;
  remaining: number;
  /** Null while no window is open. */
  resetsAt: number | null;
}

export interface EntitlementGateOptions {
  clock?: Clock;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Daily alert quota per sender. The free tier gets `freeDailyLimit`; premium and lifetime
 * share the `paidDailyLimit` cap. Consumption is delegated to the store's single
 * conditional update, so concurrent sessions of one account cannot over-grant.
 */
export class EntitlementGate {
  private readonly clock: Clock;

  constructor(
    private readonly store: EntitlementStore,
    private readonly config: QuotaConfig,
    private readonly options: EntitlementGateOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  quotaFor(tier: Tier): number {
    return tier === 'free' ? this.config.freeDailyLimit : this.config.paidDailyLimit;
  }

  async isPremium(userId: string): Promise<boolean> {
    const state = await this.store.getState(userId);
    return state.tier !== 'free';
  }

  async dailyQuota(userId: string): Promise<number> {
    const state = await this.store.getState(userId);
    return this.quotaFor(state.tier);
  }

  async tryConsume(userId: string): Promise<ConsumeDecision> {
    const window = currentWindow(this.clock.now(), this.config);
    const outcome = await this.store.consume({
      userId,
      freeQuota: this.config.freeDailyLimit,
      paidQuota: this.config.paidDailyLimit,
      windowCutoff: window.cutoff,
      windowStart: window.start
    });
    const quota = this.quotaFor(outcome.tier);
    const decision: ConsumeDecision = {
      allowed: outcome.allowed,
      remaining: Math.max(0, quota - outcome.used),
      quota,
      tier: outcome.tier
    };

    this.options.metrics?.increment('quota_checks_total', 1, {
      tier: outcome.tier,
      allowed: String(outcome.allowed)
    });
    if (!decision.allowed) {
      this.options.logger?.info('daily alert quota exhausted', { userId, tier: outcome.tier, quota });
    }
    return decision;
  }

  /** Return one unit consumed by a send that wrote nothing. */
  async refund(userId: string): Promise<void> {
    const window = currentWindow(this.clock.now(), this.config);
    await this.store.refund(userId, window.cutoff);
  }

  async setTier(userId: string, tier: Tier): Promise<void> {
    await this.store.setTier(userId, tier);
    this.options.logger?.info('entitlement tier recorded', { userId, tier });
  }

  async snapshot(userId: string): Promise<EntitlementSnapshot> {
    const state = await this.store.getState(userId);
    const window = currentWindow(this.clock.now(), this.config);
    const quota = this.quotaFor(state.tier);
    const open = state.dailyAlertsUsed > 0 && state.usageWindowStart >= window.cutoff;
    const used = open ? state.dailyAlertsUsed : 0;
    return {
      userId,
      tier: state.tier,
      quota,
      used,
      remaining: Math.max(0, quota - used),
      resetsAt: open ? windowResetsAt(state.usageWindowStart, this.config) : null
    };
  }
}
