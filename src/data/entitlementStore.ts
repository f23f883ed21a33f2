import type { EntitlementState, Tier } from '../core/types.js';

export interface ConsumeRequest {
  userId: string;
  freeQuota: number;
  paidQuota: number;
  /** A stored window that started before this instant has expired. */
  windowCutoff: number;
  /** Start recorded when an expired (or missing) window is reopened. */
  windowStart: number;
}

export interface ConsumeOutcome {
  allowed: boolean;
  /** Alerts used in the current window after this call. */
  used: number;
  tier: Tier;
}

/**
 * Backing store of the entitlement gate. `consume` must be one atomic conditional
 * update: two sessions of the same account may call it at the same time.
 */
export interface EntitlementStore {
  getState(userId: string): Promise<EntitlementState>;
  setTier(userId: string, tier: Tier): Promise<void>;
  consume(request: ConsumeRequest): Promise<ConsumeOutcome>;
  /** Give back one unit consumed in the window that is still open at `windowCutoff`. */
  refund(userId: string, windowCutoff: number): Promise<void>;
}
