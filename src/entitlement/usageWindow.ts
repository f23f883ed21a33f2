import type { QuotaResetPolicy } from '../config/types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
const MINUTE_MS = 60 * 1000;

export interface UsageWindow {
  /** Start recorded for a window opened at `now`. */
  start: number;
  /** Any stored window that started before this is expired. */
  cutoff: number;
}

export interface UsageWindowPolicy {
  resetPolicy: QuotaResetPolicy;
  utcOffsetMinutes: number;
}

/** Start of the calendar day containing `now`, in a timezone `utcOffsetMinutes` east of UTC. */
export const localDayStart = (now: number, utcOffsetMinutes: number): number => {
  const offsetMs = utcOffsetMinutes * MINUTE_MS;
  const local = now + offsetMs;
  return local - (((local % DAY_MS) + DAY_MS) % DAY_MS) - offsetMs;
};

export const currentWindow = (now: number, policy: UsageWindowPolicy): UsageWindow => {
  if (policy.resetPolicy === 'midnight') {
    const dayStart = localDayStart(now, policy.utcOffsetMinutes);
    return { start: dayStart, cutoff: dayStart };
  }
  // Rolling: a window stays open for 24 hours from its first alert.
  return { start: now, cutoff: now - DAY_MS + 1 };
};

/** When a window that started at `windowStart` stops counting. */
export const windowResetsAt = (windowStart: number, policy: UsageWindowPolicy): number => {
  if (policy.resetPolicy === 'midnight') {
    return localDayStart(windowStart, policy.utcOffsetMinutes) + DAY_MS;
  }
  return windowStart + DAY_MS;
};
