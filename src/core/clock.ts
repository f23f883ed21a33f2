/** Source of "now" in epoch milliseconds. Injected so quota windows and freshness checks are testable. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};
