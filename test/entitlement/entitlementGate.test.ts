import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EntitlementGate } from '../../src/entitlement/entitlementGate.js';
import { DAY_MS } from '../../src/entitlement/usageWindow.js';
import { SqliteStore } from '../../src/data/sqliteStore.js';
import type { QuotaConfig } from '../../src/config/types.js';
import { createMockLogger, createMockMetrics, ManualClock, T0, testConfig } from '../helpers.js';

const HOUR_MS = 60 * 60 * 1000;

describe('EntitlementGate', () => {
  let clock: ManualClock;
  let store: SqliteStore;
  let quota: QuotaConfig;

  beforeEach(() => {
    clock = new ManualClock();
    store = new SqliteStore(':memory:', { clock });
    quota = testConfig().quota;
  });

  afterEach(() => {
    store.close();
  });

  it('allows the free quota and then refuses with nothing remaining', async () => {
    const logger = createMockLogger();
    const metrics = createMockMetrics();
    const gate = new EntitlementGate(store, quota, { clock, logger, metrics });

    const decisions = [];
    for (let i = 0; i < 4; i++) decisions.push(await gate.tryConsume('a'));

    expect(decisions.map((d) => [d.allowed, d.remaining])).toEqual([
      [true, 2],
      [true, 1],
      [true, 0],
      [false, 0]
    ]);
    expect(decisions[3]).toEqual({ allowed: false, remaining: 0, quota: 3, tier: 'free' });
    expect(metrics.counters.get('quota_checks_total')).toBe(4);
    expect(logger.entries.filter((e) => e.message === 'daily alert quota exhausted')).toEqual([
      { level: 'info', message: 'daily alert quota exhausted', context: { userId: 'a', tier: 'free', quota: 3 } }
    ]);
  });

  it('leaves paid tiers unaffected by the free limit', async () => {
    const gate = new EntitlementGate(store, quota, { clock });
    for (let i = 0; i < 3; i++) await gate.tryConsume('f');
    await gate.setTier('p', 'premium');
    for (let i = 0; i < 3; i++) await gate.tryConsume('p');

    expect((await gate.tryConsume('f')).allowed).toBe(false);
    expect(await gate.tryConsume('p')).toEqual({ allowed: true, remaining: 196, quota: 200, tier: 'premium' });
    expect(await gate.isPremium('p')).toBe(true);
    expect(await gate.isPremium('f')).toBe(false);
    expect(await gate.dailyQuota('p')).toBe(200);
    expect(await gate.dailyQuota('nobody')).toBe(3);
  });

  it('reopens a rolling window 24 hours after it started', async () => {
    const gate = new EntitlementGate(store, quota, { clock });
    for (let i = 0; i < 3; i++) await gate.tryConsume('a');

    clock.advance(DAY_MS - 1);
    expect((await gate.tryConsume('a')).allowed).toBe(false);
    clock.advance(1);
    expect(await gate.tryConsume('a')).toEqual({ allowed: true, remaining: 2, quota: 3, tier: 'free' });
  });

  it('reopens a midnight window at the next local midnight', async () => {
    const gate = new EntitlementGate(store, { ...quota, resetPolicy: 'midnight' }, { clock });
    for (let i = 0; i < 3; i++) await gate.tryConsume('a');

    clock.advance(12 * HOUR_MS - 1);
    expect((await gate.tryConsume('a')).allowed).toBe(false);
    clock.advance(1);
    expect((await gate.tryConsume('a')).allowed).toBe(true);
  });

  it('reports usage and reset time in snapshots', async () => {
    const gate = new EntitlementGate(store, quota, { clock });
    expect(await gate.snapshot('a')).toEqual({ userId: 'a', tier: 'free', quota: 3, used: 0, remaining: 3, resetsAt: null });

    await gate.tryConsume('a');
    expect(await gate.snapshot('a')).toEqual({ userId: 'a', tier: 'free', quota: 3, used: 1, remaining: 2, resetsAt: T0 + DAY_MS });

    clock.advance(DAY_MS);
    expect(await gate.snapshot('a')).toEqual({ userId: 'a', tier: 'free', quota: 3, used: 0, remaining: 3, resetsAt: null });
  });

  it('refunds a consumed unit', async () => {
    const gate = new EntitlementGate(store, quota, { clock });
    await gate.tryConsume('a');
    await gate.refund('a');
    expect((await gate.snapshot('a')).remaining).toBe(3);
  });
});
