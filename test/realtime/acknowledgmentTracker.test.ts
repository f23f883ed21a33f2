import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AlertService } from '../../src/alerts/alertService.js';
import { fingerprintPlate } from '../../src/alerts/plateFingerprint.js';
import type { Alert } from '../../src/core/types.js';
import { InMemoryMarkerStore } from '../../src/data/markerStore.js';
import { SqliteStore } from '../../src/data/sqliteStore.js';
import { EntitlementGate } from '../../src/entitlement/entitlementGate.js';
import { AcknowledgmentTracker } from '../../src/realtime/acknowledgmentTracker.js';
import type { AlertFeed } from '../../src/data/alertStore.js';
import { createMockLogger, FakeFeed, makeAlert, ManualClock, T0, testConfig, type LogEntry } from '../helpers.js';

const PLATE = fingerprintPlate('KL 5521');
const ACK_TIMEOUT_MS = 600_000;
const ACK_RETENTION_MS = 3_600_000;

describe('AcknowledgmentTracker', () => {
  let clock: ManualClock;
  let markers: InMemoryMarkerStore;
  let answered: Alert[];

  const trackerFor = (userId: string, feed: AlertFeed): AcknowledgmentTracker =>
    new AcknowledgmentTracker({
      userId,
      feed,
      markers,
      ackTimeoutMs: ACK_TIMEOUT_MS,
      ackRetentionMs: ACK_RETENTION_MS,
      logger: createMockLogger(),
      clock,
      onAnswered: (alert) => { answered.push(alert); }
    });

  beforeEach(() => {
    clock = new ManualClock();
    markers = new InMemoryMarkerStore();
    answered = [];
  });

  describe('against the alert service', () => {
    let store: SqliteStore;
    let service: AlertService;

    beforeEach(() => {
      store = new SqliteStore(':memory:', { clock });
      service = new AlertService({
        store,
        plates: store,
        gate: new EntitlementGate(store, testConfig().quota, { clock }),
        config: testConfig().alerts,
        logger: createMockLogger(),
        clock
      });
    });

    afterEach(() => {
      store.close();
    });

    const send = async (...owners: string[]): Promise<string[]> => {
      for (const owner of owners) await store.registerPlate(owner, PLATE, 3);
      const result = await service.sendAlert(PLATE, 'A', 'blocked');
      if (!result.ok) throw result.error;
      return result.value.alertIds;
    };

    it('tracks one marker per row of a fan-out', async () => {
      const ids = await send('B', 'C');
      const rows = await store.queryBySender('A');

      expect(rows.map((r) => r.receiverId).sort()).toEqual(['B', 'C']);
      expect(rows.every((r) => r.response === null)).toBe(true);

      const tracker = trackerFor('A', store);
      await tracker.trackSent(ids);
      expect(await tracker.unacknowledgedCount()).toEqual({ sent: 2, received: 0 });
    });

    it('acknowledges exactly once when the response is delivered twice', async () => {
      const tracker = trackerFor('A', store);
      await tracker.trackSent(await send('B', 'C'));
      const [rowB] = await store.queryByReceiver('B');
      const result = await service.sendResponse(rowB?.id ?? '', 'moving_now');
      if (!result.ok) throw result.error;

      expect(await tracker.observeOutgoing(result.value)).toBe(true);
      expect(await tracker.observeOutgoing(result.value)).toBe(false);
      expect(await tracker.unacknowledgedCount()).toEqual({ sent: 1, received: 0 });
      expect(answered.map((a) => a.id)).toEqual([result.value.id]);
    });

    it('drops the count from 1 to 0 on reconcile after the receiver answers', async () => {
      const tracker = trackerFor('A', store);
      const [id = ''] = await send('B');
      await tracker.trackSent([id]);
      expect((await tracker.unacknowledgedCount()).sent).toBe(1);

      clock.advance(30_000);
      const result = await service.sendResponse(id, 'moving_now');
      if (!result.ok) throw result.error;
      expect(result.value.readAt).toBe(T0 + 30_000);
      expect(result.value.respondedAt).toBe(T0 + 30_000);

      const first = await tracker.reconcile();
      expect(first).toEqual({ acknowledged: 1, dropped: 0, pruned: 0, receivedChanged: 0, changes: 1 });
      expect((await tracker.unacknowledgedCount()).sent).toBe(0);

      const markersBefore = await markers.list();
      const second = await tracker.reconcile();
      expect(second).toEqual({ acknowledged: 0, dropped: 0, pruned: 0, receivedChanged: 0, changes: 0 });
      expect(await markers.list()).toEqual(markersBefore);
      expect(answered).toHaveLength(1);
    });

    it('removes markers whose alert no longer exists', async () => {
      const tracker = trackerFor('A', store);
      await markers.create('ghost', T0);
      expect((await tracker.reconcile()).dropped).toBe(1);
      expect(await markers.get('ghost')).toBeNull();
    });
  });

  it('keeps the set of received alerts awaiting a reply', async () => {
    const feed = new FakeFeed();
    const tracker = trackerFor('user-b', feed);
    const alert = makeAlert();

    tracker.observeIncoming(alert);
    tracker.observeIncoming(makeAlert({ receiverId: 'someone-else' }));
    expect((await tracker.unacknowledgedCount()).received).toBe(1);

    tracker.observeIncoming({ ...alert, response: { kind: 'five_minutes' }, respondedAt: T0, readAt: T0 });
    expect((await tracker.unacknowledgedCount()).received).toBe(0);
  });

  it('rebuilds the received set from storage on reconcile', async () => {
    const feed = new FakeFeed();
    const tracker = trackerFor('user-b', feed);
    const stale = makeAlert();
    tracker.observeIncoming(stale);
    feed.put({ ...stale, response: { kind: 'cant_move' }, respondedAt: T0, readAt: T0 });
    feed.put(makeAlert());

    const report = await tracker.reconcile();

    expect(report.receivedChanged).toBe(2);
    expect((await tracker.unacknowledgedCount()).received).toBe(1);
    expect((await tracker.reconcile()).changes).toBe(0);
  });

  it('ignores outgoing rows without a response or from another sender', async () => {
    const tracker = trackerFor('user-a', new FakeFeed());
    const alert = makeAlert();
    await tracker.trackSent([alert.id]);

    expect(await tracker.observeOutgoing(alert)).toBe(false);
    expect(await tracker.observeOutgoing({ ...alert, senderId: 'user-x', response: { kind: 'wrong_car' } })).toBe(false);
    expect((await tracker.unacknowledgedCount()).sent).toBe(1);
  });

  it('prunes acknowledged markers past retention', async () => {
    const feed = new FakeFeed();
    const alert = makeAlert({ response: { kind: 'moving_now' }, respondedAt: T0, readAt: T0 });
    feed.put(alert);
    const tracker = trackerFor('user-a', feed);
    await markers.create(alert.id, T0);
    await markers.acknowledge(alert.id, T0);

    clock.advance(ACK_RETENTION_MS);
    expect((await tracker.reconcile()).pruned).toBe(0);
    clock.advance(1);
    expect((await tracker.reconcile()).pruned).toBe(1);
    expect(await markers.list()).toEqual([]);
  });

  it('groups markers into pending, timed out and acknowledged', async () => {
    const tracker = trackerFor('user-a', new FakeFeed());
    await markers.create('late', T0);
    await markers.create('recent', T0 + ACK_TIMEOUT_MS);
    await markers.create('done', T0);
    await markers.acknowledge('done', T0 + 10);
    clock.advance(ACK_TIMEOUT_MS + 1);

    const summary = await tracker.summary();

    expect(summary.timedOut.map((m) => m.alertId)).toEqual(['late']);
    expect(summary.pending.map((m) => m.alertId)).toEqual(['recent']);
    expect(summary.acknowledged.map((m) => m.alertId)).toEqual(['done']);
  });

  it('keeps going when the answered handler throws', async () => {
    const entries: LogEntry[] = [];
    const tracker = new AcknowledgmentTracker({
      userId: 'user-a',
      feed: new FakeFeed(),
      markers,
      ackTimeoutMs: ACK_TIMEOUT_MS,
      ackRetentionMs: ACK_RETENTION_MS,
      logger: createMockLogger(entries),
      clock,
      onAnswered: () => { throw new Error('toast failed'); }
    });
    const alert = makeAlert({ response: { kind: 'moving_now' }, respondedAt: T0, readAt: T0 });
    await tracker.trackSent([alert.id]);

    expect(await tracker.observeOutgoing(alert)).toBe(true);
    expect(entries.map((e) => e.message)).toEqual(['answered handler threw']);
  });
});
