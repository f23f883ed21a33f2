import { describe, expect, it } from 'vitest';
import { NetworkError } from '../../src/core/errors.js';
import type { Alert } from '../../src/core/types.js';
import { RealtimeAlertStream, type StreamDirection } from '../../src/realtime/realtimeAlertStream.js';
import { createMockLogger, FakeFeed, makeAlert, type LogEntry } from '../helpers.js';

const recordingListener = () => {
  const rows: Array<[StreamDirection, Alert]> = [];
  const errors: Array<[StreamDirection, NetworkError]> = [];
  const ready: StreamDirection[] = [];
  return {
    rows,
    errors,
    ready,
    onRow: (d: StreamDirection, a: Alert) => { rows.push([d, a]); },
    onError: (d: StreamDirection, e: NetworkError) => { errors.push([d, e]); },
    onReady: (d: StreamDirection) => { ready.push(d); }
  };
};

describe('RealtimeAlertStream', () => {
  it('routes rows by direction', () => {
    const feed = new FakeFeed();
    const listener = recordingListener();
    const stream = new RealtimeAlertStream(feed, 'user-b', listener);
    stream.subscribe('incoming');
    stream.subscribe('outgoing');

    const incoming = makeAlert({ receiverId: 'user-b' });
    const outgoing = makeAlert({ senderId: 'user-b', receiverId: 'user-c' });
    feed.push(incoming);
    feed.push(outgoing);

    expect(listener.rows).toEqual([
      ['incoming', incoming],
      ['outgoing', outgoing]
    ]);
  });

  it('drops a failed subscription and reports it', () => {
    const feed = new FakeFeed();
    const listener = recordingListener();
    const entries: LogEntry[] = [];
    const stream = new RealtimeAlertStream(feed, 'user-b', listener, createMockLogger(entries));
    stream.subscribe('incoming');

    feed.fail('incoming');

    expect(stream.isActive('incoming')).toBe(false);
    expect(listener.errors.map(([d, e]) => [d, e.message])).toEqual([['incoming', 'incoming stream dropped']]);
    expect(entries.find((e) => e.message === 'alert stream dropped')?.context).toEqual({
      direction: 'incoming',
      error: 'incoming stream dropped'
    });
  });

  it('replaces a live subscription and silences the old one', () => {
    const feed = new FakeFeed();
    const listener = recordingListener();
    const stream = new RealtimeAlertStream(feed, 'user-b', listener);
    stream.subscribe('incoming');
    const first = feed.subscriptions[0];
    stream.subscribe('incoming');

    expect(feed.activeCount('incoming')).toBe(1);
    first?.handlers.onRow(makeAlert());
    first?.handlers.onError(new NetworkError('late'));
    expect(listener.rows).toEqual([]);
    expect(listener.errors).toEqual([]);
  });

  it('forwards readiness and closes both directions', () => {
    const feed = new FakeFeed();
    const listener = recordingListener();
    const stream = new RealtimeAlertStream(feed, 'user-b', listener);
    stream.subscribe('incoming');
    stream.subscribe('outgoing');
    feed.ready('outgoing');

    stream.close();

    expect(listener.ready).toEqual(['outgoing']);
    expect(feed.activeCount()).toBe(0);
    expect(stream.isActive('incoming')).toBe(false);
  });
});
