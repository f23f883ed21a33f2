import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { toWire } from '../../src/alerts/wire.js';
import {
  RemoteAlertClient,
  errorFromBody,
  type SocketFactory,
  type StreamSocketHandlers
} from '../../src/client/remoteAlertClient.js';
import {
  ConflictError,
  NetworkError,
  PartialFailureError,
  PersistenceError,
  RateLimitExceededError
} from '../../src/core/errors.js';
import type { Alert } from '../../src/core/types.js';
import { makeAlert, T0 } from '../helpers.js';

const PLATE = 'e'.repeat(64);

interface Reply {
  status: number;
  body: unknown;
}

const stubHttp = (reply: (config: InternalAxiosRequestConfig) => Reply) => {
  const calls: InternalAxiosRequestConfig[] = [];
  const http: AxiosInstance = axios.create({
    baseURL: 'http://alerts.test',
    adapter: async (config) => {
      calls.push(config);
      const { status, body } = reply(config);
      return { data: body, status, statusText: String(status), headers: {}, config };
    }
  });
  return { http, calls };
};

interface FakeSocket {
  url: string;
  handlers: StreamSocketHandlers;
  sent: string[];
  closed: boolean;
}

const fakeSockets = () => {
  const sockets: FakeSocket[] = [];
  const factory: SocketFactory = (url, handlers) => {
    const socket: FakeSocket = { url, handlers, sent: [], closed: false };
    sockets.push(socket);
    return {
      send: (data) => { socket.sent.push(data); },
      close: () => { socket.closed = true; }
    };
  };
  return { sockets, factory };
};

describe('RemoteAlertClient commands', () => {
  it('posts a send and returns the receipt', async () => {
    const { http, calls } = stubHttp(() => ({ status: 200, body: { alertIds: ['x', 'y'], recipientCount: 2 } }));
    const client = new RemoteAlertClient({ baseUrl: 'http://alerts.test', http });

    const result = await client.sendAlert(PLATE, 'user-a', 'hello');

    expect(result).toEqual({ ok: true, value: { alertIds: ['x', 'y'], recipientCount: 2 } });
    expect(calls[0]?.method).toBe('post');
    expect(calls[0]?.url).toBe('/api/alerts');
    expect(JSON.parse(String(calls[0]?.data))).toEqual({ senderId: 'user-a', plateHash: PLATE, message: 'hello' });
  });

  it('rebuilds a rate-limit error from the response body', async () => {
    const { http } = stubHttp(() => ({
      status: 429,
      body: { error: 'RATE_LIMIT_EXCEEDED', message: 'daily alert limit of 3 reached', details: { quota: 3 } }
    }));
    const client = new RemoteAlertClient({ baseUrl: 'http://alerts.test', http });

    const result = await client.sendAlert(PLATE, 'user-a');

    expect(result.ok).toBe(false);
    const error = result.ok ? null : result.error;
    expect(error).toBeInstanceOf(RateLimitExceededError);
    expect(error instanceof RateLimitExceededError ? error.quota : null).toBe(3);
    expect(error?.message).toBe('daily alert limit of 3 reached');
  });

  it('decodes the alert returned by a response', async () => {
    const answered = makeAlert({ id: 'a-9', response: { kind: 'cant_move' }, respondedAt: T0, readAt: T0 });
    const { http, calls } = stubHttp(() => ({ status: 200, body: { alert: toWire(answered) } }));
    const client = new RemoteAlertClient({ baseUrl: 'http://alerts.test', http });

    const result = await client.sendResponse('a-9', 'cant_move', 'stuck behind a van');

    expect(result).toEqual({ ok: true, value: answered });
    expect(JSON.parse(String(calls[0]?.data))).toEqual({
      alertId: 'a-9',
      response: 'cant_move',
      responseMessage: 'stuck behind a van'
    });
  });

  it('maps an already-answered alert to ConflictError', async () => {
    const { http } = stubHttp(() => ({
      status: 409,
      body: { error: 'ALREADY_RESPONDED', message: 'alert already has a response', details: { alertId: 'a-1' } }
    }));
    const client = new RemoteAlertClient({ baseUrl: 'http://alerts.test', http });
    const result = await client.sendResponse('a-1', 'moving_now');
    expect(result.ok ? null : result.error).toBeInstanceOf(ConflictError);
  });

  it('turns transport failures into NetworkError', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error('socket hang up');
      }
    });
    const client = new RemoteAlertClient({ baseUrl: 'http://alerts.test', http });

    const result = await client.sendAlert(PLATE, 'user-a');

    const error = result.ok ? null : result.error;
    expect(error).toBeInstanceOf(NetworkError);
    expect(error?.message).toBe('POST /api/alerts failed: socket hang up');
  });
});

describe('RemoteAlertClient reads', () => {
  it('lists incoming alerts for a user', async () => {
    const alert = makeAlert({ message: 'gate' });
    const { http, calls } = stubHttp(() => ({ status: 200, body: { alerts: [toWire(alert)], count: 1 } }));
    const client = new RemoteAlertClient({ baseUrl: 'http://alerts.test', http });

    expect(await client.queryByReceiver('user-b')).toEqual([alert]);
    expect(calls[0]?.url).toBe('/api/alerts/incoming');
    expect(calls[0]?.params).toEqual({ userId: 'user-b' });
  });

  it('returns null for a missing alert', async () => {
    const { http } = stubHttp(() => ({ status: 404, body: { error: 'NOT_FOUND', message: 'alert not found' } }));
    const client = new RemoteAlertClient({ baseUrl: 'http://alerts.test', http });
    expect(await client.findById('missing')).toBeNull();
  });

  it('rejects a body that does not match the expected shape', async () => {
    const { http } = stubHttp(() => ({ status: 200, body: { rows: [] } }));
    const client = new RemoteAlertClient({ baseUrl: 'http://alerts.test', http });
    await expect(client.queryBySender('user-a')).rejects.toThrow('malformed response from /api/alerts/outgoing');
  });

  it('parses entitlement snapshots', async () => {
    const { http } = stubHttp(() => ({
      status: 200,
      body: { user_id: 'user-a', tier: 'premium', quota: 200, used: 4, remaining: 196, resets_at: '2026-01-16T12:00:00.000Z' }
    }));
    const client = new RemoteAlertClient({ baseUrl: 'http://alerts.test', http });

    expect(await client.entitlement('user-a')).toEqual({
      userId: 'user-a',
      tier: 'premium',
      quota: 200,
      used: 4,
      remaining: 196,
      resetsAt: Date.UTC(2026, 0, 16, 12)
    });
  });
});

describe('errorFromBody', () => {
  it('restores partial-failure details', () => {
    const error = errorFromBody(207, {
      error: 'PARTIAL_FAILURE',
      message: 'alert delivered to 1 of 2 recipients',
      details: { succeeded: ['x'], failed: [{ receiverId: 'c', error: 'disk full' }] }
    });
    expect(error).toBeInstanceOf(PartialFailureError);
    expect(error instanceof PartialFailureError ? error.failed : null).toEqual([{ receiverId: 'c', error: 'disk full' }]);
  });

  it('treats an unrecognised body as a persistence failure', () => {
    const error = errorFromBody(502, '<html>bad gateway</html>');
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error.message).toBe('unexpected response (HTTP 502)');
  });
});

describe('RemoteAlertClient subscriptions', () => {
  const setup = () => {
    const { sockets, factory } = fakeSockets();
    const client = new RemoteAlertClient({ baseUrl: 'http://alerts.test/', apiKey: 'test-secret', socketFactory: factory });
    const rows: Alert[] = [];
    const errors: NetworkError[] = [];
    let ready = 0;
    const sub = client.subscribeByReceiver('user-b', {
      onRow: (a) => { rows.push(a); },
      onError: (e) => { errors.push(e); },
      onReady: () => { ready += 1; }
    });
    return { sockets, rows, errors, sub, readyCount: () => ready };
  };

  it('connects with the user and token and subscribes on open', () => {
    const { sockets } = setup();
    const socket = sockets[0];

    expect(socket?.url).toBe('ws://alerts.test/ws?userId=user-b&token=test-secret');
    socket?.handlers.onOpen();
    expect(socket?.sent).toEqual([JSON.stringify({ action: 'subscribe', channels: ['incoming'] })]);
  });

  it('reports readiness and delivers rows for its channel only', () => {
    const { sockets, rows, readyCount } = setup();
    const socket = sockets[0];
    const alert = makeAlert();

    socket?.handlers.onMessage(JSON.stringify({ type: 'welcome', clientId: 'ws-1' }));
    socket?.handlers.onMessage(JSON.stringify({ type: 'subscribed', channels: ['incoming'] }));
    socket?.handlers.onMessage(JSON.stringify({ type: 'alert', channel: 'incoming', data: toWire(alert) }));
    socket?.handlers.onMessage(JSON.stringify({ type: 'alert', channel: 'outgoing', data: toWire(alert) }));
    socket?.handlers.onMessage('not json');

    expect(readyCount()).toBe(1);
    expect(rows).toEqual([alert]);
  });

  it('reports a closed socket once as NetworkError', () => {
    const { sockets, errors } = setup();
    const socket = sockets[0];

    socket?.handlers.onClose('socket closed (1006)');
    socket?.handlers.onError(new Error('ECONNRESET'));

    expect(errors).toHaveLength(1);
    expect(errors[0]?.message).toBe('socket closed (1006)');
    expect(socket?.closed).toBe(true);
  });

  it('closes quietly on unsubscribe', () => {
    const { sockets, errors, sub } = setup();
    sub.unsubscribe();
    sockets[0]?.handlers.onClose('socket closed (1000)');
    expect(sockets[0]?.closed).toBe(true);
    expect(errors).toEqual([]);
  });
});
