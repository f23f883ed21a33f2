/**
 * WebSocket gateway — streams alert rows to connected users.
 *
 * Clients connect via `ws://host:port/ws?userId=<id>&token=<key>` and pick directions:
 *   { "action": "subscribe", "channels": ["incoming", "outgoing"] }
 *   { "action": "unsubscribe", "channels": ["outgoing"] }
 *   { "action": "ping" }
 *
 * Every row the store writes for that user is pushed as
 *   { "type": "alert", "channel": "incoming", "data": <wire row> }
 *
 * The gateway also answers "is this user connected right now?" for push decisions.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HttpServer } from 'node:http';
import type { Logger } from '../../../src/core/logger.js';
import type { Metrics } from '../../../src/core/metrics.js';
import type { Alert } from '../../../src/core/types.js';
import type { PresenceRegistry } from '../../../src/alerts/alertService.js';
import { toWire } from '../../../src/alerts/wire.js';
import { isAuthorizedKey } from '../middleware/auth.js';
import type { EventBus } from '../services/eventBus.js';

export type AlertChannel = 'incoming' | 'outgoing';

export const ALERT_CHANNELS: readonly AlertChannel[] = ['incoming', 'outgoing'];

// ── Client tracking ──────────────────────────────────────────────────────────

interface ClientState {
  id: string;
  userId: string;
  unsubscribers: Map<AlertChannel, () => void>;
  alive: boolean;
}

// ── WebSocket message schemas ────────────────────────────────────────────────

type ClientMessage =
  | { action: 'subscribe' | 'unsubscribe'; channels: string[] }
  | { action: 'ping' };

// ── Helpers ──────────────────────────────────────────────────────────────────

function isAlertChannel(ch: string): ch is AlertChannel {
  return ch === 'incoming' || ch === 'outgoing';
}

function parseClientMessage(raw: string): ClientMessage | null {
  let msg: unknown;
  try {
    msg = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof msg !== 'object' || msg === null || !('action' in msg)) return null;
  const { action } = msg;
  if (action === 'ping') return { action: 'ping' };
  if ((action === 'subscribe' || action === 'unsubscribe') && 'channels' in msg) {
    const { channels } = msg;
    if (Array.isArray(channels)) {
      const names = channels.filter((c): c is string => typeof c === 'string');
      if (names.length === channels.length) return { action, channels: names };
    }
  }
  return null;
}

function sendJson(ws: WebSocket, data: unknown): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(data));
  }
}

function matches(channel: AlertChannel, userId: string, alert: Alert): boolean {
  return channel === 'incoming' ? alert.receiverId === userId : alert.senderId === userId;
}

// ── Gateway ──────────────────────────────────────────────────────────────────

export interface AlertGatewayOptions {
  httpServer: HttpServer;
  bus: EventBus;
  logger: Logger;
  metrics?: Metrics;
  /** URL path for WebSocket upgrade. Default: '/ws'. */
  path?: string;
  /** If set, clients must pass ?token=<key>. */
  apiKey?: string;
  heartbeatMs?: number;
}

export interface AlertGateway extends PresenceRegistry {
  readonly wss: WebSocketServer;
  close(): Promise<void>;
}

export function createAlertGateway(options: AlertGatewayOptions): AlertGateway {
  const { httpServer, bus, logger, metrics, apiKey } = options;
  const path = options.path ?? '/ws';
  const heartbeatMs = options.heartbeatMs ?? 30_000;

  const wss = new WebSocketServer({ server: httpServer, path, maxPayload: 4096 });
  const clients = new Map<WebSocket, ClientState>();
  const socketsPerUser = new Map<string, number>();
  let clientCounter = 0;

  const release = (ws: WebSocket, state: ClientState): void => {
    if (!clients.delete(ws)) return;
    for (const unsub of state.unsubscribers.values()) unsub();
    state.unsubscribers.clear();
    const remaining = (socketsPerUser.get(state.userId) ?? 1) - 1;
    if (remaining > 0) socketsPerUser.set(state.userId, remaining);
    else socketsPerUser.delete(state.userId);
    metrics?.gauge('ws_clients', clients.size);
  };

  // ── Connection handler ───────────────────────────────────────────────────

  wss.on('connection', (ws, req) => {
    const url = new URL(req.url ?? '', `http://${req.headers.host ?? 'localhost'}`);
    if (!isAuthorizedKey(apiKey, url.searchParams.get('token'))) {
      sendJson(ws, { error: 'UNAUTHORIZED', message: 'Invalid or missing token' });
      ws.close(4001, 'Unauthorized');
      return;
    }
    const userId = url.searchParams.get('userId');
    if (!userId) {
      sendJson(ws, { error: 'VALIDATION', message: 'userId query parameter is required' });
      ws.close(4002, 'Missing userId');
      return;
    }

    clientCounter += 1;
    const state: ClientState = {
      id: `ws-${clientCounter}`,
      userId,
      unsubscribers: new Map(),
      alive: true
    };
    clients.set(ws, state);
    socketsPerUser.set(userId, (socketsPerUser.get(userId) ?? 0) + 1);
    metrics?.gauge('ws_clients', clients.size);

    logger.info('ws client connected', { clientId: state.id, userId });
    sendJson(ws, { type: 'welcome', clientId: state.id, availableChannels: ALERT_CHANNELS });

    // ── Message handler ──────────────────────────────────────────────────

    ws.on('message', (raw) => {
      const msg = parseClientMessage(String(raw));
      if (!msg) {
        sendJson(ws, { error: 'invalid_message', message: 'Send JSON with action: subscribe|unsubscribe|ping' });
        return;
      }

      if (msg.action === 'ping') {
        sendJson(ws, { type: 'pong', timestamp: Date.now() });
        return;
      }

      const valid = msg.channels.filter(isAlertChannel);
      const invalid = msg.channels.filter((c) => !isAlertChannel(c));
      if (invalid.length > 0) {
        sendJson(ws, { type: 'warning', message: `Unknown channels ignored: ${invalid.join(', ')}` });
      }

      if (msg.action === 'subscribe') {
        for (const channel of valid) {
          if (state.unsubscribers.has(channel)) continue;
          const unsub = bus.on('alertChanged', ({ alert }) => {
            if (matches(channel, userId, alert)) {
              sendJson(ws, { type: 'alert', channel, data: toWire(alert) });
            }
          });
          state.unsubscribers.set(channel, unsub);
        }
        sendJson(ws, { type: 'subscribed', channels: [...state.unsubscribers.keys()] });
        logger.debug('ws client subscribed', { clientId: state.id, channels: [...state.unsubscribers.keys()] });
        return;
      }

      for (const channel of valid) {
        state.unsubscribers.get(channel)?.();
        state.unsubscribers.delete(channel);
      }
      sendJson(ws, { type: 'unsubscribed', channels: [...state.unsubscribers.keys()] });
    });

    // ── Disconnect handler ───────────────────────────────────────────────

    ws.on('close', () => {
      release(ws, state);
      logger.info('ws client disconnected', { clientId: state.id, userId });
    });

    ws.on('error', (err) => {
      logger.warn('ws client error', { clientId: state.id, error: String(err) });
    });

    ws.on('pong', () => {
      state.alive = true;
    });
  });

  // ── Heartbeat interval ─────────────────────────────────────────────────

  const heartbeatInterval = setInterval(() => {
    for (const [ws, state] of clients.entries()) {
      if (!state.alive) {
        logger.debug('ws client heartbeat timeout, terminating', { clientId: state.id });
        release(ws, state);
        ws.terminate();
        continue;
      }
      state.alive = false;
      ws.ping();
    }
  }, heartbeatMs);

  // The store going away ends every stream; clients reconnect and resync.
  const offClosed = bus.on('storeClosed', ({ reason }) => {
    for (const ws of clients.keys()) ws.close(1011, reason);
  });

  wss.on('close', () => {
    clearInterval(heartbeatInterval);
    offClosed();
  });

  logger.info('websocket gateway attached', { path, heartbeatMs });

  return {
    wss,
    isConnected: (userId) => (socketsPerUser.get(userId) ?? 0) > 0,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const ws of clients.keys()) ws.terminate();
        wss.close((err) => (err ? reject(err) : resolve()));
      })
  };
}
