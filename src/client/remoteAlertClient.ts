/**
 * RemoteAlertClient — the alert engine seen from another process.
 *
 * Reads and commands go over the HTTP API (axios); subscriptions are WebSocket
 * connections to the gateway (ws), one per direction. Error bodies are mapped back to
 * the same typed errors the in-process service returns, and transport failures become
 * NetworkError, so an AlertSession runs unchanged against either side.
 */

import type { AxiosInstance, Method } from 'axios';
import { WebSocket } from 'ws';
import { z } from 'zod';
import {
  ConflictError,
  NetworkError,
  NotFoundError,
  PartialFailureError,
  PersistenceError,
  RateLimitExceededError,
  ValidationError,
  errorMessage,
  type AlertError
} from '../core/errors.js';
import { createHttpClient } from '../core/http.js';
import type { Logger } from '../core/logger.js';
import { err, ok, type Result } from '../core/result.js';
import type { Alert, PlateRegistration } from '../core/types.js';
import type { AlertCommands, SendAlertReceipt } from '../alerts/alertService.js';
import {
  fromWire,
  fromWireEntitlement,
  fromWirePlate,
  wireAlertSchema,
  wireEntitlementSchema,
  wirePlateSchema
} from '../alerts/wire.js';
import type { AlertFeed, AlertStreamHandlers, AlertSubscription } from '../data/alertStore.js';
import type { EntitlementSnapshot } from '../entitlement/entitlementGate.js';
import type { SnapshotSource } from '../realtime/alertSession.js';

// ── Socket seam ──────────────────────────────────────────────────────────────

export interface StreamSocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(reason: string): void;
  onError(error: Error): void;
}

export interface StreamSocket {
  send(data: string): void;
  close(): void;
}

export type SocketFactory = (url: string, handlers: StreamSocketHandlers) => StreamSocket;

export const wsSocketFactory: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(String(data)));
  ws.on('close', (code, reason) => handlers.onClose(reason.toString() || `socket closed (${code})`));
  ws.on('error', (e) => handlers.onError(e));
  return {
    send: (data) => ws.send(data),
    close: () => ws.close()
  };
};

// ── Response schemas ─────────────────────────────────────────────────────────

const errorBodySchema = z.object({
  error: z.string(),
  message: z.string().default(''),
  details: z.record(z.unknown()).optional()
});

const partialDetailsSchema = z.object({
  succeeded: z.array(z.string()),
  failed: z.array(z.object({ receiverId: z.string(), error: z.string() }))
});

const receiptSchema = z.object({ alertIds: z.array(z.string()), recipientCount: z.number().int() });
const alertBodySchema = z.object({ alert: wireAlertSchema });
const alertListSchema = z.object({ alerts: z.array(wireAlertSchema) });
const plateListSchema = z.object({ plates: z.array(wirePlateSchema) });

const serverMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('alert'), channel: z.enum(['incoming', 'outgoing']), data: wireAlertSchema }),
  z.object({ type: z.literal('subscribed'), channels: z.array(z.string()) }),
  z.object({ type: z.literal('welcome') }).passthrough(),
  z.object({ type: z.literal('unsubscribed') }).passthrough(),
  z.object({ type: z.literal('pong') }).passthrough(),
  z.object({ type: z.literal('warning'), message: z.string() })
]);

/** Rebuild the typed error from an API error body. */
export function errorFromBody(status: number, body: unknown): AlertError {
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) return new PersistenceError(`unexpected response (HTTP ${status})`, { status });
  const { error: code, message, details } = parsed.data;
  switch (code) {
    case 'VALIDATION':
      return new ValidationError(message, details);
    case 'NOT_FOUND':
      return new NotFoundError(message, details);
    case 'RATE_LIMIT_EXCEEDED': {
      const quota = typeof details?.['quota'] === 'number' ? details['quota'] : 0;
      return new RateLimitExceededError(message, quota);
    }
    case 'PARTIAL_FAILURE': {
      const partial = partialDetailsSchema.safeParse(details);
      return partial.success
        ? new PartialFailureError(partial.data.succeeded, partial.data.failed)
        : new PersistenceError(message, details);
    }
    case 'ALREADY_RESPONDED':
      return new ConflictError(message, details);
    case 'NETWORK':
      return new NetworkError(message, details);
    default:
      return new PersistenceError(message || `request failed (HTTP ${status})`, { status, code });
  }
}

// ── Client ───────────────────────────────────────────────────────────────────

export interface RemoteAlertClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  logger?: Logger;
  /** Preconfigured axios instance (tests pass one with a stub adapter). */
  http?: AxiosInstance;
  socketFactory?: SocketFactory;
}

interface RequestSpec {
  method: Method;
  path: string;
  params?: Record<string, string>;
  data?: unknown;
}

export class RemoteAlertClient implements AlertFeed, AlertCommands, SnapshotSource {
  private readonly http: AxiosInstance;
  private readonly socketFactory: SocketFactory;
  private readonly wsBase: string;

  constructor(private readonly options: RemoteAlertClientOptions) {
    const headers: Record<string, string> = options.apiKey ? { 'x-api-key': options.apiKey } : {};
    this.http = options.http ?? createHttpClient(options.baseUrl, options.timeoutMs ?? 10_000, headers);
    this.socketFactory = options.socketFactory ?? wsSocketFactory;
    this.wsBase = options.baseUrl.replace(/^http/, 'ws').replace(/\/+$/, '');
  }

  // ── Commands ─────────────────────────────────────────────────────────────

  async sendAlert(
    targetPlateFingerprint: string,
    senderId: string,
    message?: string | null
  ): Promise<Result<SendAlertReceipt>> {
    return this.request(
      { method: 'POST', path: '/api/alerts', data: { senderId, plateHash: targetPlateFingerprint, message: message ?? null } },
      receiptSchema
    );
  }

  async markAlertRead(alertId: string): Promise<Result<Alert>> {
    const result = await this.request({ method: 'POST', path: '/api/alerts/read', data: { alertId } }, alertBodySchema);
    return result.ok ? ok(fromWire(result.value.alert)) : result;
  }

  async sendResponse(alertId: string, response: string, responseMessage?: string | null): Promise<Result<Alert>> {
    const result = await this.request(
      { method: 'POST', path: '/api/alerts/response', data: { alertId, response, responseMessage: responseMessage ?? null } },
      alertBodySchema
    );
    return result.ok ? ok(fromWire(result.value.alert)) : result;
  }

  // ── Feed ─────────────────────────────────────────────────────────────────

  async findById(id: string): Promise<Alert | null> {
    const result = await this.request({ method: 'GET', path: '/api/alerts/get', params: { id } }, alertBodySchema);
    if (result.ok) return fromWire(result.value.alert);
    if (result.error instanceof NotFoundError) return null;
    throw result.error;
  }

  async queryByReceiver(userId: string): Promise<Alert[]> {
    return this.list('/api/alerts/incoming', userId);
  }

  async queryBySender(userId: string): Promise<Alert[]> {
    return this.list('/api/alerts/outgoing', userId);
  }

  subscribeByReceiver(userId: string, handlers: AlertStreamHandlers): AlertSubscription {
    return this.subscribe('incoming', userId, handlers);
  }

  subscribeBySender(userId: string, handlers: AlertStreamHandlers): AlertSubscription {
    return this.subscribe('outgoing', userId, handlers);
  }

  // ── Snapshots ────────────────────────────────────────────────────────────

  async entitlement(userId: string): Promise<EntitlementSnapshot> {
    const result = await this.request({ method: 'GET', path: '/api/entitlements', params: { userId } }, wireEntitlementSchema);
    if (!result.ok) throw result.error;
    return fromWireEntitlement(result.value);
  }

  async plates(userId: string): Promise<PlateRegistration[]> {
    const result = await this.request({ method: 'GET', path: '/api/plates', params: { userId } }, plateListSchema);
    if (!result.ok) throw result.error;
    return result.value.plates.map(fromWirePlate);
  }

  // ── Internals ────────────────────────────────────────────────────────────

  private async list(path: string, userId: string): Promise<Alert[]> {
    const result = await this.request({ method: 'GET', path, params: { userId } }, alertListSchema);
    if (!result.ok) throw result.error;
    return result.value.alerts.map(fromWire);
  }

  private async request<T>(spec: RequestSpec, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<Result<T>> {
    let status: number;
    let body: unknown;
    try {
      const res = await this.http.request<unknown>({
        method: spec.method,
        url: spec.path,
        params: spec.params,
        data: spec.data,
        validateStatus: () => true
      });
      status = res.status;
      body = res.data;
    } catch (e) {
      return err(new NetworkError(`${spec.method} ${spec.path} failed: ${errorMessage(e)}`));
    }

    if (status !== 200) return err(errorFromBody(status, body));
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return err(new PersistenceError(`malformed response from ${spec.path}`, { issues: parsed.error.issues.length }));
    }
    return ok(parsed.data);
  }

  private subscribe(channel: 'incoming' | 'outgoing', userId: string, handlers: AlertStreamHandlers): AlertSubscription {
    const params = new URLSearchParams({ userId });
    if (this.options.apiKey) params.set('token', this.options.apiKey);
    const url = `${this.wsBase}/ws?${params.toString()}`;

    let active = true;
    const fail = (reason: string): void => {
      if (!active) return;
      active = false;
      socket.close();
      handlers.onError(new NetworkError(reason, { channel }));
    };

    const socket = this.socketFactory(url, {
      onOpen: () => {
        if (active) socket.send(JSON.stringify({ action: 'subscribe', channels: [channel] }));
      },
      onMessage: (data) => {
        if (!active) return;
        let raw: unknown;
        try {
          raw = JSON.parse(data);
        } catch {
          this.options.logger?.warn('ignoring non-JSON stream frame', { channel });
          return;
        }
        const msg = serverMessageSchema.safeParse(raw);
        if (!msg.success) {
          this.options.logger?.warn('ignoring unexpected stream frame', { channel });
          return;
        }
        if (msg.data.type === 'subscribed' && msg.data.channels.includes(channel)) handlers.onReady?.();
        else if (msg.data.type === 'alert' && msg.data.channel === channel) handlers.onRow(fromWire(msg.data.data));
      },
      onClose: (reason) => fail(reason),
      onError: (e) => fail(e.message)
    });

    return {
      unsubscribe: () => {
        if (!active) return;
        active = false;
        socket.close();
      }
    };
  }
}
