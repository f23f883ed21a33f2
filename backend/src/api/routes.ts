/**
 * HTTP API routes for the alert engine.
 *
 * Handlers take a context object holding the running services; this file does NOT
 * import from src/index.ts. The bootstrap entrypoint passes pre-built dependencies.
 *
 * Uses raw Node.js http (IncomingMessage / ServerResponse) — no Express required.
 * Ids travel in the body (POST) or the query string (GET); paths match exactly.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import type { Logger } from '../../../src/core/logger.js';
import type { Metrics, MetricsSnapshot } from '../../../src/core/metrics.js';
import { AppError, ValidationError, type AlertError } from '../../../src/core/errors.js';
import type { Result } from '../../../src/core/result.js';
import type { AlertService } from '../../../src/alerts/alertService.js';
import { fingerprintPlate } from '../../../src/alerts/plateFingerprint.js';
import { WIRE_RESPONSES } from '../../../src/alerts/response.js';
import { toWire, toWireEntitlement, toWirePlate } from '../../../src/alerts/wire.js';
import type { StatsStore } from '../../../src/data/statsStore.js';
import type { EntitlementGate } from '../../../src/entitlement/entitlementGate.js';
import { createAuthMiddleware, type AuthConfig } from '../middleware/auth.js';
import { createCorsMiddleware, type CorsConfig } from '../middleware/cors.js';

// ── Route context (injected dependencies) ────────────────────────────────────

export interface RouteContext {
  service: AlertService;
  gate: EntitlementGate;
  stats: StatsStore;
  logger: Logger;
  metrics: Metrics;
  /** Exposed at /metrics when the metrics backend can produce one. */
  metricsSnapshot?: () => MetricsSnapshot;
  startedAt: number;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function json(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  ALREADY_RESPONDED: 409,
  RATE_LIMIT_EXCEEDED: 429,
  PARTIAL_FAILURE: 207,
  NETWORK: 503,
  PERSISTENCE: 500
};

export function statusForError(error: AppError): number {
  return STATUS_BY_CODE[error.code] ?? 500;
}

function sendError(res: ServerResponse, error: AlertError): void {
  json(res, { error: error.code, message: error.message, details: error.details }, statusForError(error));
}

function sendResult<T>(res: ServerResponse, result: Result<T>, render: (value: T) => unknown): void {
  if (result.ok) json(res, render(result.value));
  else sendError(res, result.error);
}

const MAX_BODY_SIZE = 16 * 1024;

function readBody(req: IncomingMessage, timeoutMs = 10_000): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalLen = 0;
    const timer = setTimeout(() => { req.destroy(); reject(new Error('Body read timeout')); }, timeoutMs);
    req.on('data', (chunk: Buffer) => {
      totalLen += chunk.length;
      if (totalLen > MAX_BODY_SIZE) {
        clearTimeout(timer);
        req.destroy();
        reject(new Error('Request body too large'));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => { clearTimeout(timer); resolve(Buffer.concat(chunks).toString()); });
    req.on('error', (err) => { clearTimeout(timer); reject(err); });
  });
}

/** Read and validate a JSON body; a ValidationError describes what is wrong. */
async function parseBody<T>(req: IncomingMessage, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<Result<T, ValidationError>> {
  let raw: unknown;
  try {
    const text = await readBody(req);
    raw = text.length > 0 ? JSON.parse(text) : {};
  } catch (err) {
    return { ok: false, error: new ValidationError(`invalid body: ${err instanceof Error ? err.message : String(err)}`) };
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
    return { ok: false, error: new ValidationError(issues.join('; '), { issues }) };
  }
  return { ok: true, value: parsed.data };
}

function queryParam(req: IncomingMessage, name: string): string | null {
  const url = new URL(req.url ?? '', 'http://localhost');
  const value = url.searchParams.get(name);
  return value && value.length > 0 ? value : null;
}

function requireQuery(req: IncomingMessage, res: ServerResponse, name: string): string | null {
  const value = queryParam(req, name);
  if (value === null) sendError(res, new ValidationError(`${name} query parameter is required`));
  return value;
}

// ── Body schemas ─────────────────────────────────────────────────────────────

const sendAlertBody = z
  .object({
    senderId: z.string().min(1),
    plateHash: z.string().optional(),
    plate: z.string().min(1).optional(),
    message: z.string().nullish()
  })
  .refine((b) => (b.plateHash === undefined) !== (b.plate === undefined), {
    message: 'exactly one of plateHash or plate is required'
  });

const alertIdBody = z.object({ alertId: z.string().min(1) });

const responseBody = z.object({
  alertId: z.string().min(1),
  response: z.string().min(1),
  responseMessage: z.string().nullish()
});

const registerPlateBody = z.object({ userId: z.string().min(1), plate: z.string().min(1) });

const removePlateBody = z.object({ userId: z.string().min(1), plateHash: z.string().min(1) });

const tierBody = z.object({ userId: z.string().min(1), tier: z.enum(['free', 'premium', 'lifetime']) });

// ── Route table ──────────────────────────────────────────────────────────────

type RouteHandler = (req: IncomingMessage, res: ServerResponse, ctx: RouteContext) => Promise<void> | void;

interface Route {
  method: string;
  path: string;
  handler: RouteHandler;
}

const routes: Route[] = [
  {
    method: 'GET',
    path: '/health',
    handler: (_req, res, ctx) => {
      json(res, { ok: true, uptime: Math.floor((Date.now() - ctx.startedAt) / 1000) });
    }
  },

  {
    method: 'GET',
    path: '/metrics',
    handler: (_req, res, ctx) => {
      if (!ctx.metricsSnapshot) {
        return json(res, { error: 'not_supported', message: 'Metrics backend has no snapshot' }, 501);
      }
      json(res, ctx.metricsSnapshot());
    }
  },

  // ── Alerts ───────────────────────────────────────────────────────────────

  {
    method: 'POST',
    path: '/api/alerts',
    handler: async (req, res, ctx) => {
      const body = await parseBody(req, sendAlertBody);
      if (!body.ok) return sendError(res, body.error);
      const { senderId, plateHash, plate, message } = body.value;
      const fingerprint = plate !== undefined ? fingerprintPlate(plate) : (plateHash ?? '');
      const result = await ctx.service.sendAlert(fingerprint, senderId, message);
      sendResult(res, result, (receipt) => receipt);
    }
  },

  {
    method: 'POST',
    path: '/api/alerts/read',
    handler: async (req, res, ctx) => {
      const body = await parseBody(req, alertIdBody);
      if (!body.ok) return sendError(res, body.error);
      sendResult(res, await ctx.service.markAlertRead(body.value.alertId), (alert) => ({ alert: toWire(alert) }));
    }
  },

  {
    method: 'POST',
    path: '/api/alerts/response',
    handler: async (req, res, ctx) => {
      const body = await parseBody(req, responseBody);
      if (!body.ok) return sendError(res, body.error);
      const { alertId, response, responseMessage } = body.value;
      const result = await ctx.service.sendResponse(alertId, response, responseMessage);
      sendResult(res, result, (alert) => ({ alert: toWire(alert) }));
    }
  },

  {
    method: 'GET',
    path: '/api/alerts/incoming',
    handler: async (req, res, ctx) => {
      const userId = requireQuery(req, res, 'userId');
      if (userId === null) return;
      sendResult(res, await ctx.service.listIncoming(userId), (alerts) => ({
        alerts: alerts.map(toWire),
        count: alerts.length
      }));
    }
  },

  {
    method: 'GET',
    path: '/api/alerts/outgoing',
    handler: async (req, res, ctx) => {
      const userId = requireQuery(req, res, 'userId');
      if (userId === null) return;
      sendResult(res, await ctx.service.listOutgoing(userId), (alerts) => ({
        alerts: alerts.map(toWire),
        count: alerts.length
      }));
    }
  },

  {
    method: 'GET',
    path: '/api/alerts/get',
    handler: async (req, res, ctx) => {
      const id = requireQuery(req, res, 'id');
      if (id === null) return;
      sendResult(res, await ctx.service.getAlert(id), (alert) => ({ alert: toWire(alert) }));
    }
  },

  {
    method: 'GET',
    path: '/api/responses',
    handler: (_req, res) => {
      json(res, { responses: Object.values(WIRE_RESPONSES) });
    }
  },

  // ── Plates ───────────────────────────────────────────────────────────────

  {
    method: 'POST',
    path: '/api/plates',
    handler: async (req, res, ctx) => {
      const body = await parseBody(req, registerPlateBody);
      if (!body.ok) return sendError(res, body.error);
      const result = await ctx.service.registerPlate(body.value.userId, body.value.plate);
      sendResult(res, result, ({ plateFingerprint, outcome }) => ({ plateHash: plateFingerprint, outcome }));
    }
  },

  {
    method: 'POST',
    path: '/api/plates/remove',
    handler: async (req, res, ctx) => {
      const body = await parseBody(req, removePlateBody);
      if (!body.ok) return sendError(res, body.error);
      const result = await ctx.service.unregisterPlate(body.value.userId, body.value.plateHash);
      sendResult(res, result, () => ({ ok: true }));
    }
  },

  {
    method: 'GET',
    path: '/api/plates',
    handler: async (req, res, ctx) => {
      const userId = requireQuery(req, res, 'userId');
      if (userId === null) return;
      sendResult(res, await ctx.service.listPlates(userId), (plates) => ({ plates: plates.map(toWirePlate) }));
    }
  },

  // ── Entitlements & stats ─────────────────────────────────────────────────

  {
    method: 'GET',
    path: '/api/entitlements',
    handler: async (req, res, ctx) => {
      const userId = requireQuery(req, res, 'userId');
      if (userId === null) return;
      json(res, toWireEntitlement(await ctx.gate.snapshot(userId)));
    }
  },

  {
    method: 'POST',
    path: '/api/entitlements/tier',
    handler: async (req, res, ctx) => {
      const body = await parseBody(req, tierBody);
      if (!body.ok) return sendError(res, body.error);
      await ctx.gate.setTier(body.value.userId, body.value.tier);
      json(res, toWireEntitlement(await ctx.gate.snapshot(body.value.userId)));
    }
  },

  {
    method: 'GET',
    path: '/api/stats',
    handler: async (req, res, ctx) => {
      const userId = requireQuery(req, res, 'userId');
      if (userId === null) return;
      const stats = await ctx.stats.getStats(userId);
      json(res, {
        user_id: stats.userId,
        alerts_sent: stats.alertsSent,
        responses_given: stats.responsesGiven,
        cars_freed: stats.carsFreed
      });
    }
  }
];

// ── Router factory ───────────────────────────────────────────────────────────

export interface RouterOptions {
  context: RouteContext;
  auth?: AuthConfig;
  cors?: CorsConfig;
}

/**
 * Creates a request handler function compatible with `http.createServer()`.
 * Handles CORS, auth, and routes requests to the appropriate handler.
 */
export function createRouter(options: RouterOptions) {
  const { context } = options;
  const authorize = createAuthMiddleware(options.auth ?? {});
  const handleCors = createCorsMiddleware(options.cors ?? {});

  const routeMap = new Map<string, RouteHandler>();
  for (const route of routes) {
    routeMap.set(`${route.method}:${route.path}`, route.handler);
  }

  return async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (handleCors(req, res)) return;
    if (!authorize(req, res)) return;

    const method = req.method ?? 'GET';
    const pathname = (req.url ?? '').split('?')[0] ?? '';

    const handler = routeMap.get(`${method}:${pathname}`);
    if (!handler) {
      json(res, { error: 'NOT_FOUND', message: `no route for ${method} ${pathname}` }, 404);
      return;
    }

    context.metrics.increment('http_requests_total', 1, { path: pathname });
    try {
      await handler(req, res, context);
    } catch (err) {
      context.logger.error('route handler error', { method, path: pathname, error: String(err) });
      if (!res.headersSent) {
        json(res, { error: 'internal_error' }, 500);
      }
    }
  };
}
