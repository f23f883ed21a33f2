/**
 * Auth middleware — API key check for the HTTP API and the WebSocket upgrade.
 *
 * Accepts `Authorization: Bearer <key>` or `x-api-key: <key>`. WebSocket clients,
 * which cannot set headers from a browser, pass `?token=<key>` instead.
 * With no key configured, auth is disabled (development mode).
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { timingSafeEqual } from 'node:crypto';

function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

export interface AuthConfig {
  /** If empty/undefined, auth is disabled. */
  apiKey?: string;
  /** Paths that do not require authentication. */
  publicPaths?: string[];
}

const DEFAULT_PUBLIC_PATHS = ['/health'];

/** Key presented by a request, from either header. */
export function presentedKey(req: IncomingMessage): string | undefined {
  const authHeader = req.headers['authorization'];
  if (authHeader) {
    const [scheme, token] = authHeader.split(' ');
    if (scheme?.toLowerCase() === 'bearer' && token) return token;
  }
  const xApiKey = req.headers['x-api-key'];
  return typeof xApiKey === 'string' ? xApiKey : undefined;
}

export function isAuthorizedKey(apiKey: string | undefined, candidate: string | null | undefined): boolean {
  if (!apiKey) return true;
  return typeof candidate === 'string' && safeCompare(candidate, apiKey);
}

/**
 * Returns true if the request may proceed. Writes a 401 and returns false otherwise.
 */
export function createAuthMiddleware(config: AuthConfig) {
  const { apiKey } = config;
  const publicPaths = new Set(config.publicPaths ?? DEFAULT_PUBLIC_PATHS);

  return function authorize(req: IncomingMessage, res: ServerResponse): boolean {
    if (!apiKey) return true;

    const pathname = (req.url ?? '').split('?')[0] ?? '';
    if (publicPaths.has(pathname)) return true;
    if (isAuthorizedKey(apiKey, presentedKey(req))) return true;

    res.writeHead(401, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'UNAUTHORIZED', message: 'Missing or invalid API key' }));
    return false;
  };
}
