/**
 * CORS middleware for the alert API. Answers preflight requests and stamps the
 * allow-headers on everything else.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';

export interface CorsConfig {
  /** `['*']` allows any origin (dev only). */
  allowedOrigins?: string[];
  allowedHeaders?: string[];
  /** Preflight cache lifetime in seconds. */
  maxAge?: number;
}

const DEFAULT_ORIGINS = ['http://localhost:3000', 'http://localhost:5173'];
const METHODS = 'GET, POST, OPTIONS';
const DEFAULT_HEADERS = ['Content-Type', 'Authorization', 'x-api-key'];

/**
 * Returns true when the request was a preflight that has been answered; the caller
 * stops there.
 */
export function createCorsMiddleware(config: CorsConfig = {}) {
  const origins = config.allowedOrigins ?? DEFAULT_ORIGINS;
  const headers = [...DEFAULT_HEADERS, ...(config.allowedHeaders ?? [])].join(', ');
  const maxAge = String(config.maxAge ?? 600);
  const wildcard = origins.includes('*');

  return function handleCors(req: IncomingMessage, res: ServerResponse): boolean {
    const origin = req.headers['origin'];

    if (wildcard) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else {
      if (origin && origins.includes(origin)) {
        res.setHeader('Access-Control-Allow-Origin', origin);
        res.setHeader('Access-Control-Allow-Credentials', 'true');
      }
      res.setHeader('Vary', 'Origin');
    }
    res.setHeader('Access-Control-Allow-Methods', METHODS);
    res.setHeader('Access-Control-Allow-Headers', headers);
    res.setHeader('Access-Control-Max-Age', maxAge);

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return true;
    }
    return false;
  };
}
