import { z } from 'zod';

const parseBoolean = (v: unknown, fallback: boolean): boolean => {
  if (typeof v !== 'string') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.toLowerCase());
};

const parseNumber = (v: unknown, fallback: number): number => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
};

const parseOrigins = (v: unknown): string[] | undefined => {
  if (typeof v !== 'string' || v.trim() === '') return undefined;
  return v
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
};

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  HTTP_PORT: z.coerce.number().int().positive().default(8080),
  API_KEY: z.string().optional(),
  CORS_ORIGINS: z.string().optional(),

  DB_PATH: z.string().default('./data/alerts.sqlite'),
  MARKER_DB_PATH: z.string().default('./data/markers.sqlite'),

  // Quota: one source of truth for the free-tier figure.
  FREE_DAILY_ALERT_LIMIT: z.coerce.number().int().nonnegative().default(3),
  PAID_DAILY_ALERT_LIMIT: z.coerce.number().int().positive().default(200),
  QUOTA_RESET_POLICY: z.enum(['rolling', 'midnight']).default('rolling'),
  QUOTA_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(0),

  RESPONSE_POLICY: z.enum(['last_write_wins', 'first_write_wins']).default('last_write_wins'),
  ALERT_MESSAGE_MAX_LENGTH: z.coerce.number().int().positive().default(280),
  MAX_PLATES_PER_USER: z.coerce.number().int().positive().default(3),

  FRESHNESS_WINDOW_MS: z.string().optional(),
  BANNER_AUTO_DISMISS_MS: z.string().optional(),
  RECONCILE_INTERVAL_MS: z.string().optional(),
  ACK_TIMEOUT_MS: z.string().optional(),
  ACK_RETENTION_MS: z.string().optional(),

  RESUBSCRIBE_BASE_DELAY_MS: z.string().optional(),
  RESUBSCRIBE_MAX_DELAY_MS: z.string().optional(),
  RESUBSCRIBE_MAX_ATTEMPTS: z.string().optional(),

  PUSH_ENABLED: z.string().optional(),
  PUSH_WEBHOOK_URL: z.string().url().optional(),
  PUSH_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(30_000),

  // Used by the session watcher script only.
  SERVER_URL: z.string().url().default('http://localhost:8080'),
  WATCH_USER_ID: z.string().optional()
});

export const configSchema = rawSchema.transform((raw) => {
  const pushEnabled = parseBoolean(raw.PUSH_ENABLED, false);

  return {
    nodeEnv: raw.NODE_ENV,
    logLevel: raw.LOG_LEVEL,
    httpPort: raw.HTTP_PORT,
    apiKey: raw.API_KEY,
    corsOrigins: parseOrigins(raw.CORS_ORIGINS),

    storage: {
      dbPath: raw.DB_PATH,
      markerDbPath: raw.MARKER_DB_PATH
    },

    quota: {
      freeDailyLimit: raw.FREE_DAILY_ALERT_LIMIT,
      paidDailyLimit: raw.PAID_DAILY_ALERT_LIMIT,
      resetPolicy: raw.QUOTA_RESET_POLICY,
      utcOffsetMinutes: raw.QUOTA_UTC_OFFSET_MINUTES
    },

    alerts: {
      responsePolicy: raw.RESPONSE_POLICY,
      messageMaxLength: raw.ALERT_MESSAGE_MAX_LENGTH,
      maxPlatesPerUser: raw.MAX_PLATES_PER_USER
    },

    session: {
      freshnessWindowMs: parseNumber(raw.FRESHNESS_WINDOW_MS, 5 * 60_000),
      bannerAutoDismissMs: parseNumber(raw.BANNER_AUTO_DISMISS_MS, 30_000),
      reconcileIntervalMs: parseNumber(raw.RECONCILE_INTERVAL_MS, 5 * 60_000),
      ackTimeoutMs: parseNumber(raw.ACK_TIMEOUT_MS, 10 * 60_000),
      ackRetentionMs: parseNumber(raw.ACK_RETENTION_MS, 60 * 60_000)
    },

    resubscribe: {
      baseDelayMs: parseNumber(raw.RESUBSCRIBE_BASE_DELAY_MS, 1000),
      maxDelayMs: parseNumber(raw.RESUBSCRIBE_MAX_DELAY_MS, 30_000),
      maxAttempts: parseNumber(raw.RESUBSCRIBE_MAX_ATTEMPTS, 6)
    },

    push: {
      enabled: pushEnabled,
      webhookUrl: raw.PUSH_WEBHOOK_URL,
      timeoutMs: raw.PUSH_TIMEOUT_MS
    },

    ws: {
      heartbeatMs: raw.WS_HEARTBEAT_MS
    },

    watcher: {
      serverUrl: raw.SERVER_URL,
      userId: raw.WATCH_USER_ID
    }
  };
});
