import http from 'node:http';
import { createRouter } from '../backend/src/api/routes.js';
import { createAlertGateway, type AlertGateway } from '../backend/src/websocket/server.js';
import { AlertService } from './alerts/alertService.js';
import { ConsolePushSink, WebhookPushSink, type PushSink } from './alerts/pushSink.js';
import type { Clock } from './core/clock.js';
import type { Logger } from './core/logger.js';
import { InMemoryMetrics } from './core/metrics.js';
import type { AppConfig } from './config/types.js';
import { SqliteStore } from './data/sqliteStore.js';
import { EntitlementGate } from './entitlement/entitlementGate.js';

export interface AlertServer {
  server: http.Server;
  gateway: AlertGateway;
  service: AlertService;
  gate: EntitlementGate;
  store: SqliteStore;
  metrics: InMemoryMetrics;
  close(): Promise<void>;
}

export interface AlertServerOptions {
  config: AppConfig;
  logger: Logger;
  clock?: Clock;
  /** Overrides the sink chosen from config. */
  push?: PushSink;
}

const choosePushSink = (config: AppConfig): PushSink | undefined => {
  if (!config.push.enabled) return undefined;
  return config.push.webhookUrl
    ? new WebhookPushSink(config.push.webhookUrl, config.push.timeoutMs)
    : new ConsolePushSink();
};

/** Wire store, gate, service, HTTP router and WebSocket gateway. Does not listen. */
export const createAlertServer = (options: AlertServerOptions): AlertServer => {
  const { config, logger, clock } = options;
  const metrics = new InMemoryMetrics();
  const store = new SqliteStore(config.storage.dbPath, { logger, clock });
  const gate = new EntitlementGate(store, config.quota, { clock, logger, metrics });

  const server = http.createServer();
  const gateway = createAlertGateway({
    httpServer: server,
    bus: store.bus,
    logger,
    metrics,
    apiKey: config.apiKey,
    heartbeatMs: config.ws.heartbeatMs
  });

  const service = new AlertService({
    store,
    plates: store,
    gate,
    config: config.alerts,
    logger,
    metrics,
    clock,
    stats: store,
    push: options.push ?? choosePushSink(config),
    presence: gateway
  });

  const handler = createRouter({
    context: {
      service,
      gate,
      stats: store,
      logger,
      metrics,
      metricsSnapshot: () => metrics.snapshot(),
      startedAt: Date.now()
    },
    auth: { apiKey: config.apiKey },
    cors: config.corsOrigins ? { allowedOrigins: config.corsOrigins } : {}
  });
  server.on('request', (req, res) => {
    void handler(req, res);
  });

  return {
    server,
    gateway,
    service,
    gate,
    store,
    metrics,
    close: async () => {
      await gateway.close();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      store.close();
    }
  };
};
