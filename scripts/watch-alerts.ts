#!/usr/bin/env tsx
/**
 * Connects to a running server as one user and logs what that user's session would show:
 * incoming banners, answered outgoing alerts and the unacknowledged counts.
 *
 *   WATCH_USER_ID=user-a SERVER_URL=http://localhost:8080 npm run watch-alerts
 */
import { loadConfig } from '../src/config/load.js';
import { JsonLogger } from '../src/core/logger.js';
import { describeResponse } from '../src/alerts/response.js';
import { RemoteAlertClient } from '../src/client/remoteAlertClient.js';
import { SqliteMarkerStore } from '../src/data/markerStore.js';
import { AlertSession } from '../src/realtime/alertSession.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const userId = config.watcher.userId;
  if (!userId) throw new Error('WATCH_USER_ID is required');

  const logger = new JsonLogger(config.logLevel).child({ watcher: true });
  const client = new RemoteAlertClient({ baseUrl: config.watcher.serverUrl, apiKey: config.apiKey, logger });
  const markers = new SqliteMarkerStore(userId, config.storage.markerDbPath);

  const session = new AlertSession({
    userId,
    feed: client,
    commands: client,
    markers,
    config: config.session,
    backoff: config.resubscribe,
    logger,
    snapshots: client,
    presenter: {
      present: (alert) => logger.info('banner shown', { alertId: alert.id, senderId: alert.senderId, message: alert.message }),
      dismiss: (alertId) => logger.info('banner dismissed', { alertId }),
      answered: (alert) =>
        logger.info('your alert was answered', {
          alertId: alert.id,
          response: alert.response ? describeResponse(alert.response) : null,
          responseMessage: alert.responseMessage
        })
    }
  });

  const report = await session.start();
  logger.info('initial reconcile', {
    report,
    counts: await session.unacknowledgedCount(),
    acknowledgments: await session.acknowledgmentSummary(),
    entitlement: session.entitlement
  });

  const shutdown = (): void => {
    session.dispose();
    markers.close();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  process.stderr.write(`watch-alerts failed: ${String(err)}\n`);
  process.exit(1);
});
