import { loadConfig } from './config/load.js';
import { JsonLogger } from './core/logger.js';
import { createAlertServer } from './server.js';

const main = async (): Promise<void> => {
  const config = loadConfig();
  const logger = new JsonLogger(config.logLevel);
  const app = createAlertServer({ config, logger });

  app.server.listen(config.httpPort, () => {
    logger.info('service started', {
      port: config.httpPort,
      responsePolicy: config.alerts.responsePolicy,
      quotaResetPolicy: config.quota.resetPolicy,
      freeDailyLimit: config.quota.freeDailyLimit,
      push: config.push.enabled ? (config.push.webhookUrl ? 'webhook' : 'console') : 'off',
      auth: config.apiKey ? 'api-key' : 'disabled'
    });
  });

  const shutdown = (): void => {
    logger.info('shutdown initiated');
    app.close().then(
      () => {
        logger.info('http server closed');
        process.exit(0);
      },
      (err: unknown) => {
        logger.error('shutdown failed', { error: String(err) });
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

void main().catch((err) => {
  process.stderr.write(`Fatal startup error: ${String(err)}\n`);
  process.exit(1);
});
