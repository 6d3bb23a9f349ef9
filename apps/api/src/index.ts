import { serve } from '@hono/node-server';
import { purgeExpiredCredentials } from '@accounts/core';
import { logger } from '@accounts/observability';
import { createApp } from './app.js';
import { loadApiConfig } from './config.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { createServices } from './services/index.js';

const config = loadApiConfig(process.env);
const services = await createServices(config);

initializeAuditLogging(services.events, logger);

const app = createApp(services);

logger.info({ port: config.port }, 'Starting server');

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port }, 'Server running');
});

function runPurge() {
  purgeExpiredCredentials(services, logger).catch((error: unknown) => {
    logger.error({ err: error }, 'Expired credential purge failed');
  });
}

const purgeTimer =
  config.purgeIntervalMinutes > 0 ? setInterval(runPurge, config.purgeIntervalMinutes * 60 * 1000) : null;
purgeTimer?.unref();

function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, 'Shutting down');
  if (purgeTimer) {
    clearInterval(purgeTimer);
  }
  server.close(() => {
    services
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      });
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
