import { serve } from '@hono/node-server';
import { applySchema, closePool, getPool } from '@latchkey/database';
import { logger } from '@latchkey/observability';
import { createApp } from './app.js';
import { loadApiConfig } from './config.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { createServices } from './services.js';

async function main() {
  const config = loadApiConfig();

  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL is required to start the server');
  }
  if (!config.resendApiKey) {
    logger.warn('RESEND_API_KEY not set - auth emails will be logged, not sent');
  }

  const pool = getPool();
  await applySchema(pool);

  // Initialize audit logging for authentication events
  initializeAuditLogging();

  const app = createApp({
    services: createServices(config, pool),
    cookies: { secret: config.authSecret, secure: config.secureCookies },
    trustProxy: config.trustProxy,
    appUrl: config.appUrl,
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info({ port: info.port }, 'Server running');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
