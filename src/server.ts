// Server entry point
// Bootstrap and start the HTTP server

import 'dotenv/config';
import { createApp } from '@/api/app.js';
import { createEngineServices, type EngineServices } from '@/infrastructure/EngineFactory.js';
import { buildAppConfig, validateConfig } from '@/utils/config.js';
import { ConfigurationError, describeError, describeErrorDetails } from '@/utils/errors.js';
import { serverLogger } from '@/utils/logger.js';

async function main(): Promise<void> {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigurationError('Invalid configuration', { errors });
  }

  serverLogger.info('Initializing engine', { dbPath: config.storage.dbPath, redis: Boolean(config.storage.redisUrl) });
  const services: EngineServices = await createEngineServices(config);
  serverLogger.info('Storage ready', services.database.getStats());

  services.maintenance.start();

  // Create Express app
  const app = createApp(services, {
    trustProxy: config.server.nodeEnv === 'production',
  });

  // Start server
  const server = app.listen(config.server.port, config.server.host, () => {
    serverLogger.info('Server running', {
      url: `http://${config.server.host}:${config.server.port}`,
      nodeEnv: config.server.nodeEnv,
      serviceKey: Boolean(config.apiKey),
    });
  });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    serverLogger.info('Starting graceful shutdown', { signal });

    server.close(() => {
      services
        .close()
        .then(() => {
          serverLogger.info('Server closed');
          process.exit(0);
        })
        .catch((error) => {
          serverLogger.error('Shutdown failed', { error: describeError(error) });
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      serverLogger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (err) => {
    serverLogger.error('Uncaught exception', { error: describeError(err), stack: err.stack });
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    serverLogger.error('Unhandled rejection', { reason: describeError(reason) });
  });
}

// Run main
main().catch((error) => {
  serverLogger.error('Fatal error during startup', {
    error: describeError(error),
    details: describeErrorDetails(error),
  });
  process.exit(1);
});
