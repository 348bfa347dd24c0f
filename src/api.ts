/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { applyCatalogSchema, CATALOG_TABLES } from './infra/database/catalog/setup.js';
import { initDatabase } from './infra/database/client.js';
import { createLogger, prettyTransport } from './infra/logger/index.js';
import { makeCatalogSchemaChecker, makeDbHealthChecker } from './modules/health/index.js';

const getVersion = (): string => process.env['APP_VERSION'] ?? '0.1.0';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server } }, 'Starting API server');

  // Initialize the catalog database and make sure its tables exist
  const catalogDb = initDatabase(config);
  try {
    await applyCatalogSchema({ db: catalogDb, logger });
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to apply catalog schema');
    await catalogDb.destroy();
    process.exit(1);
  }

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: prettyTransport }),
      },
      disableRequestLogging: false,
    },
    deps: {
      config,
      catalogDb,
      logger,
      healthCheckers: [
        makeDbHealthChecker(catalogDb, { name: 'catalog-db' }),
        makeCatalogSchemaChecker(catalogDb, { name: 'catalog-schema', tables: CATALOG_TABLES }),
      ],
    },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
