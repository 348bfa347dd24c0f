/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import multipart from '@fastify/multipart';
import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { createLogger } from '../infra/logger/index.js';
import { registerCors } from '../infra/plugins/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import {
  makeIndicatorRepo,
  makeIndicatorRoutes,
  type IndicatorRepository,
} from '../modules/indicators/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { CatalogDbClient } from '../infra/database/client.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** Catalog database; destroyed when the app closes */
  catalogDb?: CatalogDbClient;
  /** Overrides the Kysely repository (tests) */
  indicatorRepo?: IndicatorRepository;
  healthCheckers?: HealthChecker[];
  /** Logger handed to repositories; one is created from config when absent */
  logger?: Logger;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

const describeValidation = (error: FastifyError): string[] =>
  (error.validation ?? []).map((issue) => {
    const location = `${error.validationContext ?? 'request'}${issue.instancePath}`;
    return `${location} ${issue.message ?? 'is invalid'}`;
  });

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.config === undefined) {
    throw new Error('Missing required dependency: config');
  }
  const config = deps.config;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Global error handler, set before any route is registered
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    // Handle validation errors
    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: 'Request validation failed',
        details: describeValidation(error),
      });
    }

    // Handle known HTTP errors (malformed JSON body, upload too large, ...)
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(error.statusCode ?? 500).send({
      ok: false,
      error: 'InternalServerError',
      message: error.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Plugins
  // ─────────────────────────────────────────────────────────────────────────────
  await registerCors(app, config);

  await app.register(multipart, {
    limits: {
      fileSize: config.uploads.maxBytes,
      files: 1,
    },
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Health
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [],
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // Indicators
  // ─────────────────────────────────────────────────────────────────────────────
  const catalogDb = deps.catalogDb;
  let indicatorRepo = deps.indicatorRepo;
  if (indicatorRepo === undefined) {
    if (catalogDb === undefined) {
      throw new Error('Missing required dependencies: catalogDb or indicatorRepo');
    }
    const logger = deps.logger ?? createLogger({ level: config.logger.level, pretty: false });
    indicatorRepo = makeIndicatorRepo({
      db: catalogDb,
      logger: logger.child({ module: 'indicators' }),
    });
  }

  await app.register(makeIndicatorRoutes({ indicatorRepo }));

  if (catalogDb !== undefined) {
    app.addHook('onClose', async () => {
      await catalogDb.destroy();
      app.log.info('Catalog database pool closed');
    });
  }

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
