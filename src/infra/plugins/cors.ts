/**
 * CORS plugin for Fastify
 * Configures Cross-Origin Resource Sharing from ALLOWED_ORIGINS
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Parses the comma-separated whitelist. Empty when unset.
 */
export function parseAllowedOrigins(allowedOrigins: string | undefined): Set<string> {
  if (allowedOrigins === undefined) {
    return new Set();
  }

  return new Set(
    allowedOrigins
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
  );
}

/**
 * Register CORS plugin with Fastify.
 * Without a whitelist every origin is allowed.
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = parseAllowedOrigins(config.cors.allowedOrigins);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server or same-origin requests
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.size === 0 || allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      cb(new Error('CORS origin not allowed'), false);
    },
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'OPTIONS', 'DELETE'],
    allowedHeaders: ['content-type', 'x-requested-with', 'accept'],
    exposedHeaders: ['content-length'],
  });
}
