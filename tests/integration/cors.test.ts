/**
 * Integration tests for CORS plugin
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';

import { makeTestConfig } from '../fixtures/builders.js';
import { makeFakeIndicatorRepo } from '../fixtures/fakes.js';

import type { FastifyInstance } from 'fastify';

describe('CORS Plugin', () => {
  let app: FastifyInstance;

  const start = async (allowedOrigins: string | undefined) => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        config: makeTestConfig({ cors: { allowedOrigins } }),
        indicatorRepo: makeFakeIndicatorRepo(),
      },
    });
  };

  afterEach(async () => {
    await app.close();
  });

  describe('without ALLOWED_ORIGINS', () => {
    it('allows any origin', async () => {
      await start(undefined);

      const response = await app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'https://painel.test' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['access-control-allow-origin']).toBe('https://painel.test');
    });

    it('allows requests without origin header', async () => {
      await start(undefined);

      const response = await app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
    });
  });

  describe('with ALLOWED_ORIGINS', () => {
    it('allows every listed origin', async () => {
      await start('https://app1.test, https://app2.test');

      for (const origin of ['https://app1.test', 'https://app2.test']) {
        const response = await app.inject({
          method: 'GET',
          url: '/health/live',
          headers: { origin },
        });
        expect(response.statusCode).toBe(200);
        expect(response.headers['access-control-allow-origin']).toBe(origin);
      }
    });

    it('blocks origins not in the list', async () => {
      await start('https://app1.test');

      const response = await app.inject({
        method: 'GET',
        url: '/health/live',
        headers: { origin: 'https://other.test' },
      });

      expect(response.statusCode).toBe(500);
      expect(response.json().message).toBe('CORS origin not allowed');
    });

    it('answers preflight requests for the catalog routes', async () => {
      await start('https://app1.test');

      const response = await app.inject({
        method: 'OPTIONS',
        url: '/indicadores/importar',
        headers: {
          origin: 'https://app1.test',
          'access-control-request-method': 'POST',
        },
      });

      expect(response.statusCode).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe('https://app1.test');
      expect(String(response.headers['access-control-allow-methods'])).toContain('PATCH');
    });
  });
});
