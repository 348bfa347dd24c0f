import { describe, it, expect } from 'vitest';

import {
  determineOverallStatus,
  getReadiness,
} from '@/modules/health/core/usecases/get-readiness.js';

import { makeFailingHealthChecker, makeHealthChecker } from '../../fixtures/builders.js';

import type { HealthChecker } from '@/modules/health/core/ports.js';

describe('getReadiness', () => {
  const timestamp = '2026-01-01T00:00:00.000Z';
  const uptime = 42;

  it('returns ok when every check is healthy', async () => {
    const checkers: HealthChecker[] = [makeHealthChecker({ name: 'catalog-db' })];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result).toEqual({
      status: 'ok',
      timestamp,
      uptime,
      checks: [{ name: 'catalog-db', status: 'healthy' }],
    });
  });

  it('returns ok when no checkers are configured', async () => {
    const result = await getReadiness({ checkers: [] }, { uptime, timestamp });

    expect(result.status).toBe('ok');
    expect(result.checks).toEqual([]);
  });

  it('includes version if provided', async () => {
    const result = await getReadiness({ checkers: [], version: '1.2.3' }, { uptime, timestamp });

    expect(result.version).toBe('1.2.3');
  });

  it('returns unhealthy when a check without critical flag fails', async () => {
    const checkers = [makeHealthChecker({ name: 'catalog-db', status: 'unhealthy' })];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('unhealthy');
  });

  it('returns degraded when only non-critical checks fail', async () => {
    const checkers = [
      makeHealthChecker({ name: 'catalog-db', critical: true }),
      makeHealthChecker({ name: 'optional', status: 'unhealthy', critical: false }),
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('degraded');
  });

  it('reports a throwing checker as a critical failure named by position', async () => {
    const checkers = [makeHealthChecker(), makeFailingHealthChecker('Connection timed out')];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('unhealthy');
    expect(result.checks[1]).toEqual({
      name: 'check-1',
      status: 'unhealthy',
      message: 'Connection timed out',
      critical: true,
    });
  });
});

describe('determineOverallStatus', () => {
  it('prefers unhealthy over degraded', () => {
    expect(
      determineOverallStatus([
        { name: 'a', status: 'unhealthy', critical: true },
        { name: 'b', status: 'unhealthy', critical: false },
      ])
    ).toBe('unhealthy');
  });
});
