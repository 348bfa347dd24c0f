/**
 * Database health checker
 *
 * Runs `SELECT 1` against the catalog database, bounded by a timeout.
 */

import { sql, type Kysely } from 'kysely';

import { withTimeout } from './timeout.js';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

/** Default timeout for the database health check in milliseconds */
export const DEFAULT_DB_CHECK_TIMEOUT_MS = 3000;

export interface DbHealthCheckerOptions {
  /** Name reported in the readiness response */
  name: string;
  timeoutMs?: number;
}

/**
 * Creates a health checker for a Kysely client.
 *
 * @example
 * ```typescript
 * const checker = makeDbHealthChecker(catalogDb, { name: 'catalog-db' });
 * await checker();
 * // { name: 'catalog-db', status: 'healthy', latencyMs: 4, critical: true }
 * ```
 */
export const makeDbHealthChecker = <T>(
  db: Kysely<T>,
  options: DbHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_DB_CHECK_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();

    try {
      await withTimeout(
        sql`SELECT 1`.execute(db),
        timeoutMs,
        `Database health check timed out after ${String(timeoutMs)}ms`
      );

      return { name, status: 'healthy', latencyMs: Date.now() - startTime, critical: true };
    } catch (error) {
      return {
        name,
        status: 'unhealthy',
        message: error instanceof Error ? error.message : 'Unknown database error',
        latencyMs: Date.now() - startTime,
        critical: true,
      };
    }
  };
};
