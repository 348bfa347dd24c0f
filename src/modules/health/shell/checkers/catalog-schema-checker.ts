/**
 * Catalog schema checker
 *
 * Reports unhealthy until every catalog table exists in the current schema,
 * e.g. when the schema bootstrap failed or ran against another database.
 */

import { sql, type Kysely } from 'kysely';

import { DEFAULT_DB_CHECK_TIMEOUT_MS } from './db-checker.js';
import { withTimeout } from './timeout.js';

import type { HealthChecker } from '../../core/ports.js';
import type { HealthCheckResult } from '../../core/types.js';

export interface CatalogSchemaCheckerOptions {
  name: string;
  /** Tables the service reads and writes */
  tables: readonly string[];
  timeoutMs?: number;
}

export const makeCatalogSchemaChecker = <T>(
  db: Kysely<T>,
  options: CatalogSchemaCheckerOptions
): HealthChecker => {
  const { name, tables, timeoutMs = DEFAULT_DB_CHECK_TIMEOUT_MS } = options;

  return async (): Promise<HealthCheckResult> => {
    const startTime = Date.now();

    try {
      const { rows } = await withTimeout(
        sql<{ table_name: string }>`
          SELECT table_name FROM information_schema.tables
          WHERE table_schema = current_schema() AND table_name = ANY(${[...tables]}::text[])
        `.execute(db),
        timeoutMs,
        `Catalog schema check timed out after ${String(timeoutMs)}ms`
      );

      const present = new Set(rows.map((row) => row.table_name));
      const missing = tables.filter((table) => !present.has(table));
      const latencyMs = Date.now() - startTime;

      if (missing.length > 0) {
        return {
          name,
          status: 'unhealthy',
          message: `Missing catalog tables: ${missing.join(', ')}`,
          latencyMs,
          critical: true,
        };
      }
      return { name, status: 'healthy', latencyMs, critical: true };
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
