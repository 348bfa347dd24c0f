/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';

export {
  makeCatalogSchemaChecker,
  makeDbHealthChecker,
  DEFAULT_DB_CHECK_TIMEOUT_MS,
  type CatalogSchemaCheckerOptions,
  type DbHealthCheckerOptions,
} from './shell/checkers/index.js';

export { getReadiness, type GetReadinessDeps } from './core/usecases/get-readiness.js';

export type { HealthChecker } from './core/ports.js';
export type {
  HealthCheckResult,
  LivenessResponse,
  ReadinessResponse,
  ReadinessStatus,
} from './core/types.js';
