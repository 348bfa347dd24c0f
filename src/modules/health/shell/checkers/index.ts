/**
 * Health checker factories
 */

export {
  makeDbHealthChecker,
  DEFAULT_DB_CHECK_TIMEOUT_MS,
  type DbHealthCheckerOptions,
} from './db-checker.js';

export {
  makeCatalogSchemaChecker,
  type CatalogSchemaCheckerOptions,
} from './catalog-schema-checker.js';
