import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { CatalogDatabase } from './catalog/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type CatalogDbClient = Kysely<CatalogDatabase>;

/**
 * Create a Kysely instance for a specific database URL
 */
const createClient = <T>(connectionString: string, max: number): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max, // connection pool size
        application_name: 'lighting-indicators-server',
      }),
    }),
  });
};

/**
 * Initialize the catalog database client.
 * The client is process-wide: created once at startup and destroyed on close.
 */
export const initDatabase = (config: AppConfig): CatalogDbClient => {
  const { database } = config;

  if (database.url === '') {
    throw new Error('Missing configuration for Catalog Database (DATABASE_URL)');
  }

  return createClient<CatalogDatabase>(database.url, database.poolMax);
};

// Re-export types
export type {
  CatalogDatabase,
  Municipalities,
  Indicators,
  Formulas,
  SubIndicators,
  Conditions,
} from './catalog/types.js';
