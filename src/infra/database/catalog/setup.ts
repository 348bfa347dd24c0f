/**
 * Catalog schema bootstrap
 *
 * Applies schema.sql (CREATE ... IF NOT EXISTS) so a fresh database is usable
 * right after startup. The file is copied next to the compiled module by the
 * build script.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { sql } from 'kysely';

import type { CatalogDbClient } from '../client.js';
import type { Logger } from 'pino';

/** Tables created by schema.sql */
export const CATALOG_TABLES = [
  'municipalities',
  'indicators',
  'formulas',
  'sub_indicators',
  'conditions',
] as const;

export const DEFAULT_SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

export interface ApplyCatalogSchemaOptions {
  db: CatalogDbClient;
  logger: Logger;
  schemaPath?: string;
}

export const applyCatalogSchema = async (options: ApplyCatalogSchemaOptions): Promise<void> => {
  const { db, logger, schemaPath = DEFAULT_SCHEMA_PATH } = options;

  const schemaSql = await readFile(schemaPath, 'utf8');

  logger.info({ schemaPath }, 'Applying catalog schema');
  // No bound parameters, so pg sends it as a simple multi-statement query
  await sql.raw(schemaSql).execute(db);
  logger.info('Catalog schema ready');
};
