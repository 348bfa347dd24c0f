/**
 * Indicator Repository Implementation
 *
 * Kysely-based implementation over the catalog tables. Trees are loaded level
 * by level and assembled in memory. Each level binds its ids as one array
 * parameter (`= ANY($1)`); the wire protocol caps a query at 65535 parameters.
 */

import { sql } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import {
  assembleIndicatorDetails,
  assembleIndicatorSets,
  mapFormulaOwnerRow,
  mapFormulaRow,
  mapMunicipalityRow,
  type IndicatorChildRows,
  type IndicatorRow,
  type MunicipalityRow,
} from './row-mappers.js';
import { createDatabaseError, type IndicatorError } from '../../core/errors.js';

import type { IndicatorRepository } from '../../core/ports.js';
import type {
  Formula,
  FormulaOwner,
  FormulaPatch,
  IndicatorDetail,
  IndicatorDraft,
  IndicatorSet,
  IndicatorSetDraft,
  IndicatorSetFilter,
  IndicatorSetKey,
  Municipality,
  MunicipalityFields,
  SimilarityKind,
} from '../../core/types.js';
import type { CatalogDatabase, CatalogDbClient, Formulas } from '@/infra/database/client.js';
import type { Transaction, Updateable } from 'kysely';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Options for creating the indicator repository.
 */
export interface IndicatorRepoOptions {
  db: CatalogDbClient;
  logger: Logger;
}

/**
 * Escapes LIKE wildcards so the fragment is matched literally.
 */
export const escapeLikePattern = (fragment: string): string =>
  fragment.replace(/[\\%_]/g, (char) => `\\${char}`);

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Kysely-based Indicator Repository.
 */
class KyselyIndicatorRepo implements IndicatorRepository {
  private readonly db: CatalogDbClient;
  private readonly log: Logger;

  constructor(options: IndicatorRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'IndicatorRepo' });
  }

  async findIndicatorSetByKey(
    key: IndicatorSetKey
  ): Promise<Result<Municipality | null, IndicatorError>> {
    this.log.debug({ key }, 'Finding indicator set by key');

    try {
      const row = await this.db
        .selectFrom('municipalities')
        .selectAll()
        .where('name', '=', key.name)
        .where('state_code', '=', key.stateCode)
        .where('tender_id', key.tenderId === null ? 'is' : '=', key.tenderId)
        .where('tender_year', key.tenderYear === null ? 'is' : '=', key.tenderYear)
        .orderBy('id')
        .executeTakeFirst();

      return ok(row !== undefined ? mapMunicipalityRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, key }, 'Failed to find indicator set by key');
      return err(createDatabaseError('Failed to find indicator set by key', error));
    }
  }

  async insertIndicatorSet(
    draft: IndicatorSetDraft
  ): Promise<Result<IndicatorSet, IndicatorError>> {
    this.log.debug(
      { name: draft.name, stateCode: draft.stateCode, indicators: draft.indicators.length },
      'Inserting indicator set'
    );

    try {
      const set = await this.db.transaction().execute(async (trx) => {
        const municipality = await trx
          .insertInto('municipalities')
          .values({
            name: draft.name,
            state_code: draft.stateCode,
            tender_id: draft.tenderId,
            tender_year: draft.tenderYear,
          })
          .returningAll()
          .executeTakeFirstOrThrow();

        const indicators: IndicatorDetail[] = [];
        for (const indicatorDraft of draft.indicators) {
          indicators.push(await this.insertIndicator(trx, municipality.id, indicatorDraft));
        }

        return { ...mapMunicipalityRow(municipality), indicators };
      });

      this.log.info({ id: set.id, indicators: set.indicators.length }, 'Indicator set inserted');
      return ok(set);
    } catch (error) {
      this.log.error({ err: error, name: draft.name }, 'Failed to insert indicator set');
      return err(createDatabaseError('Failed to insert indicator set', error));
    }
  }

  async listIndicatorSets(
    filter: IndicatorSetFilter
  ): Promise<Result<IndicatorSet[], IndicatorError>> {
    this.log.debug({ filter }, 'Listing indicator sets');

    try {
      let query = this.db.selectFrom('municipalities').selectAll();

      if (filter.name !== undefined) {
        query = query.where('name', '=', filter.name);
      }
      if (filter.stateCode !== undefined) {
        query = query.where('state_code', '=', filter.stateCode);
      }
      if (filter.tenderId !== undefined) {
        query = query.where('tender_id', '=', filter.tenderId);
      }
      if (filter.tenderYear !== undefined) {
        query = query.where('tender_year', '=', filter.tenderYear);
      }

      const rows = await query.orderBy('id').execute();
      return ok(await this.loadIndicatorSets(rows));
    } catch (error) {
      this.log.error({ err: error, filter }, 'Failed to list indicator sets');
      return err(createDatabaseError('Failed to list indicator sets', error));
    }
  }

  async getIndicatorSet(id: number): Promise<Result<IndicatorSet | null, IndicatorError>> {
    this.log.debug({ id }, 'Getting indicator set');

    try {
      const row = await this.db
        .selectFrom('municipalities')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst();

      if (row === undefined) {
        this.log.debug({ id }, 'Indicator set not found');
        return ok(null);
      }

      const [set] = await this.loadIndicatorSets([row]);
      return ok(set ?? null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to get indicator set');
      return err(createDatabaseError('Failed to get indicator set', error));
    }
  }

  async findIndicatorSetByName(
    fragment: string
  ): Promise<Result<IndicatorSet | null, IndicatorError>> {
    this.log.debug({ fragment }, 'Finding indicator set by name fragment');

    try {
      const row = await this.db
        .selectFrom('municipalities')
        .selectAll()
        .where('name', 'ilike', `%${escapeLikePattern(fragment)}%`)
        .orderBy('id')
        .limit(1)
        .executeTakeFirst();

      if (row === undefined) {
        return ok(null);
      }

      const [set] = await this.loadIndicatorSets([row]);
      return ok(set ?? null);
    } catch (error) {
      this.log.error({ err: error, fragment }, 'Failed to find indicator set by name');
      return err(createDatabaseError('Failed to find indicator set by name', error));
    }
  }

  async updateMunicipality(
    id: number,
    fields: MunicipalityFields
  ): Promise<Result<Municipality | null, IndicatorError>> {
    this.log.debug({ id, fields }, 'Updating municipality');

    try {
      const row = await this.db
        .updateTable('municipalities')
        .set({
          name: fields.name,
          state_code: fields.stateCode,
          tender_id: fields.tenderId,
          tender_year: fields.tenderYear,
        })
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();

      return ok(row !== undefined ? mapMunicipalityRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to update municipality');
      return err(createDatabaseError('Failed to update municipality', error));
    }
  }

  async deleteIndicatorSet(id: number): Promise<Result<Municipality | null, IndicatorError>> {
    this.log.debug({ id }, 'Deleting indicator set');

    try {
      // Children go with it through ON DELETE CASCADE
      const row = await this.db
        .deleteFrom('municipalities')
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();

      if (row !== undefined) {
        this.log.info({ id }, 'Indicator set deleted');
      }
      return ok(row !== undefined ? mapMunicipalityRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to delete indicator set');
      return err(createDatabaseError('Failed to delete indicator set', error));
    }
  }

  async deleteAllIndicatorSets(): Promise<Result<number, IndicatorError>> {
    this.log.debug('Deleting all indicator sets');

    try {
      const result = await this.db.deleteFrom('municipalities').executeTakeFirst();
      const deleted = Number(result.numDeletedRows);

      this.log.info({ deleted }, 'All indicator sets deleted');
      return ok(deleted);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to delete all indicator sets');
      return err(createDatabaseError('Failed to delete all indicator sets', error));
    }
  }

  async getIndicator(id: number): Promise<Result<IndicatorDetail | null, IndicatorError>> {
    this.log.debug({ id }, 'Getting indicator');

    try {
      const row = await this.db
        .selectFrom('indicators')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst();

      if (row === undefined) {
        return ok(null);
      }

      const children = await this.loadChildren([row.id]);
      const [detail] = assembleIndicatorDetails([row], children);
      return ok(detail ?? null);
    } catch (error) {
      this.log.error({ err: error, id }, 'Failed to get indicator');
      return err(createDatabaseError('Failed to get indicator', error));
    }
  }

  async updateFormula(
    indicatorId: number,
    patch: FormulaPatch
  ): Promise<Result<Formula | null, IndicatorError>> {
    this.log.debug({ indicatorId, patch }, 'Updating formula');

    const values: Updateable<Formulas> = {};
    if (patch.raw !== undefined) {
      values.raw_text = patch.raw;
    }
    if (patch.normalized !== undefined) {
      values.normalized_text = patch.normalized;
    }
    if (patch.hash !== undefined) {
      values.hash = patch.hash;
    }

    try {
      const row =
        Object.keys(values).length === 0
          ? await this.db
              .selectFrom('formulas')
              .selectAll()
              .where('indicator_id', '=', indicatorId)
              .executeTakeFirst()
          : await this.db
              .updateTable('formulas')
              .set(values)
              .where('indicator_id', '=', indicatorId)
              .returningAll()
              .executeTakeFirst();

      return ok(row !== undefined ? mapFormulaRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, indicatorId }, 'Failed to update formula');
      return err(createDatabaseError('Failed to update formula', error));
    }
  }

  async replaceTags(
    indicatorId: number,
    tags: string[]
  ): Promise<Result<string[] | null, IndicatorError>> {
    this.log.debug({ indicatorId, tags }, 'Replacing tags');

    try {
      const row = await this.db
        .updateTable('indicators')
        .set({ tags })
        .where('id', '=', indicatorId)
        .returning(['tags'])
        .executeTakeFirst();

      return ok(row !== undefined ? row.tags : null);
    } catch (error) {
      this.log.error({ err: error, indicatorId }, 'Failed to replace tags');
      return err(createDatabaseError('Failed to replace tags', error));
    }
  }

  async listFormulaOwners(kind: SimilarityKind): Promise<Result<FormulaOwner[], IndicatorError>> {
    this.log.debug({ kind }, 'Listing formula owners');

    const keyColumn = kind === 'hash' ? 'formulas.hash' : 'formulas.normalized_text';

    try {
      const rows = await this.db
        .selectFrom('formulas')
        .innerJoin('indicators', 'indicators.id', 'formulas.indicator_id')
        .innerJoin('municipalities', 'municipalities.id', 'indicators.municipality_id')
        .select([
          'formulas.id as formula_id',
          'formulas.indicator_id',
          'formulas.raw_text',
          'formulas.normalized_text',
          'formulas.hash',
          'indicators.name as indicator_name',
          'indicators.description as indicator_description',
          'municipalities.id as municipality_id',
          'municipalities.name as municipality_name',
          'municipalities.state_code',
        ])
        .where(keyColumn, 'is not', null)
        .orderBy('formulas.id')
        .execute();

      return ok(rows.map(mapFormulaOwnerRow));
    } catch (error) {
      this.log.error({ err: error, kind }, 'Failed to list formula owners');
      return err(createDatabaseError('Failed to list formula owners', error));
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────────────

  private async insertIndicator(
    trx: Transaction<CatalogDatabase>,
    municipalityId: number,
    draft: IndicatorDraft
  ): Promise<IndicatorDetail> {
    const indicator = await trx
      .insertInto('indicators')
      .values({
        municipality_id: municipalityId,
        name: draft.name,
        description: draft.description,
        unit: draft.unit,
        tags: draft.tags,
        observations: draft.observations,
        inconsistencies: draft.inconsistencies,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    const formulas =
      draft.formula !== null
        ? [
            await trx
              .insertInto('formulas')
              .values({
                indicator_id: indicator.id,
                raw_text: draft.formula.raw,
                normalized_text: draft.formula.normalized,
                hash: draft.formula.hash,
              })
              .returningAll()
              .executeTakeFirstOrThrow(),
          ]
        : [];

    const subIndicators =
      draft.subIndicators.length > 0
        ? await trx
            .insertInto('sub_indicators')
            .values(
              draft.subIndicators.map((sub) => ({
                indicator_id: indicator.id,
                name: sub.name,
                description: sub.description,
              }))
            )
            .returningAll()
            .execute()
        : [];

    const conditions =
      draft.conditions.length > 0
        ? await trx
            .insertInto('conditions')
            .values(
              draft.conditions.map((condition) => ({
                indicator_id: indicator.id,
                rule_text: condition.rule,
                score: condition.score,
              }))
            )
            .returningAll()
            .execute()
        : [];

    const [detail] = assembleIndicatorDetails([indicator], {
      formulas,
      subIndicators: [...subIndicators].sort((a, b) => a.id - b.id),
      conditions: [...conditions].sort((a, b) => a.id - b.id),
    });
    if (detail === undefined) {
      throw new Error(`Indicator ${String(indicator.id)} could not be assembled`);
    }
    return detail;
  }

  private async loadChildren(indicatorIds: number[]): Promise<IndicatorChildRows> {
    if (indicatorIds.length === 0) {
      return { formulas: [], subIndicators: [], conditions: [] };
    }

    const [formulas, subIndicators, conditions] = await Promise.all([
      this.db
        .selectFrom('formulas')
        .selectAll()
        .where(sql<boolean>`indicator_id = ANY(${indicatorIds}::int[])`)
        .orderBy('id')
        .execute(),
      this.db
        .selectFrom('sub_indicators')
        .selectAll()
        .where(sql<boolean>`indicator_id = ANY(${indicatorIds}::int[])`)
        .orderBy('id')
        .execute(),
      this.db
        .selectFrom('conditions')
        .selectAll()
        .where(sql<boolean>`indicator_id = ANY(${indicatorIds}::int[])`)
        .orderBy('id')
        .execute(),
    ]);

    return { formulas, subIndicators, conditions };
  }

  private async loadIndicatorSets(municipalities: MunicipalityRow[]): Promise<IndicatorSet[]> {
    if (municipalities.length === 0) {
      return [];
    }

    const municipalityIds = municipalities.map((m) => m.id);
    const indicators: IndicatorRow[] = await this.db
      .selectFrom('indicators')
      .selectAll()
      .where(sql<boolean>`municipality_id = ANY(${municipalityIds}::int[])`)
      .orderBy('id')
      .execute();

    const children = await this.loadChildren(indicators.map((i) => i.id));

    return assembleIndicatorSets(municipalities, indicators, children);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a Kysely-backed IndicatorRepository.
 */
export const makeIndicatorRepo = (options: IndicatorRepoOptions): IndicatorRepository => {
  return new KyselyIndicatorRepo(options);
};
