/**
 * Row → domain mapping for the catalog tables.
 *
 * Child rows are expected in id order; assembly keeps that order.
 */

import type {
  Condition,
  Formula,
  FormulaOwner,
  IndicatorDetail,
  IndicatorSet,
  Municipality,
  SubIndicator,
} from '../../core/types.js';
import type {
  Conditions,
  Formulas,
  Indicators,
  Municipalities,
  SubIndicators,
} from '@/infra/database/client.js';
import type { Selectable } from 'kysely';

// ─────────────────────────────────────────────────────────────────────────────
// Row Types
// ─────────────────────────────────────────────────────────────────────────────

export type MunicipalityRow = Selectable<Municipalities>;
export type IndicatorRow = Selectable<Indicators>;
export type FormulaRow = Selectable<Formulas>;
export type SubIndicatorRow = Selectable<SubIndicators>;
export type ConditionRow = Selectable<Conditions>;

/**
 * Formula joined with its indicator and municipality.
 */
export interface FormulaOwnerRow {
  formula_id: number;
  indicator_id: number;
  raw_text: string | null;
  normalized_text: string | null;
  hash: string | null;
  indicator_name: string;
  indicator_description: string | null;
  municipality_id: number;
  municipality_name: string;
  state_code: string;
}

/**
 * Children of a batch of indicators, as fetched by `indicator_id IN (...)`.
 */
export interface IndicatorChildRows {
  formulas: FormulaRow[];
  subIndicators: SubIndicatorRow[];
  conditions: ConditionRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Single Rows
// ─────────────────────────────────────────────────────────────────────────────

export const mapMunicipalityRow = (row: MunicipalityRow): Municipality => ({
  id: row.id,
  name: row.name,
  stateCode: row.state_code,
  tenderId: row.tender_id,
  tenderYear: row.tender_year,
});

export const mapFormulaRow = (row: FormulaRow): Formula => ({
  id: row.id,
  indicatorId: row.indicator_id,
  raw: row.raw_text,
  normalized: row.normalized_text,
  hash: row.hash,
});

export const mapSubIndicatorRow = (row: SubIndicatorRow): SubIndicator => ({
  id: row.id,
  indicatorId: row.indicator_id,
  name: row.name,
  description: row.description,
});

export const mapConditionRow = (row: ConditionRow): Condition => ({
  id: row.id,
  indicatorId: row.indicator_id,
  rule: row.rule_text,
  score: row.score,
});

export const mapFormulaOwnerRow = (row: FormulaOwnerRow): FormulaOwner => ({
  formula: {
    id: row.formula_id,
    indicatorId: row.indicator_id,
    raw: row.raw_text,
    normalized: row.normalized_text,
    hash: row.hash,
  },
  indicator: {
    id: row.indicator_id,
    name: row.indicator_name,
    description: row.indicator_description,
  },
  municipality: {
    id: row.municipality_id,
    name: row.municipality_name,
    stateCode: row.state_code,
  },
});

// ─────────────────────────────────────────────────────────────────────────────
// Tree Assembly
// ─────────────────────────────────────────────────────────────────────────────

const groupBy = <T, K>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> => {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group !== undefined) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
};

/**
 * Attaches formulas, sub-indicators and conditions to their indicators.
 */
export const assembleIndicatorDetails = (
  indicators: readonly IndicatorRow[],
  children: IndicatorChildRows
): IndicatorDetail[] => {
  const formulas = new Map(children.formulas.map((row) => [row.indicator_id, row]));
  const subIndicators = groupBy(children.subIndicators, (row) => row.indicator_id);
  const conditions = groupBy(children.conditions, (row) => row.indicator_id);

  return indicators.map((row) => {
    const formula = formulas.get(row.id);
    return {
      id: row.id,
      municipalityId: row.municipality_id,
      name: row.name,
      description: row.description,
      unit: row.unit,
      tags: row.tags,
      observations: row.observations,
      inconsistencies: row.inconsistencies,
      formula: formula !== undefined ? mapFormulaRow(formula) : null,
      subIndicators: (subIndicators.get(row.id) ?? []).map(mapSubIndicatorRow),
      conditions: (conditions.get(row.id) ?? []).map(mapConditionRow),
    };
  });
};

/**
 * Builds full indicator sets from flat rows of every level.
 * Municipality order is preserved; municipalities without indicators get [].
 */
export const assembleIndicatorSets = (
  municipalities: readonly MunicipalityRow[],
  indicators: readonly IndicatorRow[],
  children: IndicatorChildRows
): IndicatorSet[] => {
  const details = groupBy(assembleIndicatorDetails(indicators, children), (d) => d.municipalityId);

  return municipalities.map((row) => ({
    ...mapMunicipalityRow(row),
    indicators: details.get(row.id) ?? [],
  }));
};
