/**
 * Indicators Module - Import / Export Document
 *
 * The document is the nested JSON shape tenders are exchanged in (field names
 * in Portuguese, as published). Import parses it into an IndicatorSetDraft;
 * export produces the same shape back, so an exported set can be re-imported.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ok, err, type Result } from 'neverthrow';

import {
  createMalformedDocumentError,
  createMissingRequiredFieldError,
  type MalformedDocumentError,
  type MissingRequiredFieldError,
} from './errors.js';
import { MAX_STORED_INTEGER, STATE_CODE_LENGTH } from './types.js';

import type {
  ConditionDraft,
  IndicatorDetail,
  IndicatorDraft,
  IndicatorSet,
  IndicatorSetDraft,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Inbound Schema
// ─────────────────────────────────────────────────────────────────────────────

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

const OptionalText = Type.Optional(Nullable(Type.String()));
const OptionalTextList = Type.Optional(Nullable(Type.Array(Type.String())));

export const FormulaDocumentSchema = Type.Object({
  bruta: OptionalText,
  normalizada: OptionalText,
  hash: OptionalText,
});

export const ConditionDocumentSchema = Type.Object({
  regra: OptionalText,
  nota: Type.Optional(Nullable(Type.Number())),
});

export const SubIndicatorDocumentSchema = Type.Object({
  nome: OptionalText,
  descricao: OptionalText,
});

export const IndicatorDocumentSchema = Type.Object({
  /** Either nome_indicador or nome must be present */
  nome_indicador: OptionalText,
  nome: OptionalText,
  descricao: OptionalText,
  unidade: OptionalText,
  tags: OptionalTextList,
  observacoes: OptionalTextList,
  inconsistencias: OptionalTextList,
  formula: Type.Optional(Nullable(FormulaDocumentSchema)),
  subindicadores: Type.Optional(Nullable(Type.Array(SubIndicatorDocumentSchema))),
  /** Flat list, or groups of conditions keyed by group name */
  condicoes: Type.Optional(
    Nullable(
      Type.Union([
        Type.Array(ConditionDocumentSchema),
        Type.Record(Type.String(), Type.Array(ConditionDocumentSchema)),
      ])
    )
  ),
});

export const IndicatorSetDocumentSchema = Type.Object({
  municipio: Type.String({ minLength: 1 }),
  uf: Type.String({ minLength: STATE_CODE_LENGTH, maxLength: STATE_CODE_LENGTH }),
  edital: OptionalText,
  ano_edital: Type.Optional(Nullable(Type.Integer({ maximum: MAX_STORED_INTEGER }))),
  indicadores: Type.Optional(Nullable(Type.Array(IndicatorDocumentSchema))),
});

export type IndicatorSetDocument = Static<typeof IndicatorSetDocumentSchema>;
export type IndicatorDocument = Static<typeof IndicatorDocumentSchema>;
type ConditionDocument = Static<typeof ConditionDocumentSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Outbound Shape
// ─────────────────────────────────────────────────────────────────────────────

export interface ExportedFormula {
  bruta: string | null;
  normalizada: string | null;
  hash: string | null;
}

export interface ExportedIndicator {
  nome_indicador: string;
  descricao: string | null;
  unidade: string | null;
  tags: string[];
  observacoes: string[];
  inconsistencias: string[];
  formula: ExportedFormula | null;
  subindicadores: { nome: string; descricao: string | null }[];
  condicoes: { regra: string | null; nota: number | null }[];
}

export interface ExportedIndicatorSet {
  municipio: string;
  uf: string;
  edital: string | null;
  ano_edital: number | null;
  indicadores: ExportedIndicator[];
}

export type ImportDocumentError = MissingRequiredFieldError | MalformedDocumentError;

// ─────────────────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────────────────

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isBlank = (value: unknown): boolean =>
  value === undefined || value === null || (typeof value === 'string' && value.trim() === '');

/**
 * Parses the text of an uploaded document.
 */
export const decodeDocumentText = (text: string): Result<unknown, MalformedDocumentError> => {
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(createMalformedDocumentError('Document is not valid JSON', [reason]));
  }
};

/**
 * Reports the first required field that is absent or blank.
 * Runs before the structural check so a missing name is reported as such
 * rather than as a type mismatch.
 */
const findMissingField = (document: Record<string, unknown>): string | null => {
  for (const field of ['municipio', 'uf']) {
    if (isBlank(document[field])) {
      return field;
    }
  }

  const indicators = document['indicadores'];
  if (!Array.isArray(indicators)) {
    return null;
  }

  for (const [i, indicator] of indicators.entries()) {
    if (!isRecord(indicator)) {
      continue;
    }
    if (isBlank(indicator['nome_indicador']) && isBlank(indicator['nome'])) {
      return `indicadores[${String(i)}].nome_indicador`;
    }

    const subIndicators = indicator['subindicadores'];
    if (!Array.isArray(subIndicators)) {
      continue;
    }
    for (const [j, sub] of subIndicators.entries()) {
      if (isRecord(sub) && isBlank(sub['nome'])) {
        return `indicadores[${String(i)}].subindicadores[${String(j)}].nome`;
      }
    }
  }

  return null;
};

/**
 * Flattens conditions given either as a list or as named groups of lists.
 */
export const flattenConditions = (
  conditions: IndicatorDocument['condicoes']
): ConditionDraft[] => {
  if (conditions === undefined || conditions === null) {
    return [];
  }

  const flat: ConditionDocument[] = Array.isArray(conditions)
    ? conditions
    : Object.values(conditions).flat();

  return flat.map((condition) => ({
    rule: condition.regra ?? null,
    score: condition.nota ?? null,
  }));
};

const pickIndicatorName = (indicator: IndicatorDocument): string => {
  const primary = indicator.nome_indicador;
  if (primary !== undefined && primary !== null && primary.trim() !== '') {
    return primary;
  }
  return indicator.nome ?? '';
};

const toIndicatorDraft = (indicator: IndicatorDocument): IndicatorDraft => {
  const { formula } = indicator;

  return {
    name: pickIndicatorName(indicator),
    description: indicator.descricao ?? null,
    unit: indicator.unidade ?? null,
    tags: indicator.tags ?? [],
    observations: indicator.observacoes ?? [],
    inconsistencies: indicator.inconsistencias ?? [],
    formula:
      formula !== undefined && formula !== null
        ? {
            raw: formula.bruta ?? null,
            normalized: formula.normalizada ?? null,
            hash: formula.hash ?? null,
          }
        : null,
    subIndicators: (indicator.subindicadores ?? []).map((sub) => ({
      name: sub.nome ?? '',
      description: sub.descricao ?? null,
    })),
    conditions: flattenConditions(indicator.condicoes),
  };
};

/**
 * Validates an import document and builds the in-memory tree to persist.
 *
 * Rules:
 * - `municipio` and `uf` are required; every indicator needs `nome_indicador`
 *   or `nome`; every sub-indicator needs `nome`
 * - `null` lists are treated as empty, `null` formula as no formula
 * - Any failure rejects the whole document
 */
export const parseIndicatorSetDocument = (
  input: unknown
): Result<IndicatorSetDraft, ImportDocumentError> => {
  if (!isRecord(input)) {
    return err(createMalformedDocumentError('Document must be a JSON object'));
  }

  const missingField = findMissingField(input);
  if (missingField !== null) {
    return err(createMissingRequiredFieldError(missingField));
  }

  if (!Value.Check(IndicatorSetDocumentSchema, input)) {
    const details = [...Value.Errors(IndicatorSetDocumentSchema, input)].map(
      (e) => `${e.path}: ${e.message}`
    );
    return err(createMalformedDocumentError('Document has invalid field values', details));
  }

  return ok({
    name: input.municipio,
    stateCode: input.uf,
    tenderId: input.edital ?? null,
    tenderYear: input.ano_edital ?? null,
    indicators: (input.indicadores ?? []).map(toIndicatorDraft),
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Encoding
// ─────────────────────────────────────────────────────────────────────────────

export const toExportedIndicator = (indicator: IndicatorDetail): ExportedIndicator => ({
  nome_indicador: indicator.name,
  descricao: indicator.description,
  unidade: indicator.unit,
  tags: [...indicator.tags],
  observacoes: [...indicator.observations],
  inconsistencias: [...indicator.inconsistencies],
  formula:
    indicator.formula !== null
      ? {
          bruta: indicator.formula.raw,
          normalizada: indicator.formula.normalized,
          hash: indicator.formula.hash,
        }
      : null,
  subindicadores: indicator.subIndicators.map((sub) => ({
    nome: sub.name,
    descricao: sub.description,
  })),
  condicoes: indicator.conditions.map((condition) => ({
    regra: condition.rule,
    nota: condition.score,
  })),
});

/**
 * Serializes an indicator set into the document shape accepted by the importer.
 */
export const toExportedIndicatorSet = (set: IndicatorSet): ExportedIndicatorSet => ({
  municipio: set.name,
  uf: set.stateCode,
  edital: set.tenderId,
  ano_edital: set.tenderYear,
  indicadores: set.indicators.map(toExportedIndicator),
});
