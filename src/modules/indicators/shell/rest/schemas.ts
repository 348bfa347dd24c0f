/**
 * Indicators Module REST API - TypeBox Schemas
 *
 * Request/response validation schemas. Wire field names follow the
 * import document (Portuguese).
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

import { MAX_STORED_INTEGER, STATE_CODE_LENGTH } from '../../core/types.js';

const Nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const IdParamsSchema = Type.Object(
  {
    id: Type.Integer({ minimum: 1, maximum: MAX_STORED_INTEGER, description: 'Record id' }),
  },
  { additionalProperties: false }
);

export type IdParams = Static<typeof IdParamsSchema>;

/**
 * Listing filters. Blank values are ignored.
 */
export const ListIndicatorSetsQuerySchema = Type.Object(
  {
    municipio: Type.Optional(Type.String({ description: 'Exact municipality name' })),
    uf: Type.Optional(Type.String({ description: 'Two-letter state code' })),
    edital: Type.Optional(Type.String({ description: 'Tender identifier' })),
    ano_edital: Type.Optional(
      Type.Integer({ maximum: MAX_STORED_INTEGER, description: 'Tender year' })
    ),
  },
  { additionalProperties: false }
);

export type ListIndicatorSetsQuery = Static<typeof ListIndicatorSetsQuerySchema>;

/**
 * Exactly one of the three is required; enforced by the use case.
 */
export const CompareIndicatorsQuerySchema = Type.Object(
  {
    nome: Type.Optional(Type.String({ description: 'Indicator name (partial, both directions)' })),
    formula: Type.Optional(Type.String({ description: 'Normalized formula text' })),
    hash: Type.Optional(Type.String({ description: 'Formula hash' })),
  },
  { additionalProperties: false }
);

export type CompareIndicatorsQuery = Static<typeof CompareIndicatorsQuerySchema>;

export const SimilarIndicatorsQuerySchema = Type.Object(
  {
    criterio: Type.Union([Type.Literal('hash'), Type.Literal('formula')], {
      description: 'Group by formula hash or by normalized formula',
    }),
  },
  { additionalProperties: false }
);

export type SimilarIndicatorsQuery = Static<typeof SimilarIndicatorsQuerySchema>;

/**
 * An empty fragment matches every name, so the first municipality is returned.
 */
export const ByMunicipalityQuerySchema = Type.Object(
  {
    nome: Type.String({ description: 'Municipality name fragment' }),
  },
  { additionalProperties: false }
);

export type ByMunicipalityQuery = Static<typeof ByMunicipalityQuerySchema>;

/**
 * Full replace of the municipality fields. Omitted tender fields become null.
 */
export const UpdateIndicatorSetBodySchema = Type.Object({
  municipio: Type.String({ minLength: 1 }),
  uf: Type.String({ minLength: STATE_CODE_LENGTH, maxLength: STATE_CODE_LENGTH }),
  edital: Type.Optional(Nullable(Type.String())),
  ano_edital: Type.Optional(Nullable(Type.Integer({ maximum: MAX_STORED_INTEGER }))),
});

export type UpdateIndicatorSetBody = Static<typeof UpdateIndicatorSetBodySchema>;

export const UpdateFormulaQuerySchema = Type.Object(
  {
    bruta: Type.Optional(Type.String()),
    normalizada: Type.Optional(Type.String()),
    hash: Type.Optional(Type.String()),
  },
  { additionalProperties: false }
);

export type UpdateFormulaQuery = Static<typeof UpdateFormulaQuerySchema>;

export const ReplaceTagsBodySchema = Type.Array(Type.String(), {
  description: 'New tag list, replaces the current one',
});

export type ReplaceTagsBody = Static<typeof ReplaceTagsBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// View Schemas
// ─────────────────────────────────────────────────────────────────────────────

const FormulaFields = {
  bruta: Nullable(Type.String()),
  normalizada: Nullable(Type.String()),
  hash: Nullable(Type.String()),
};

export const FormulaViewSchema = Type.Object({
  id: Type.Integer(),
  ...FormulaFields,
});

export const SubIndicatorViewSchema = Type.Object({
  id: Type.Integer(),
  nome: Type.String(),
  descricao: Nullable(Type.String()),
});

export const ConditionViewSchema = Type.Object({
  id: Type.Integer(),
  regra: Nullable(Type.String()),
  nota: Nullable(Type.Number()),
});

const IndicatorFields = {
  id: Type.Integer(),
  nome_indicador: Type.String(),
  descricao: Nullable(Type.String()),
  unidade: Nullable(Type.String()),
  tags: Type.Array(Type.String()),
  observacoes: Type.Array(Type.String()),
  inconsistencias: Type.Array(Type.String()),
  formula: Nullable(FormulaViewSchema),
  subindicadores: Type.Array(SubIndicatorViewSchema),
  condicoes: Type.Array(ConditionViewSchema),
};

export const IndicatorViewSchema = Type.Object(IndicatorFields);

export const EquivalentIndicatorViewSchema = Type.Object({
  ...IndicatorFields,
  municipio: Type.String(),
  uf: Type.String(),
});

const MunicipalityFields = {
  id: Type.Integer(),
  municipio: Type.String(),
  uf: Type.String(),
  edital: Nullable(Type.String()),
  ano_edital: Nullable(Type.Integer()),
};

export const IndicatorSetViewSchema = Type.Object({
  ...MunicipalityFields,
  indicadores: Type.Array(IndicatorViewSchema),
});

export const ImportSummarySchema = Type.Object({
  ...MunicipalityFields,
  total_indicadores: Type.Integer(),
});

export const MunicipalityIndicatorsViewSchema = Type.Object({
  id: Type.Integer(),
  municipio: Type.String(),
  uf: Type.String(),
  total_indicadores: Type.Integer(),
  indicadores: Type.Array(IndicatorViewSchema),
});

export const SimilarMemberViewSchema = Type.Object({
  id: Type.Integer(),
  nome_indicador: Type.String(),
  descricao: Nullable(Type.String()),
  municipio: Type.String(),
  uf: Type.String(),
  formula: FormulaViewSchema,
});

/**
 * Shared hash or normalized formula → indicators owning it.
 */
export const SimilarGroupsViewSchema = Type.Record(
  Type.String(),
  Type.Array(SimilarMemberViewSchema)
);

/**
 * Sent without the success envelope so the body can be re-imported as is.
 */
export const ExportedIndicatorSetSchema = Type.Object({
  municipio: Type.String(),
  uf: Type.String(),
  edital: Nullable(Type.String()),
  ano_edital: Nullable(Type.Integer()),
  indicadores: Type.Array(
    Type.Object({
      nome_indicador: Type.String(),
      descricao: Nullable(Type.String()),
      unidade: Nullable(Type.String()),
      tags: Type.Array(Type.String()),
      observacoes: Type.Array(Type.String()),
      inconsistencias: Type.Array(Type.String()),
      formula: Nullable(Type.Object(FormulaFields)),
      subindicadores: Type.Array(
        Type.Object({ nome: Type.String(), descricao: Nullable(Type.String()) })
      ),
      condicoes: Type.Array(
        Type.Object({ regra: Nullable(Type.String()), nota: Nullable(Type.Number()) })
      ),
    })
  ),
});

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const success = <T extends TSchema>(data: T) =>
  Type.Object({
    ok: Type.Literal(true),
    data,
  });

export const ImportResponseSchema = success(ImportSummarySchema);
export const IndicatorSetListResponseSchema = success(Type.Array(IndicatorSetViewSchema));
export const IndicatorSetResponseSchema = success(IndicatorSetViewSchema);
export const CompareResponseSchema = success(Type.Array(EquivalentIndicatorViewSchema));
export const SimilarResponseSchema = success(SimilarGroupsViewSchema);
export const ByMunicipalityResponseSchema = success(MunicipalityIndicatorsViewSchema);
export const DeleteIndicatorSetResponseSchema = success(
  Type.Object({ id: Type.Integer(), municipio: Type.String() })
);
export const DeleteAllResponseSchema = success(Type.Object({ removidos: Type.Integer() }));
export const FormulaResponseSchema = success(FormulaViewSchema);
export const TagsResponseSchema = success(
  Type.Object({ id: Type.Integer(), tags: Type.Array(Type.String()) })
);

/**
 * Error response schema.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.String({ description: 'Human-readable error message' }),
  details: Type.Optional(Type.Array(Type.String())),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
