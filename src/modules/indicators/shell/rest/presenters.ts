/**
 * Domain → wire views for the REST API.
 */

import type { IndicatorError } from '../../core/errors.js';
import type {
  EquivalentIndicator,
  Formula,
  IndicatorDetail,
  IndicatorSet,
  Municipality,
  SimilarGroup,
} from '../../core/types.js';
import type { ErrorResponse } from './schemas.js';

export interface FormulaView {
  id: number;
  bruta: string | null;
  normalizada: string | null;
  hash: string | null;
}

export interface IndicatorView {
  id: number;
  nome_indicador: string;
  descricao: string | null;
  unidade: string | null;
  tags: string[];
  observacoes: string[];
  inconsistencias: string[];
  formula: FormulaView | null;
  subindicadores: { id: number; nome: string; descricao: string | null }[];
  condicoes: { id: number; regra: string | null; nota: number | null }[];
}

export interface MunicipalityView {
  id: number;
  municipio: string;
  uf: string;
  edital: string | null;
  ano_edital: number | null;
}

export interface IndicatorSetView extends MunicipalityView {
  indicadores: IndicatorView[];
}

export interface ImportSummaryView extends MunicipalityView {
  total_indicadores: number;
}

export interface EquivalentIndicatorView extends IndicatorView {
  municipio: string;
  uf: string;
}

export interface SimilarMemberView {
  id: number;
  nome_indicador: string;
  descricao: string | null;
  municipio: string;
  uf: string;
  formula: FormulaView;
}

export type SimilarGroupsView = Record<string, SimilarMemberView[]>;

export const presentFormula = (formula: Formula): FormulaView => ({
  id: formula.id,
  bruta: formula.raw,
  normalizada: formula.normalized,
  hash: formula.hash,
});

export const presentIndicator = (indicator: IndicatorDetail): IndicatorView => ({
  id: indicator.id,
  nome_indicador: indicator.name,
  descricao: indicator.description,
  unidade: indicator.unit,
  tags: indicator.tags,
  observacoes: indicator.observations,
  inconsistencias: indicator.inconsistencies,
  formula: indicator.formula !== null ? presentFormula(indicator.formula) : null,
  subindicadores: indicator.subIndicators.map((sub) => ({
    id: sub.id,
    nome: sub.name,
    descricao: sub.description,
  })),
  condicoes: indicator.conditions.map((condition) => ({
    id: condition.id,
    regra: condition.rule,
    nota: condition.score,
  })),
});

export const presentMunicipality = (municipality: Municipality): MunicipalityView => ({
  id: municipality.id,
  municipio: municipality.name,
  uf: municipality.stateCode,
  edital: municipality.tenderId,
  ano_edital: municipality.tenderYear,
});

export const presentIndicatorSet = (set: IndicatorSet): IndicatorSetView => ({
  ...presentMunicipality(set),
  indicadores: set.indicators.map(presentIndicator),
});

export const presentImportSummary = (set: IndicatorSet): ImportSummaryView => ({
  ...presentMunicipality(set),
  total_indicadores: set.indicators.length,
});

export const presentEquivalentIndicator = (
  indicator: EquivalentIndicator
): EquivalentIndicatorView => ({
  ...presentIndicator(indicator),
  municipio: indicator.municipalityName,
  uf: indicator.stateCode,
});

/**
 * Keyed by the stored hash or normalized text of each group.
 */
export const presentSimilarGroups = (groups: readonly SimilarGroup[]): SimilarGroupsView => {
  const view: SimilarGroupsView = {};
  for (const group of groups) {
    view[group.key] = group.members.map((member) => ({
      id: member.indicator.id,
      nome_indicador: member.indicator.name,
      descricao: member.indicator.description,
      municipio: member.municipality.name,
      uf: member.municipality.stateCode,
      formula: presentFormula(member.formula),
    }));
  }
  return view;
};

/**
 * Error envelope. Validation details are included when the error carries them.
 */
export const presentError = (error: IndicatorError): ErrorResponse => {
  if (error.type === 'MalformedDocumentError' && error.details.length > 0) {
    return { ok: false, error: error.type, message: error.message, details: error.details };
  }
  return { ok: false, error: error.type, message: error.message };
};
