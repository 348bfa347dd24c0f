/**
 * Indicators Module - Matching
 *
 * Pure functions behind indicator comparison and similar-formula grouping.
 */

import { ok, err, type Result } from 'neverthrow';

import { createInvalidCriterionError, type InvalidCriterionError } from './errors.js';
import { MIN_GROUP_SIZE } from './types.js';

import type {
  ComparisonCriterion,
  FormulaOwner,
  IndicatorDetail,
  SimilarGroup,
  SimilarityKind,
} from './types.js';

/**
 * Raw comparison parameters, as they arrive from the query string.
 */
export interface ComparisonParams {
  nome?: string | undefined;
  formula?: string | undefined;
  hash?: string | undefined;
}

export const normalizeText = (value: string): string => value.trim().toLowerCase();

/**
 * Requires exactly one of nome / formula / hash.
 */
export const parseComparisonCriterion = (
  params: ComparisonParams
): Result<ComparisonCriterion, InvalidCriterionError> => {
  const supplied: ComparisonCriterion[] = [];

  if (params.nome !== undefined) {
    supplied.push({ kind: 'name', value: params.nome });
  }
  if (params.formula !== undefined) {
    supplied.push({ kind: 'normalizedFormula', value: params.formula });
  }
  if (params.hash !== undefined) {
    supplied.push({ kind: 'hash', value: params.hash });
  }

  const [criterion] = supplied;
  if (criterion === undefined) {
    return err(
      createInvalidCriterionError('Provide one comparison criterion: nome, formula or hash')
    );
  }
  if (supplied.length > 1) {
    return err(createInvalidCriterionError('Use only one comparison criterion at a time'));
  }

  return ok(criterion);
};

/**
 * Case-insensitive containment in either direction.
 * Blank strings on either side never match.
 */
export const namesOverlap = (query: string, stored: string): boolean => {
  const a = normalizeText(query);
  const b = normalizeText(stored);
  if (a === '' || b === '') {
    return false;
  }
  return b.includes(a) || a.includes(b);
};

export const matchesCriterion = (
  indicator: IndicatorDetail,
  criterion: ComparisonCriterion
): boolean => {
  switch (criterion.kind) {
    case 'name':
      return namesOverlap(criterion.value, indicator.name);
    case 'normalizedFormula': {
      const stored = indicator.formula?.normalized;
      if (stored === undefined || stored === null) {
        return false;
      }
      return normalizeText(stored) === normalizeText(criterion.value);
    }
    case 'hash': {
      const stored = indicator.formula?.hash;
      return stored !== undefined && stored !== null && stored === criterion.value;
    }
  }
};

/**
 * Grouping key of a formula, or null when it cannot take part in a group.
 */
export const similarityKey = (owner: FormulaOwner, kind: SimilarityKind): string | null => {
  if (kind === 'hash') {
    const { hash } = owner.formula;
    return hash !== null && hash.trim() !== '' ? hash : null;
  }

  const { normalized } = owner.formula;
  if (normalized === null) {
    return null;
  }
  const key = normalizeText(normalized);
  return key !== '' ? key : null;
};

/**
 * Groups formulas sharing a key. Groups smaller than MIN_GROUP_SIZE are dropped;
 * the rest keep the order of their first member and are labelled with that
 * member's stored hash or normalized text.
 */
export const groupSimilarFormulas = (
  owners: readonly FormulaOwner[],
  kind: SimilarityKind
): SimilarGroup[] => {
  const sorted = [...owners].sort((a, b) => a.formula.id - b.formula.id);
  const groups = new Map<string, SimilarGroup>();

  for (const owner of sorted) {
    const key = similarityKey(owner, kind);
    if (key === null) {
      continue;
    }
    const group = groups.get(key);
    if (group !== undefined) {
      group.members.push(owner);
    } else {
      const stored = kind === 'hash' ? owner.formula.hash : owner.formula.normalized;
      groups.set(key, { key: stored ?? key, members: [owner] });
    }
  }

  return [...groups.values()].filter((group) => group.members.length >= MIN_GROUP_SIZE);
};
