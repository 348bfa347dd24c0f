/**
 * Compare Indicators Use Case
 *
 * Finds indicators across all municipalities that are equivalent under a
 * single criterion: name overlap, normalized formula or formula hash.
 */

import { ok, err, type Result } from 'neverthrow';

import { createNoEquivalentIndicatorsError, type IndicatorError } from '../errors.js';
import { matchesCriterion, parseComparisonCriterion, type ComparisonParams } from '../matching.js';

import type { IndicatorRepository } from '../ports.js';
import type { EquivalentIndicator } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CompareIndicatorsDeps {
  indicatorRepo: IndicatorRepository;
}

export type CompareIndicatorsInput = ComparisonParams;

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Compares indicators against exactly one criterion.
 *
 * Flow:
 * 1. Reject zero or several criteria
 * 2. Scan every indicator of every municipality
 * 3. Annotate each match with its municipality
 *
 * @returns Matches in municipality / indicator id order, or
 *          NoEquivalentIndicatorsError when nothing matches
 */
export const compareIndicators = async (
  deps: CompareIndicatorsDeps,
  input: CompareIndicatorsInput
): Promise<Result<EquivalentIndicator[], IndicatorError>> => {
  const criterionResult = parseComparisonCriterion(input);
  if (criterionResult.isErr()) {
    return err(criterionResult.error);
  }
  const criterion = criterionResult.value;

  const setsResult = await deps.indicatorRepo.listIndicatorSets({});
  if (setsResult.isErr()) {
    return err(setsResult.error);
  }

  const matches: EquivalentIndicator[] = [];
  for (const set of setsResult.value) {
    for (const indicator of set.indicators) {
      if (matchesCriterion(indicator, criterion)) {
        matches.push({ ...indicator, municipalityName: set.name, stateCode: set.stateCode });
      }
    }
  }

  if (matches.length === 0) {
    return err(createNoEquivalentIndicatorsError());
  }

  return ok(matches);
};
