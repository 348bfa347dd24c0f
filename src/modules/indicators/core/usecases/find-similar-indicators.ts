/**
 * Find Similar Indicators Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { groupSimilarFormulas } from '../matching.js';

import type { IndicatorError } from '../errors.js';
import type { IndicatorRepository } from '../ports.js';
import type { SimilarGroup, SimilarityKind } from '../types.js';

export interface FindSimilarIndicatorsDeps {
  indicatorRepo: IndicatorRepository;
}

export interface FindSimilarIndicatorsInput {
  kind: SimilarityKind;
}

/**
 * Groups formulas that recur across indicators, by hash or by normalized text.
 * No recurring formula yields an empty list, not an error.
 */
export const findSimilarIndicators = async (
  deps: FindSimilarIndicatorsDeps,
  input: FindSimilarIndicatorsInput
): Promise<Result<SimilarGroup[], IndicatorError>> => {
  const ownersResult = await deps.indicatorRepo.listFormulaOwners(input.kind);
  if (ownersResult.isErr()) {
    return err(ownersResult.error);
  }

  return ok(groupSimilarFormulas(ownersResult.value, input.kind));
};
