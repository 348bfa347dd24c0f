/**
 * Delete All Indicator Sets Use Case
 */

import type { IndicatorError } from '../errors.js';
import type { IndicatorRepository } from '../ports.js';
import type { Result } from 'neverthrow';

export interface DeleteAllIndicatorSetsDeps {
  indicatorRepo: IndicatorRepository;
}

/**
 * Empties the catalog. An already empty catalog reports 0.
 */
export const deleteAllIndicatorSets = async (
  deps: DeleteAllIndicatorSetsDeps
): Promise<Result<number, IndicatorError>> => {
  return deps.indicatorRepo.deleteAllIndicatorSets();
};
