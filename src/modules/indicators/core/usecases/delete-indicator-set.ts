/**
 * Delete Indicator Set Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createIndicatorSetNotFoundError, type IndicatorError } from '../errors.js';

import type { IndicatorRepository } from '../ports.js';
import type { Municipality } from '../types.js';

export interface DeleteIndicatorSetDeps {
  indicatorRepo: IndicatorRepository;
}

export interface DeleteIndicatorSetInput {
  id: number;
}

/**
 * Deletes a municipality together with its indicators, formulas,
 * sub-indicators and conditions.
 */
export const deleteIndicatorSet = async (
  deps: DeleteIndicatorSetDeps,
  input: DeleteIndicatorSetInput
): Promise<Result<Municipality, IndicatorError>> => {
  const result = await deps.indicatorRepo.deleteIndicatorSet(input.id);
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null) {
    return err(createIndicatorSetNotFoundError(input.id));
  }

  return ok(result.value);
};
