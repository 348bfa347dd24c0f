/**
 * Get Indicator Set Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createIndicatorSetNotFoundError, type IndicatorError } from '../errors.js';

import type { IndicatorRepository } from '../ports.js';
import type { IndicatorSet } from '../types.js';

export interface GetIndicatorSetDeps {
  indicatorRepo: IndicatorRepository;
}

export interface GetIndicatorSetInput {
  id: number;
}

export const getIndicatorSet = async (
  deps: GetIndicatorSetDeps,
  input: GetIndicatorSetInput
): Promise<Result<IndicatorSet, IndicatorError>> => {
  const result = await deps.indicatorRepo.getIndicatorSet(input.id);
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null) {
    return err(createIndicatorSetNotFoundError(input.id));
  }

  return ok(result.value);
};
