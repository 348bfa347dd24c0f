/**
 * Update Indicator Set Use Case
 *
 * Shallow replace of the municipality's scalar fields. Indicators are not touched.
 */

import { ok, err, type Result } from 'neverthrow';

import { createIndicatorSetNotFoundError, type IndicatorError } from '../errors.js';

import type { IndicatorRepository } from '../ports.js';
import type { IndicatorSet, MunicipalityFields } from '../types.js';

export interface UpdateIndicatorSetDeps {
  indicatorRepo: IndicatorRepository;
}

export interface UpdateIndicatorSetInput {
  id: number;
  /** Omitted tender fields must already be null here */
  fields: MunicipalityFields;
}

/**
 * @returns The indicator set as stored after the update
 */
export const updateIndicatorSet = async (
  deps: UpdateIndicatorSetDeps,
  input: UpdateIndicatorSetInput
): Promise<Result<IndicatorSet, IndicatorError>> => {
  const { indicatorRepo } = deps;

  const updateResult = await indicatorRepo.updateMunicipality(input.id, input.fields);
  if (updateResult.isErr()) {
    return err(updateResult.error);
  }
  if (updateResult.value === null) {
    return err(createIndicatorSetNotFoundError(input.id));
  }

  const setResult = await indicatorRepo.getIndicatorSet(input.id);
  if (setResult.isErr()) {
    return err(setResult.error);
  }
  // Deleted between the two calls
  if (setResult.value === null) {
    return err(createIndicatorSetNotFoundError(input.id));
  }

  return ok(setResult.value);
};
