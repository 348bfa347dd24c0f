/**
 * Get Indicators By Municipality Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createMunicipalityNotFoundError, type IndicatorError } from '../errors.js';

import type { IndicatorRepository } from '../ports.js';
import type { IndicatorSet } from '../types.js';

export interface GetIndicatorsByMunicipalityDeps {
  indicatorRepo: IndicatorRepository;
}

export interface GetIndicatorsByMunicipalityInput {
  /** Case-insensitive fragment of the municipality name */
  name: string;
}

/**
 * Returns the first municipality (lowest id) whose name contains the fragment.
 */
export const getIndicatorsByMunicipality = async (
  deps: GetIndicatorsByMunicipalityDeps,
  input: GetIndicatorsByMunicipalityInput
): Promise<Result<IndicatorSet, IndicatorError>> => {
  const result = await deps.indicatorRepo.findIndicatorSetByName(input.name);
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null) {
    return err(createMunicipalityNotFoundError(input.name));
  }

  return ok(result.value);
};
