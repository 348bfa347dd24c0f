/**
 * List Indicator Sets Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createNoMatchingIndicatorSetsError, type IndicatorError } from '../errors.js';

import type { IndicatorRepository } from '../ports.js';
import type { IndicatorSet, IndicatorSetFilter } from '../types.js';

export interface ListIndicatorSetsDeps {
  indicatorRepo: IndicatorRepository;
}

export interface ListIndicatorSetsInput {
  filter: IndicatorSetFilter;
}

const isPresent = (value: string | undefined): value is string =>
  value !== undefined && value.trim() !== '';

/**
 * Drops blank text filters so `?uf=` behaves like no filter at all.
 */
export const cleanFilter = (filter: IndicatorSetFilter): IndicatorSetFilter => {
  const cleaned: {
    name?: string;
    stateCode?: string;
    tenderId?: string;
    tenderYear?: number;
  } = {};

  if (isPresent(filter.name)) {
    cleaned.name = filter.name;
  }
  if (isPresent(filter.stateCode)) {
    cleaned.stateCode = filter.stateCode;
  }
  if (isPresent(filter.tenderId)) {
    cleaned.tenderId = filter.tenderId;
  }
  if (filter.tenderYear !== undefined) {
    cleaned.tenderYear = filter.tenderYear;
  }

  return cleaned;
};

/**
 * Lists indicator sets matching every supplied filter.
 * An empty result is reported as NoMatchingIndicatorSetsError.
 */
export const listIndicatorSets = async (
  deps: ListIndicatorSetsDeps,
  input: ListIndicatorSetsInput
): Promise<Result<IndicatorSet[], IndicatorError>> => {
  const filter = cleanFilter(input.filter);

  const listResult = await deps.indicatorRepo.listIndicatorSets(filter);
  if (listResult.isErr()) {
    return err(listResult.error);
  }

  if (listResult.value.length === 0) {
    return err(createNoMatchingIndicatorSetsError(filter));
  }

  return ok(listResult.value);
};
