/**
 * Replace Tags Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { createIndicatorNotFoundError, type IndicatorError } from '../errors.js';

import type { IndicatorRepository } from '../ports.js';

export interface ReplaceTagsDeps {
  indicatorRepo: IndicatorRepository;
}

export interface ReplaceTagsInput {
  indicatorId: number;
  tags: string[];
}

/**
 * Replaces an indicator's tag list wholesale.
 * @returns The tags as stored
 */
export const replaceTags = async (
  deps: ReplaceTagsDeps,
  input: ReplaceTagsInput
): Promise<Result<string[], IndicatorError>> => {
  const result = await deps.indicatorRepo.replaceTags(input.indicatorId, input.tags);
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null) {
    return err(createIndicatorNotFoundError(input.indicatorId));
  }

  return ok(result.value);
};
