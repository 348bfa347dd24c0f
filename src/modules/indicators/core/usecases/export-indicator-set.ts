/**
 * Export Indicator Set Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { toExportedIndicatorSet, type ExportedIndicatorSet } from '../document.js';
import { createIndicatorSetNotFoundError, type IndicatorError } from '../errors.js';

import type { IndicatorRepository } from '../ports.js';

export interface ExportIndicatorSetDeps {
  indicatorRepo: IndicatorRepository;
}

export interface ExportIndicatorSetInput {
  id: number;
}

/**
 * Serializes an indicator set into the document shape the importer accepts.
 */
export const exportIndicatorSet = async (
  deps: ExportIndicatorSetDeps,
  input: ExportIndicatorSetInput
): Promise<Result<ExportedIndicatorSet, IndicatorError>> => {
  const result = await deps.indicatorRepo.getIndicatorSet(input.id);
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null) {
    return err(createIndicatorSetNotFoundError(input.id));
  }

  return ok(toExportedIndicatorSet(result.value));
};
