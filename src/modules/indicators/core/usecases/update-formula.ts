/**
 * Update Formula Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createFormulaNotFoundError,
  createIndicatorNotFoundError,
  type IndicatorError,
} from '../errors.js';

import type { IndicatorRepository } from '../ports.js';
import type { Formula, FormulaPatch } from '../types.js';

export interface UpdateFormulaDeps {
  indicatorRepo: IndicatorRepository;
}

export interface UpdateFormulaInput {
  indicatorId: number;
  patch: FormulaPatch;
}

const isEmptyPatch = (patch: FormulaPatch): boolean =>
  patch.raw === undefined && patch.normalized === undefined && patch.hash === undefined;

/**
 * Patches any subset of an indicator's raw, normalized and hash formula fields.
 *
 * An indicator without a formula cannot be patched (FormulaNotFoundError);
 * formulas are only created by import. An empty patch returns the formula as is.
 */
export const updateFormula = async (
  deps: UpdateFormulaDeps,
  input: UpdateFormulaInput
): Promise<Result<Formula, IndicatorError>> => {
  const { indicatorRepo } = deps;
  const { indicatorId, patch } = input;

  const indicatorResult = await indicatorRepo.getIndicator(indicatorId);
  if (indicatorResult.isErr()) {
    return err(indicatorResult.error);
  }
  const indicator = indicatorResult.value;
  if (indicator === null) {
    return err(createIndicatorNotFoundError(indicatorId));
  }
  if (indicator.formula === null) {
    return err(createFormulaNotFoundError(indicatorId, indicator.name));
  }

  if (isEmptyPatch(patch)) {
    return ok(indicator.formula);
  }

  const updateResult = await indicatorRepo.updateFormula(indicatorId, patch);
  if (updateResult.isErr()) {
    return err(updateResult.error);
  }
  if (updateResult.value === null) {
    return err(createFormulaNotFoundError(indicatorId, indicator.name));
  }

  return ok(updateResult.value);
};
