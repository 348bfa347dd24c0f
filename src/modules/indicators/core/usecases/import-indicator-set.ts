/**
 * Import Indicator Set Use Case
 *
 * Validates an import document and persists the whole tree in one write.
 */

import { ok, err, type Result } from 'neverthrow';

import { parseIndicatorSetDocument } from '../document.js';
import { createDuplicateIndicatorSetError, type IndicatorError } from '../errors.js';

import type { IndicatorRepository } from '../ports.js';
import type { IndicatorSet } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ImportIndicatorSetDeps {
  indicatorRepo: IndicatorRepository;
}

export interface ImportIndicatorSetInput {
  /** Decoded JSON document, not yet validated */
  document: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Imports an indicator set.
 *
 * Flow:
 * 1. Validate the document and build the in-memory tree
 * 2. Reject the document if the same (municipality, state, tender, year) exists
 * 3. Persist municipality, indicators and their children atomically
 *
 * @returns The stored indicator set, with generated ids
 */
export const importIndicatorSet = async (
  deps: ImportIndicatorSetDeps,
  input: ImportIndicatorSetInput
): Promise<Result<IndicatorSet, IndicatorError>> => {
  const { indicatorRepo } = deps;

  // Step 1: Validate
  const draftResult = parseIndicatorSetDocument(input.document);
  if (draftResult.isErr()) {
    return err(draftResult.error);
  }
  const draft = draftResult.value;

  // Step 2: Duplicate guard
  const key = {
    name: draft.name,
    stateCode: draft.stateCode,
    tenderId: draft.tenderId,
    tenderYear: draft.tenderYear,
  };
  const existingResult = await indicatorRepo.findIndicatorSetByKey(key);
  if (existingResult.isErr()) {
    return err(existingResult.error);
  }
  if (existingResult.value !== null) {
    return err(createDuplicateIndicatorSetError(key));
  }

  // Step 3: Persist
  const insertResult = await indicatorRepo.insertIndicatorSet(draft);
  if (insertResult.isErr()) {
    return err(insertResult.error);
  }

  return ok(insertResult.value);
};
