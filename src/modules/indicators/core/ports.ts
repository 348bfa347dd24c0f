/**
 * Indicators Module - Port Interfaces
 *
 * Defines the record store contract that the shell layer must implement.
 */

import type { IndicatorError } from './errors.js';
import type {
  Formula,
  FormulaOwner,
  FormulaPatch,
  IndicatorDetail,
  IndicatorSet,
  IndicatorSetDraft,
  IndicatorSetFilter,
  IndicatorSetKey,
  Municipality,
  MunicipalityFields,
  SimilarityKind,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Indicator Repository
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Record store for indicator sets.
 *
 * Every method is one unit of work: it either fully applies or leaves the store
 * untouched. Deleting a municipality or indicator removes everything below it.
 */
export interface IndicatorRepository {
  /**
   * Finds the municipality with exactly this (name, state, tender, year) tuple.
   * Null tender fields only match null.
   */
  findIndicatorSetByKey(key: IndicatorSetKey): Promise<Result<Municipality | null, IndicatorError>>;

  /**
   * Persists a municipality and its whole subtree atomically.
   */
  insertIndicatorSet(draft: IndicatorSetDraft): Promise<Result<IndicatorSet, IndicatorError>>;

  /**
   * Lists indicator sets matching every supplied filter, ordered by id.
   * An empty filter lists everything.
   */
  listIndicatorSets(filter: IndicatorSetFilter): Promise<Result<IndicatorSet[], IndicatorError>>;

  /**
   * @returns The indicator set if found, null if not found
   */
  getIndicatorSet(id: number): Promise<Result<IndicatorSet | null, IndicatorError>>;

  /**
   * Finds the first municipality (lowest id) whose name contains the fragment,
   * case-insensitive.
   */
  findIndicatorSetByName(fragment: string): Promise<Result<IndicatorSet | null, IndicatorError>>;

  /**
   * Replaces the municipality's scalar fields. Indicators are left as they are.
   * @returns The updated municipality, null if not found
   */
  updateMunicipality(
    id: number,
    fields: MunicipalityFields
  ): Promise<Result<Municipality | null, IndicatorError>>;

  /**
   * Deletes a municipality and everything it owns.
   * @returns The deleted municipality, null if not found
   */
  deleteIndicatorSet(id: number): Promise<Result<Municipality | null, IndicatorError>>;

  /**
   * Deletes every municipality and everything they own.
   * @returns Number of municipalities deleted
   */
  deleteAllIndicatorSets(): Promise<Result<number, IndicatorError>>;

  /**
   * @returns The indicator with its children, null if not found
   */
  getIndicator(id: number): Promise<Result<IndicatorDetail | null, IndicatorError>>;

  /**
   * Applies the defined fields of the patch to the indicator's formula.
   * @returns The updated formula, null if the indicator has no formula
   */
  updateFormula(
    indicatorId: number,
    patch: FormulaPatch
  ): Promise<Result<Formula | null, IndicatorError>>;

  /**
   * Replaces the indicator's tag list.
   * @returns The stored tags, null if the indicator does not exist
   */
  replaceTags(indicatorId: number, tags: string[]): Promise<Result<string[] | null, IndicatorError>>;

  /**
   * Lists formulas whose grouping column (hash or normalized text) is present,
   * with their owners, ordered by formula id.
   */
  listFormulaOwners(kind: SimilarityKind): Promise<Result<FormulaOwner[], IndicatorError>>;
}
