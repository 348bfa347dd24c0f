/**
 * Indicators Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { IndicatorSetFilter, IndicatorSetKey } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Database-related error. The message carries the driver's message.
 */
export interface DatabaseError {
  readonly type: 'DatabaseError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A required field is absent from the import document.
 */
export interface MissingRequiredFieldError {
  readonly type: 'MissingRequiredFieldError';
  readonly message: string;
  /** Path of the field, e.g. "indicadores[2].nome_indicador" */
  readonly field: string;
}

/**
 * The import document is not JSON, not an object, or has values of the wrong type.
 */
export interface MalformedDocumentError {
  readonly type: 'MalformedDocumentError';
  readonly message: string;
  readonly details: string[];
}

/**
 * The same (municipality, state, tender, year) set was already imported.
 */
export interface DuplicateIndicatorSetError {
  readonly type: 'DuplicateIndicatorSetError';
  readonly message: string;
  readonly key: IndicatorSetKey;
}

/**
 * Zero or several comparison criteria were supplied.
 */
export interface InvalidCriterionError {
  readonly type: 'InvalidCriterionError';
  readonly message: string;
}

/**
 * Formula update requested for an indicator that has no formula.
 */
export interface FormulaNotFoundError {
  readonly type: 'FormulaNotFoundError';
  readonly message: string;
  readonly indicatorId: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Not Found Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface IndicatorSetNotFoundError {
  readonly type: 'IndicatorSetNotFoundError';
  readonly message: string;
  readonly id: number;
}

export interface IndicatorNotFoundError {
  readonly type: 'IndicatorNotFoundError';
  readonly message: string;
  readonly id: number;
}

/**
 * Listing filters matched nothing. Distinct from a legitimately empty result.
 */
export interface NoMatchingIndicatorSetsError {
  readonly type: 'NoMatchingIndicatorSetsError';
  readonly message: string;
  readonly filter: IndicatorSetFilter;
}

export interface NoEquivalentIndicatorsError {
  readonly type: 'NoEquivalentIndicatorsError';
  readonly message: string;
}

export interface MunicipalityNotFoundError {
  readonly type: 'MunicipalityNotFoundError';
  readonly message: string;
  readonly name: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

/**
 * All possible indicators module errors.
 */
export type IndicatorError =
  | DatabaseError
  | MissingRequiredFieldError
  | MalformedDocumentError
  | DuplicateIndicatorSetError
  | InvalidCriterionError
  | FormulaNotFoundError
  | IndicatorSetNotFoundError
  | IndicatorNotFoundError
  | NoMatchingIndicatorSetsError
  | NoEquivalentIndicatorsError
  | MunicipalityNotFoundError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a DatabaseError, appending the cause's message when there is one.
 */
export const createDatabaseError = (message: string, cause?: unknown): DatabaseError => ({
  type: 'DatabaseError',
  message: cause instanceof Error ? `${message}: ${cause.message}` : message,
  retryable: true,
  cause,
});

export const createMissingRequiredFieldError = (field: string): MissingRequiredFieldError => ({
  type: 'MissingRequiredFieldError',
  message: `Missing required field in document: ${field}`,
  field,
});

export const createMalformedDocumentError = (
  message: string,
  details: string[] = []
): MalformedDocumentError => ({
  type: 'MalformedDocumentError',
  message,
  details,
});

const describeKey = (key: IndicatorSetKey): string => {
  const tender = key.tenderId ?? '-';
  const year = key.tenderYear !== null ? String(key.tenderYear) : '-';
  return `${key.name}/${key.stateCode} (tender ${tender}, year ${year})`;
};

export const createDuplicateIndicatorSetError = (
  key: IndicatorSetKey
): DuplicateIndicatorSetError => ({
  type: 'DuplicateIndicatorSetError',
  message: `Indicator set already imported for ${describeKey(key)}`,
  key,
});

export const createInvalidCriterionError = (message: string): InvalidCriterionError => ({
  type: 'InvalidCriterionError',
  message,
});

export const createFormulaNotFoundError = (
  indicatorId: number,
  indicatorName: string
): FormulaNotFoundError => ({
  type: 'FormulaNotFoundError',
  message: `Indicator '${indicatorName}' (id ${String(indicatorId)}) has no formula`,
  indicatorId,
});

export const createIndicatorSetNotFoundError = (id: number): IndicatorSetNotFoundError => ({
  type: 'IndicatorSetNotFoundError',
  message: `Indicator set with id ${String(id)} not found`,
  id,
});

export const createIndicatorNotFoundError = (id: number): IndicatorNotFoundError => ({
  type: 'IndicatorNotFoundError',
  message: `Indicator with id ${String(id)} not found`,
  id,
});

export const createNoMatchingIndicatorSetsError = (
  filter: IndicatorSetFilter
): NoMatchingIndicatorSetsError => ({
  type: 'NoMatchingIndicatorSetsError',
  message: `No indicator sets found for filters ${JSON.stringify(filter)}`,
  filter,
});

export const createNoEquivalentIndicatorsError = (): NoEquivalentIndicatorsError => ({
  type: 'NoEquivalentIndicatorsError',
  message: 'No indicator matches the search',
});

export const createMunicipalityNotFoundError = (name: string): MunicipalityNotFoundError => ({
  type: 'MunicipalityNotFoundError',
  message: `No municipality found containing '${name}'`,
  name,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps error types to HTTP status codes.
 */
export const INDICATOR_ERROR_HTTP_STATUS: Record<IndicatorError['type'], 400 | 404 | 500> = {
  DatabaseError: 500,
  MissingRequiredFieldError: 400,
  MalformedDocumentError: 400,
  DuplicateIndicatorSetError: 400,
  InvalidCriterionError: 400,
  FormulaNotFoundError: 400,
  IndicatorSetNotFoundError: 404,
  IndicatorNotFoundError: 404,
  NoMatchingIndicatorSetsError: 404,
  NoEquivalentIndicatorsError: 404,
  MunicipalityNotFoundError: 404,
};

/**
 * Gets HTTP status code for an error.
 */
export const getHttpStatusForError = (error: IndicatorError): 400 | 404 | 500 => {
  return INDICATOR_ERROR_HTTP_STATUS[error.type];
};
