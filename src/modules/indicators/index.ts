/**
 * Indicators Module - Public API
 *
 * Catalog of public-lighting tender indicators: import, query, compare,
 * similar-formula detection and export.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  Municipality,
  Formula,
  SubIndicator,
  Condition,
  Indicator,
  IndicatorDetail,
  IndicatorSet,
  MunicipalityFields,
  IndicatorSetKey,
  FormulaDraft,
  SubIndicatorDraft,
  ConditionDraft,
  IndicatorDraft,
  IndicatorSetDraft,
  FormulaPatch,
  IndicatorSetFilter,
  ComparisonCriterion,
  SimilarityKind,
  EquivalentIndicator,
  FormulaOwner,
  SimilarGroup,
} from './core/types.js';

export { STATE_CODE_LENGTH, MIN_GROUP_SIZE } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  IndicatorError,
  DatabaseError,
  MissingRequiredFieldError,
  MalformedDocumentError,
  DuplicateIndicatorSetError,
  InvalidCriterionError,
  FormulaNotFoundError,
  IndicatorSetNotFoundError,
  IndicatorNotFoundError,
  NoMatchingIndicatorSetsError,
  NoEquivalentIndicatorsError,
  MunicipalityNotFoundError,
} from './core/errors.js';

export {
  createDatabaseError,
  createMissingRequiredFieldError,
  createMalformedDocumentError,
  createDuplicateIndicatorSetError,
  createInvalidCriterionError,
  createFormulaNotFoundError,
  createIndicatorSetNotFoundError,
  createIndicatorNotFoundError,
  createNoMatchingIndicatorSetsError,
  createNoEquivalentIndicatorsError,
  createMunicipalityNotFoundError,
  INDICATOR_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { IndicatorRepository } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Document / Matching
// ─────────────────────────────────────────────────────────────────────────────

export {
  IndicatorSetDocumentSchema,
  decodeDocumentText,
  parseIndicatorSetDocument,
  flattenConditions,
  toExportedIndicatorSet,
  type IndicatorSetDocument,
  type ExportedIndicatorSet,
  type ExportedIndicator,
} from './core/document.js';

export {
  normalizeText,
  namesOverlap,
  matchesCriterion,
  parseComparisonCriterion,
  groupSimilarFormulas,
  type ComparisonParams,
} from './core/matching.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  importIndicatorSet,
  type ImportIndicatorSetDeps,
} from './core/usecases/import-indicator-set.js';
export { listIndicatorSets, cleanFilter } from './core/usecases/list-indicator-sets.js';
export { getIndicatorSet } from './core/usecases/get-indicator-set.js';
export { updateIndicatorSet } from './core/usecases/update-indicator-set.js';
export { deleteIndicatorSet } from './core/usecases/delete-indicator-set.js';
export { deleteAllIndicatorSets } from './core/usecases/delete-all-indicator-sets.js';
export { compareIndicators } from './core/usecases/compare-indicators.js';
export { findSimilarIndicators } from './core/usecases/find-similar-indicators.js';
export { getIndicatorsByMunicipality } from './core/usecases/get-indicators-by-municipality.js';
export { updateFormula } from './core/usecases/update-formula.js';
export { replaceTags } from './core/usecases/replace-tags.js';
export { exportIndicatorSet } from './core/usecases/export-indicator-set.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

export { makeIndicatorRepo, type IndicatorRepoOptions } from './shell/repo/indicator-repo.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell - REST Routes
// ─────────────────────────────────────────────────────────────────────────────

export { makeIndicatorRoutes, type MakeIndicatorRoutesDeps } from './shell/rest/routes.js';
