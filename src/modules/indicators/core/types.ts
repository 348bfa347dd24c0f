/**
 * Indicators Module - Domain Types
 *
 * An indicator set is one municipality's tender together with every indicator
 * defined by it. Formulas, sub-indicators and conditions hang off indicators.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Brazilian state codes are two letters (e.g. "SP", "MG") */
export const STATE_CODE_LENGTH = 2;

/** Ids and tender years are stored as 32-bit integers */
export const MAX_STORED_INTEGER = 2_147_483_647;

/** Minimum number of formulas sharing a key for them to form a group */
export const MIN_GROUP_SIZE = 2;

// ─────────────────────────────────────────────────────────────────────────────
// Domain Entities
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Municipality owning an indicator set.
 */
export interface Municipality {
  readonly id: number;
  readonly name: string;
  /** Two-letter state code (UF) */
  readonly stateCode: string;
  /** Tender (edital) identifier */
  readonly tenderId: string | null;
  /** Tender (edital) year */
  readonly tenderYear: number | null;
}

export interface Formula {
  readonly id: number;
  readonly indicatorId: number;
  /** Formula as published in the tender */
  readonly raw: string | null;
  /** Whitespace / case canonical form */
  readonly normalized: string | null;
  /** Stable digest of the normalized form, supplied by the importer's caller */
  readonly hash: string | null;
}

export interface SubIndicator {
  readonly id: number;
  readonly indicatorId: number;
  readonly name: string;
  readonly description: string | null;
}

/**
 * Scoring rule tied to an indicator.
 */
export interface Condition {
  readonly id: number;
  readonly indicatorId: number;
  readonly rule: string | null;
  readonly score: number | null;
}

export interface Indicator {
  readonly id: number;
  readonly municipalityId: number;
  readonly name: string;
  readonly description: string | null;
  readonly unit: string | null;
  readonly tags: string[];
  readonly observations: string[];
  readonly inconsistencies: string[];
}

/**
 * Indicator with its owned children.
 */
export interface IndicatorDetail extends Indicator {
  readonly formula: Formula | null;
  readonly subIndicators: SubIndicator[];
  readonly conditions: Condition[];
}

/**
 * Municipality with its full subtree.
 */
export interface IndicatorSet extends Municipality {
  readonly indicators: IndicatorDetail[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Write Models
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Scalar fields of a municipality (no id).
 */
export interface MunicipalityFields {
  readonly name: string;
  readonly stateCode: string;
  readonly tenderId: string | null;
  readonly tenderYear: number | null;
}

/**
 * Identity of an indicator set, used for duplicate detection.
 */
export type IndicatorSetKey = MunicipalityFields;

export interface FormulaDraft {
  readonly raw: string | null;
  readonly normalized: string | null;
  readonly hash: string | null;
}

export interface SubIndicatorDraft {
  readonly name: string;
  readonly description: string | null;
}

export interface ConditionDraft {
  readonly rule: string | null;
  readonly score: number | null;
}

export interface IndicatorDraft {
  readonly name: string;
  readonly description: string | null;
  readonly unit: string | null;
  readonly tags: string[];
  readonly observations: string[];
  readonly inconsistencies: string[];
  readonly formula: FormulaDraft | null;
  readonly subIndicators: SubIndicatorDraft[];
  readonly conditions: ConditionDraft[];
}

/**
 * Complete in-memory tree built by the importer, persisted in one write.
 */
export interface IndicatorSetDraft extends MunicipalityFields {
  readonly indicators: IndicatorDraft[];
}

/**
 * Partial formula update. Undefined fields are left untouched.
 */
export interface FormulaPatch {
  readonly raw?: string | undefined;
  readonly normalized?: string | undefined;
  readonly hash?: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Query Models
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Exact-match filters for listing indicator sets. All supplied fields are ANDed.
 */
export interface IndicatorSetFilter {
  readonly name?: string | undefined;
  readonly stateCode?: string | undefined;
  readonly tenderId?: string | undefined;
  readonly tenderYear?: number | undefined;
}

/**
 * Criterion for finding equivalent indicators. Exactly one kind per search.
 */
export type ComparisonCriterion =
  | { readonly kind: 'name'; readonly value: string }
  | { readonly kind: 'normalizedFormula'; readonly value: string }
  | { readonly kind: 'hash'; readonly value: string };

/**
 * Key used to group similar formulas.
 */
export type SimilarityKind = 'hash' | 'formula';

/**
 * Indicator found by a comparison, annotated with its owner.
 */
export interface EquivalentIndicator extends IndicatorDetail {
  readonly municipalityName: string;
  readonly stateCode: string;
}

/**
 * A formula joined with the indicator and municipality that own it.
 */
export interface FormulaOwner {
  readonly formula: Formula;
  readonly indicator: Pick<Indicator, 'id' | 'name' | 'description'>;
  readonly municipality: Pick<Municipality, 'id' | 'name' | 'stateCode'>;
}

/**
 * Formulas sharing the same key, in first-seen order.
 */
export interface SimilarGroup {
  /** Stored hash or normalized text of the first member */
  readonly key: string;
  readonly members: FormulaOwner[];
}
