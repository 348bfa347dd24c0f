import type { Generated } from 'kysely';

// Municipalities Table
// One row per imported indicator set (municipality + tender).
export interface Municipalities {
  id: Generated<number>; // SERIAL
  name: string;
  state_code: string;
  tender_id: string | null;
  tender_year: number | null;
}

// Indicators Table
export interface Indicators {
  id: Generated<number>; // SERIAL
  municipality_id: number;
  name: string;
  description: string | null;
  unit: string | null;
  tags: Generated<string[]>; // TEXT[] NOT NULL DEFAULT '{}'
  observations: Generated<string[]>;
  inconsistencies: Generated<string[]>;
}

// Formulas Table (1:1 with indicators, UNIQUE indicator_id)
export interface Formulas {
  id: Generated<number>;
  indicator_id: number;
  raw_text: string | null;
  normalized_text: string | null;
  hash: string | null;
}

// Sub-indicators Table
export interface SubIndicators {
  id: Generated<number>;
  indicator_id: number;
  name: string;
  description: string | null;
}

// Conditions Table
export interface Conditions {
  id: Generated<number>;
  indicator_id: number;
  rule_text: string | null;
  score: number | null; // DOUBLE PRECISION
}

// Database Schema Interface
// Keys are lowercase to match PostgreSQL's identifier folding.
export interface CatalogDatabase {
  municipalities: Municipalities;
  indicators: Indicators;
  formulas: Formulas;
  sub_indicators: SubIndicators;
  conditions: Conditions;
}
