/**
 * Type Definitions for the Partial Date Engine
 *
 * A partial date knows any subset of its day, month and year.
 * Unknown fields are `undefined`, never 0 or another sentinel.
 */

import type { PartialDate } from './partialDate';

// ============================================
// INPUT TYPES
// ============================================

/** The three independent date fields */
export type DateField = 'day' | 'month' | 'year';

/** Field order used for iteration and display */
export const DATE_FIELDS: readonly DateField[] = ['day', 'month', 'year'];

/**
 * Read-only view of a partial date's fields.
 */
export interface DateParts {
  readonly day?: number;
  readonly month?: number;
  readonly year?: number;
}

/**
 * Constructor input. `null` is accepted as another spelling of "unknown"
 * so values coming from JSON or CSV can be passed straight through.
 */
export interface PartialDateInput {
  day?: number | null;
  month?: number | null;
  year?: number | null;
}

/**
 * Options for free-text extraction. Defaults come from the environment
 * (DATE_CENTURY_PIVOT, DATE_REFERENCE_YEAR).
 */
export interface ExtractOptions {
  /** Two-digit years above this value map to the previous century */
  centuryPivot?: number;
  /** Year whose century is treated as the current one */
  referenceYear?: number;
}

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * How one field contributed to a similarity score.
 */
export interface FieldComparison {
  field: DateField;
  /** Value in the first date (undefined if unknown) */
  left?: number;
  /** Value in the second date (undefined if unknown) */
  right?: number;
  /** Whether both dates know this field */
  compared: boolean;
  /** Distance penalty (0 when not compared) */
  penalty: number;
  /** Signed contribution to the total (0 when not compared) */
  contribution: number;
}

/**
 * Detailed breakdown of a similarity score.
 */
export interface ScoreBreakdown {
  day: FieldComparison;
  month: FieldComparison;
  year: FieldComparison;
  /** Sum of the three contributions */
  total: number;
}

/**
 * A record to be ranked against a target date.
 */
export interface DateCandidate {
  id: string;
  date: PartialDate;
}

/**
 * A ranked candidate with its score details.
 */
export interface RankedCandidate extends DateCandidate {
  score: number;
  /** Fields known in both the candidate and the target */
  sharedFields: DateField[];
  breakdown: ScoreBreakdown;
}

/**
 * Options for candidate ranking.
 */
export interface RankOptions {
  /** Minimum number of fields known in both dates (default 1) */
  minSharedFields?: number;
  /** Keep only the best N candidates */
  limit?: number;
}
