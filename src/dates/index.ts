/**
 * Partial Date Engine
 *
 * Pure, deterministic functions for dates whose day, month and year may each
 * be unknown:
 * - Extraction from free text
 * - Similarity scoring (log-scaled, era-weighted year distance)
 * - Reconciliation of several candidates into one estimate
 *
 * Usage:
 * ```typescript
 * import { extractDate, scoreDates, combineDates } from './dates';
 *
 * const a = extractDate('Do you remember the 21st night of sep?');
 * const b = extractDate('22 September 2024');
 * scoreDates(a, b);              // 8.5
 * combineDates([a, b]).toString(); // "2024-9-21"
 * ```
 */

// Value type
export { PartialDate, sharedFields } from './partialDate';

// Main functions
export { extractDate } from './extractDate';
export { scoreDates, scoreBreakdown, generateExplanation } from './scoreDates';
export { combineDates, chooseConsensusValue } from './combineDates';
export { rankCandidates } from './rankCandidates';
export { formatPartialDate } from './formatDate';

// Shared distance policy (for testing/debugging)
export { fieldPenalty, fieldContribution, fieldMatchScore, eraWeight } from './fieldDistance';

// Constants
export {
  FIELD_RANGES,
  DAY_SCORING,
  MONTH_SCORING,
  YEAR_SCORING,
  YEAR_ERA_WEIGHTS,
  OLDEST_ERA_WEIGHT,
  MONTH_NAMES,
  MIN_MONTH_PREFIX_LENGTH,
  DEFAULT_CENTURY_PIVOT,
  ABSENT_MARKER,
  DEFAULT_MIN_SHARED_FIELDS,
} from './constants';

// Types
export { DATE_FIELDS } from './types';
export type {
  DateField,
  DateParts,
  PartialDateInput,
  ExtractOptions,
  FieldComparison,
  ScoreBreakdown,
  DateCandidate,
  RankedCandidate,
  RankOptions,
} from './types';
