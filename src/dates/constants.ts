/**
 * Constants for the Partial Date Engine
 *
 * These values define how dates are extracted, scored and reconciled.
 * All of them are tunable: changing a value here changes the behavior of
 * both the scorer and the reconciler, since they share one penalty function.
 *
 * Calibration point: comparing 21 Sep 1900 against "Sep 1902" (day unknown)
 * scores exactly 20 = 5 (same month) + 20 - 5 * log3(1 + 2) (year).
 */

// ============================================
// FIELD RANGES
// ============================================

/**
 * Allowed ranges for the bounded fields. Years are unbounded.
 * Per-month day limits and leap years are deliberately not checked.
 */
export const FIELD_RANGES = {
  day: { min: 1, max: 31 },
  month: { min: 1, max: 12 },
} as const;

// ============================================
// SCORING WEIGHTS
// ============================================

/**
 * Day comparison: linear penalty, no wrap-around across month ends.
 *
 * - same day = +5
 * - 1 day apart = +3.5
 * - 4 days apart = -1
 */
export const DAY_SCORING = {
  MATCH_SCORE: 5,
  PENALTY_PER_DAY: 1.5,
} as const;

/**
 * Month comparison: linear penalty, December and January are 11 apart.
 *
 * - same month = +5
 * - 1 month apart = +3
 * - 3 months apart = -1
 */
export const MONTH_SCORING = {
  MATCH_SCORE: 5,
  PENALTY_PER_MONTH: 2,
} as const;

/**
 * Year comparison: the penalty grows with log(1 + gap) in this base and is
 * multiplied by the era weight of the pair's average year.
 */
export const YEAR_SCORING = {
  MATCH_SCORE: 20,
  LOG_BASE: 3,
} as const;

/**
 * Era weights, newest first. The first entry whose lower bound is at or
 * below the pair's average year applies. Older records are less reliable,
 * so the same gap costs less the further back it sits.
 */
export const YEAR_ERA_WEIGHTS: ReadonlyArray<{ readonly from: number; readonly weight: number }> = [
  { from: 1980, weight: 20 },
  { from: 1970, weight: 16 },
  { from: 1960, weight: 13 },
  { from: 1950, weight: 10 },
  { from: 1940, weight: 9 },
  { from: 1930, weight: 8 },
  { from: 1920, weight: 7 },
  { from: 1910, weight: 6 },
  { from: 1900, weight: 5 },
  { from: 1890, weight: 2 },
  { from: 1850, weight: 1.2 },
  { from: 1800, weight: 1 },
  { from: 1700, weight: 0.9 },
  { from: 1600, weight: 0.8 },
  { from: 1500, weight: 0.7 },
  { from: 1400, weight: 0.6 },
  { from: 1300, weight: 0.5 },
  { from: 1200, weight: 0.4 },
  { from: 1100, weight: 0.3 },
];

/** Weight for pairs older than the last era bound */
export const OLDEST_ERA_WEIGHT = 0.2;

// ============================================
// EXTRACTION
// ============================================

/**
 * Month names in calendar order. Any prefix of at least
 * MIN_MONTH_PREFIX_LENGTH letters that matches exactly one name is accepted.
 */
export const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

export const MIN_MONTH_PREFIX_LENGTH = 3;

/**
 * Default pivot for two-digit years in fully numeric dates.
 * 24 -> 2024, 30 -> 2030, 31 -> 1931 (with a reference year in the 2000s).
 */
export const DEFAULT_CENTURY_PIVOT = 30;

/** Marker printed in place of an unknown field */
export const ABSENT_MARKER = 'None';

// ============================================
// RANKING
// ============================================

/**
 * Candidates must share at least this many known fields with the target
 * to be ranked. Scores of dates with nothing in common are always 0.
 */
export const DEFAULT_MIN_SHARED_FIELDS = 1;
