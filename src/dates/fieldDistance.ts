/**
 * Per-field distance policy.
 *
 * The one place that decides how far apart two day, month or year values
 * are. The scorer turns penalties into contributions; the reconciler sums
 * them to pick a consensus value.
 *
 * - day:   1.5 per day, linear
 * - month: 2 per month, linear (no December/January wrap)
 * - year:  eraWeight(average year) * log3(1 + gap)
 */

import {
  DAY_SCORING,
  MONTH_SCORING,
  OLDEST_ERA_WEIGHT,
  YEAR_ERA_WEIGHTS,
  YEAR_SCORING,
} from './constants';
import type { DateField } from './types';

/**
 * Weight of a year gap for a pair whose average year is given.
 *
 * @example
 * eraWeight(1985) // Returns: 20
 * eraWeight(1901) // Returns: 5
 * eraWeight(1650) // Returns: 0.8
 */
export function eraWeight(averageYear: number): number {
  const era = YEAR_ERA_WEIGHTS.find(({ from }) => averageYear >= from);
  return era ? era.weight : OLDEST_ERA_WEIGHT;
}

/**
 * Penalty for two known values of one field. Symmetric, 0 for equal values.
 *
 * @example
 * fieldPenalty('day', 21, 22)       // Returns: 1.5
 * fieldPenalty('month', 9, 12)      // Returns: 6
 * fieldPenalty('year', 1900, 1902)  // Returns: 5 (era weight 5 * log3(3))
 */
export function fieldPenalty(field: DateField, a: number, b: number): number {
  const gap = Math.abs(a - b);

  switch (field) {
    case 'day':
      return DAY_SCORING.PENALTY_PER_DAY * gap;
    case 'month':
      return MONTH_SCORING.PENALTY_PER_MONTH * gap;
    case 'year':
      return eraWeight((a + b) / 2) * (Math.log(1 + gap) / Math.log(YEAR_SCORING.LOG_BASE));
  }
}

/**
 * Score for an exact match of the field.
 */
export function fieldMatchScore(field: DateField): number {
  switch (field) {
    case 'day':
      return DAY_SCORING.MATCH_SCORE;
    case 'month':
      return MONTH_SCORING.MATCH_SCORE;
    case 'year':
      return YEAR_SCORING.MATCH_SCORE;
  }
}

/**
 * Signed contribution of one field to a similarity score.
 * Returns 0 when either value is unknown: missing knowledge is not disagreement.
 */
export function fieldContribution(
  field: DateField,
  a: number | undefined,
  b: number | undefined
): number {
  if (a === undefined || b === undefined) {
    return 0;
  }
  return fieldMatchScore(field) - fieldPenalty(field, a, b);
}
