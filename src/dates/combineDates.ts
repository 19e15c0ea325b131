/**
 * Reconciliation of Candidate Dates
 *
 * Several records often describe the same event with slightly different
 * dates. Each field is reconciled on its own:
 *
 * 1. No known values → unknown
 * 2. One known value → that value
 * 3. Several → the value with the smallest summed penalty against every
 *    other known value (same penalty the scorer uses), so near misses pull
 *    toward a compromise instead of needing exact duplicates.
 *    Ties: most frequent value, then earliest occurrence.
 *
 * The result is not checked as a calendar date (31 February is allowed).
 * Cost is quadratic in the number of candidates per field.
 */

import { DateError } from '../utils/DateError';
import { fieldPenalty } from './fieldDistance';
import { PartialDate } from './partialDate';
import type { DateField, DateParts } from './types';

/** Relative tolerance for comparing summed penalties */
const PENALTY_EPSILON = 1e-9;

function samePenalty(a: number, b: number): boolean {
  return Math.abs(a - b) <= PENALTY_EPSILON * Math.max(1, Math.abs(a), Math.abs(b));
}

interface ConsensusCandidate {
  value: number;
  count: number;
  totalPenalty: number;
}

/**
 * Picks the consensus value for one field.
 *
 * @param field - Which field the values belong to (selects the penalty)
 * @param values - Values in input order, undefined where unknown
 * @returns The consensus value, or undefined if none is known
 *
 * @example
 * chooseConsensusValue('day', [21, 22, 21])        // Returns: 21
 * chooseConsensusValue('day', [1, 10, 12])         // Returns: 10 (median-like compromise)
 * chooseConsensusValue('month', [undefined, 9])    // Returns: 9
 */
export function chooseConsensusValue(
  field: DateField,
  values: ReadonlyArray<number | undefined>
): number | undefined {
  const known = values.filter((value): value is number => value !== undefined);

  if (known.length <= 1) {
    return known[0];
  }

  // Map keeps first-occurrence order, which settles the final tie-break
  const counts = new Map<number, number>();
  for (const value of known) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: ConsensusCandidate | undefined;
  for (const [value, count] of counts) {
    const totalPenalty = known.reduce((sum, other) => sum + fieldPenalty(field, value, other), 0);

    // Year penalties are float sums; equal totals may differ in the last bit
    const tied = best !== undefined && samePenalty(totalPenalty, best.totalPenalty);

    if (
      !best ||
      (!tied && totalPenalty < best.totalPenalty) ||
      (tied && count > best.count)
    ) {
      best = { value, count, totalPenalty };
    }
  }

  return best?.value;
}

/**
 * Combines candidate dates for one event into the best estimate.
 *
 * @param dates - Candidate dates in input order (must not be empty)
 * @returns A new PartialDate holding the per-field consensus
 * @throws DateError with code INVALID_INPUT when `dates` is empty
 *
 * @example
 * combineDates([
 *   new PartialDate({ day: 21, month: 9 }),
 *   new PartialDate({ day: 22, month: 9, year: 2024 }),
 *   new PartialDate({ day: 21, month: 10 }),
 * ]) // Returns: 2024-9-21
 */
export function combineDates(dates: readonly DateParts[]): PartialDate {
  if (!dates || dates.length === 0) {
    throw DateError.invalidInput('Cannot combine an empty list of dates');
  }

  const consensus = (field: DateField): number | undefined =>
    chooseConsensusValue(field, dates.map((date) => date[field]));

  return new PartialDate({
    day: consensus('day'),
    month: consensus('month'),
    year: consensus('year'),
  });
}

export default combineDates;
