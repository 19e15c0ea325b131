/**
 * Similarity Scoring for Partial Dates
 *
 * score = day contribution + month contribution + year contribution
 *
 * Each contribution is the field's match score minus its distance penalty,
 * or 0 when either date does not know the field. Higher is closer; the
 * score is symmetric and identical dates score the maximum for their known
 * fields.
 *
 * Two dates with nothing in common score 0. Callers that need a
 * "no shared information" guard must check shared fields themselves
 * (see rankCandidates).
 */

import { fieldContribution, fieldPenalty } from './fieldDistance';
import type { DateField, DateParts, FieldComparison, ScoreBreakdown } from './types';

function compareField(field: DateField, a: DateParts, b: DateParts): FieldComparison {
  const left = a[field];
  const right = b[field];

  if (left === undefined || right === undefined) {
    return { field, left, right, compared: false, penalty: 0, contribution: 0 };
  }

  return {
    field,
    left,
    right,
    compared: true,
    penalty: fieldPenalty(field, left, right),
    contribution: fieldContribution(field, left, right),
  };
}

/**
 * Compares two partial dates field by field.
 *
 * @example
 * scoreBreakdown(
 *   new PartialDate({ day: 21, month: 9, year: 1900 }),
 *   new PartialDate({ month: 9, year: 1902 })
 * )
 * // Returns: { day: { compared: false, ... }, month: { contribution: 5, ... },
 * //            year: { penalty: 5, contribution: 15, ... }, total: 20 }
 */
export function scoreBreakdown(a: DateParts, b: DateParts): ScoreBreakdown {
  const day = compareField('day', a, b);
  const month = compareField('month', a, b);
  const year = compareField('year', a, b);

  return {
    day,
    month,
    year,
    total: day.contribution + month.contribution + year.contribution,
  };
}

/**
 * Similarity score of two partial dates.
 *
 * @example
 * scoreDates(
 *   new PartialDate({ day: 21, month: 9, year: 1900 }),
 *   new PartialDate({ month: 9, year: 1902 })
 * ) // Returns: 20
 */
export function scoreDates(a: DateParts, b: DateParts): number {
  return scoreBreakdown(a, b).total;
}

const FIELD_LABELS: Record<DateField, string> = {
  day: 'Day',
  month: 'Month',
  year: 'Year',
};

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

function describeField(comparison: FieldComparison): string {
  const label = FIELD_LABELS[comparison.field];

  if (!comparison.compared) {
    return `${label}: not compared (unknown in one or both dates)`;
  }

  const contribution = round(comparison.contribution);
  const signed = contribution >= 0 ? `+${contribution}` : `${contribution}`;

  return comparison.penalty === 0
    ? `${label}: ${comparison.left} = ${comparison.right} → ${signed}`
    : `${label}: ${comparison.left} vs ${comparison.right} → ${signed} (penalty ${round(comparison.penalty)})`;
}

/**
 * Generates a human-readable explanation of a score.
 *
 * @example
 * generateExplanation(scoreBreakdown(a, b))
 * // "Day: not compared (unknown in one or both dates). Month: 9 = 9 → +5.
 * //  Year: 1900 vs 1902 → +15 (penalty 5). Total score: 20"
 */
export function generateExplanation(breakdown: ScoreBreakdown): string {
  const parts = [breakdown.day, breakdown.month, breakdown.year].map(describeField);
  parts.push(`Total score: ${round(breakdown.total)}`);
  return parts.join('. ');
}

export default scoreDates;
