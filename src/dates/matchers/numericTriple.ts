/**
 * Fully numeric dates: three digit groups joined by one delimiter.
 *
 * Field order:
 * - first group has 3+ digits or exceeds 31 → year-month-day ("1900-09-21", "99-12-3")
 * - otherwise → day-month-year ("21/09/1900", "06.08.24")
 *
 * A group that is out of range for its slot is left unknown; no swap is
 * attempted ("21/13/1900" has no month).
 *
 * Eight undelimited digits are read as year-month-day ("20240806") only when
 * month and day are both in range.
 */

import { FIELD_RANGES } from '../constants';
import type { PartialDateInput } from '../types';
import type { ResolvedExtractOptions } from './types';

/**
 * Same delimiter on both sides (backreference), no digit touching the ends.
 */
const NUMERIC_TRIPLE_PATTERN = /(?<!\d)(\d{1,4})([/.-]|\s+)(\d{1,2})\2(\d{1,4})(?!\d)/g;

const COMPACT_DATE_PATTERN = /(?<!\d)(\d{4})(\d{2})(\d{2})(?!\d)/g;

function inRange(value: number, range: { min: number; max: number }): boolean {
  return value >= range.min && value <= range.max;
}

function toDay(group: string): number | undefined {
  const value = parseInt(group, 10);
  return inRange(value, FIELD_RANGES.day) ? value : undefined;
}

function toMonth(group: string): number | undefined {
  const value = parseInt(group, 10);
  return inRange(value, FIELD_RANGES.month) ? value : undefined;
}

/**
 * Expands a two-digit year around the century pivot.
 *
 * @example
 * // referenceYear 2026, pivot 30
 * expandTwoDigitYear(24, options) // Returns: 2024
 * expandTwoDigitYear(30, options) // Returns: 2030
 * expandTwoDigitYear(99, options) // Returns: 1999
 */
export function expandTwoDigitYear(value: number, options: ResolvedExtractOptions): number {
  const century = Math.floor(options.referenceYear / 100) * 100;
  return value > options.centuryPivot ? century - 100 + value : century + value;
}

function toYear(group: string, options: ResolvedExtractOptions): number {
  const value = parseInt(group, 10);
  return group.length === 2 ? expandTwoDigitYear(value, options) : value;
}

/**
 * Finds the first numeric triple in normalised text.
 *
 * Whitespace-delimited triples only count when one group has four digits,
 * so runs of small numbers in prose are not read as dates.
 *
 * @returns The fields the triple determines, or undefined when there is none
 */
export function matchNumericTriple(
  text: string,
  options: ResolvedExtractOptions
): PartialDateInput | undefined {
  for (const match of text.matchAll(NUMERIC_TRIPLE_PATTERN)) {
    const [, first, delimiter, middle, last] = match;

    if (/\s/.test(delimiter) && first.length !== 4 && last.length !== 4) {
      continue;
    }

    const yearFirst = first.length >= 3 || parseInt(first, 10) > FIELD_RANGES.day.max;

    if (yearFirst) {
      return {
        year: toYear(first, options),
        month: toMonth(middle),
        day: toDay(last),
      };
    }

    return {
      day: toDay(first),
      month: toMonth(middle),
      year: toYear(last, options),
    };
  }

  for (const match of text.matchAll(COMPACT_DATE_PATTERN)) {
    const [, year, month, day] = match;
    const parsedMonth = toMonth(month);
    const parsedDay = toDay(day);

    if (parsedMonth !== undefined && parsedDay !== undefined) {
      return { year: parseInt(year, 10), month: parsedMonth, day: parsedDay };
    }
  }

  return undefined;
}
