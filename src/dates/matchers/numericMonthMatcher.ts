import { FIELD_RANGES } from '../constants';
import { isNumberToken, pickUnambiguous } from './tokenize';
import type { FieldMatch, Token } from './types';

const DATE_DELIMITER = /^[/.-]$/;

/**
 * Finds a month written as a number, only used when no month name exists.
 *
 * The number must be 1-12, not already the day or year, and sit either
 * directly next to the day ("the 3rd 5 2001") or joined to the year by a
 * date delimiter ("12/1900", "1900-12").
 */
export function matchNumericMonth(
  tokens: readonly Token[],
  day: FieldMatch | undefined,
  year: FieldMatch | undefined
): FieldMatch | undefined {
  const neighbourIndices = new Set<number>();

  if (day) {
    neighbourIndices.add(day.tokenIndex - 1);
    neighbourIndices.add(day.tokenIndex + 1);
  }

  if (year) {
    const yearToken = tokens[year.tokenIndex];
    const after = tokens[year.tokenIndex + 1];
    if (yearToken && DATE_DELIMITER.test(yearToken.gap)) {
      neighbourIndices.add(year.tokenIndex - 1);
    }
    if (after && DATE_DELIMITER.test(after.gap)) {
      neighbourIndices.add(year.tokenIndex + 1);
    }
  }

  const candidates: FieldMatch[] = [];
  for (const index of [...neighbourIndices].sort((a, b) => a - b)) {
    const token = tokens[index];
    if (!isNumberToken(token) || token.ordinal || token.negative) continue;
    if (index === day?.tokenIndex || index === year?.tokenIndex) continue;
    if (token.digits > 2) continue;
    if (token.value < FIELD_RANGES.month.min || token.value > FIELD_RANGES.month.max) continue;

    candidates.push({ value: token.value, tokenIndex: index });
  }

  return pickUnambiguous(candidates);
}

export default matchNumericMonth;
