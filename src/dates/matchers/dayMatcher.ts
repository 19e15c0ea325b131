import { FIELD_RANGES } from '../constants';
import { isNumberToken, pickUnambiguous } from './tokenize';
import type { FieldMatch, NumberToken, Token } from './types';

function isDayValue(token: NumberToken): boolean {
  return (
    !token.negative &&
    token.digits <= 2 &&
    token.value >= FIELD_RANGES.day.min &&
    token.value <= FIELD_RANGES.day.max
  );
}

/**
 * Finds the day in free text.
 *
 * 1. Ordinals win: "the 21st", "22nd". Different ordinal days → unknown.
 * 2. Otherwise a bare 1-2 digit number right next to the month name:
 *    "6 August", "Aug 6". With numbers on both sides the one before the
 *    month is the day ("06-Aug-24" → 6).
 *
 * Numbers outside 1-31 are never days.
 */
export function matchDay(
  tokens: readonly Token[],
  month: FieldMatch | undefined,
  year: FieldMatch | undefined
): FieldMatch | undefined {
  const ordinals = tokens
    .filter(isNumberToken)
    .filter((token) => token.ordinal && isDayValue(token))
    .map((token) => ({ value: token.value, tokenIndex: token.index }));

  if (ordinals.length > 0) {
    return pickUnambiguous(ordinals);
  }

  if (!month) {
    return undefined;
  }

  const neighbours = [tokens[month.tokenIndex - 1], tokens[month.tokenIndex + 1]];
  for (const token of neighbours) {
    if (!isNumberToken(token) || token.ordinal) continue;
    if (token.index === year?.tokenIndex) continue;
    if (isDayValue(token)) {
      return { value: token.value, tokenIndex: token.index };
    }
  }

  return undefined;
}

export default matchDay;
