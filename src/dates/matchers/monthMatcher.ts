import { MIN_MONTH_PREFIX_LENGTH, MONTH_NAMES } from '../constants';
import { pickUnambiguous } from './tokenize';
import type { FieldMatch, Token } from './types';

/**
 * Resolves a lower-case word to a month number.
 * The word must be a prefix of exactly one month name and at least
 * three letters long ("sep", "sept", "september", but not "ju").
 *
 * @example
 * monthFromWord("octo") // Returns: 10
 * monthFromWord("ma")   // Returns: undefined
 */
export function monthFromWord(word: string): number | undefined {
  if (word.length < MIN_MONTH_PREFIX_LENGTH) {
    return undefined;
  }

  const matches = MONTH_NAMES.flatMap((name, index) => (name.startsWith(word) ? [index + 1] : []));
  return matches.length === 1 ? matches[0] : undefined;
}

/**
 * Finds a month name in free text. Several different month names make
 * the month unknown.
 */
export function matchMonthName(tokens: readonly Token[]): FieldMatch | undefined {
  const candidates: FieldMatch[] = [];

  for (const token of tokens) {
    if (token.kind !== 'word') continue;
    const month = monthFromWord(token.text);
    if (month !== undefined) {
      candidates.push({ value: month, tokenIndex: token.index });
    }
  }

  return pickUnambiguous(candidates);
}

export default matchMonthName;
