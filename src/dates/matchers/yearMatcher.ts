import { pickUnambiguous } from './tokenize';
import type { FieldMatch, Token } from './types';

/**
 * Finds the year in free text.
 *
 * Four-digit numbers (signed or not) are the year candidates. A negative
 * number of another length ("-44", "-12000") is only read as a year when
 * the text has no four-digit number at all. Other unsigned numbers are
 * never years here; centuries are not guessed.
 *
 * @example
 * matchYear(tokenize("sep 21 1234"))          // { value: 1234, tokenIndex: 2 }
 * matchYear(tokenize("born 1850 or 1851"))    // undefined (ambiguous)
 * matchYear(tokenize("-1100"))                // { value: -1100, tokenIndex: 0 }
 * matchYear(tokenize("may 1850 aged -2"))     // { value: 1850, tokenIndex: 1 }
 */
export function matchYear(tokens: readonly Token[]): FieldMatch | undefined {
  const fourDigit: FieldMatch[] = [];
  const otherSigned: FieldMatch[] = [];

  for (const token of tokens) {
    if (token.kind !== 'number' || token.ordinal) continue;
    if (!Number.isSafeInteger(token.value)) continue;

    const candidate = { value: token.value, tokenIndex: token.index };
    if (token.digits === 4) {
      fourDigit.push(candidate);
    } else if (token.negative) {
      otherSigned.push(candidate);
    }
  }

  return pickUnambiguous(fourDigit.length > 0 ? fourDigit : otherSigned);
}

export default matchYear;
