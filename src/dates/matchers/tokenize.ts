/**
 * Text normalisation and tokenisation for date extraction.
 *
 * Example:
 * - "Né le 21st Sept., 1900" → normalised "ne le 21st sept., 1900"
 *   → tokens [ne] [le] [21 ordinal] [sept] [1900]
 */

import type { FieldMatch, NumberToken, Token } from './types';

/**
 * Words, or digit runs with an optional ordinal suffix attached directly.
 * "21st" is one ordinal token; "21sta" is the number 21 and the word "sta".
 */
const TOKEN_PATTERN = /(\d+)(?:(st|nd|rd|th)(?![a-z]))?|[a-z]+/g;

/**
 * Folds accented letters to ASCII and lower-cases the text.
 *
 * @example
 * normalizeText("Févr. 1850") // Returns: "fevr. 1850"
 */
export function normalizeText(text: string): string {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase();
}

/**
 * Splits normalised text into word and number tokens.
 *
 * A number preceded by "-" at the start of the text or after whitespace is
 * negative ("-1100"); a dash between two numbers is a delimiter ("21-9").
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let lastEnd = 0;

  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    const gap = text.slice(lastEnd, start);
    lastEnd = start + match[0].length;
    const index = tokens.length;

    const digits = match[1];
    if (digits === undefined) {
      tokens.push({ kind: 'word', index, gap, text: match[0] });
      continue;
    }

    const ordinal = match[2] !== undefined;
    const magnitude = parseInt(digits, 10);
    const signed =
      gap.endsWith('-') && (start === 1 || /\s/.test(text.charAt(start - 2)));
    const negative = signed && !ordinal && magnitude > 0;

    tokens.push({
      kind: 'number',
      index,
      gap,
      digits: digits.length,
      value: negative ? -magnitude : magnitude,
      ordinal,
      negative,
    });
  }

  return tokens;
}

export function isNumberToken(token: Token | undefined): token is NumberToken {
  return token !== undefined && token.kind === 'number';
}

/**
 * Returns the first match when every candidate agrees on the value,
 * undefined when there are none or they disagree.
 */
export function pickUnambiguous(candidates: readonly FieldMatch[]): FieldMatch | undefined {
  const [first] = candidates;
  if (first === undefined) {
    return undefined;
  }
  return candidates.every((candidate) => candidate.value === first.value) ? first : undefined;
}
