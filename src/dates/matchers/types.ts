/**
 * Internal types for the extraction matchers.
 */

interface BaseToken {
  /** Position in the token list */
  index: number;
  /** Raw text between the previous token and this one */
  gap: string;
}

export interface WordToken extends BaseToken {
  kind: 'word';
  text: string;
}

export interface NumberToken extends BaseToken {
  kind: 'number';
  /** Number of digits as written, leading zeros included */
  digits: number;
  /** Signed value */
  value: number;
  /** Written with an ordinal suffix (1st, 22nd, 3rd, 4th) */
  ordinal: boolean;
  negative: boolean;
}

export type Token = WordToken | NumberToken;

/**
 * A field value found by a matcher, with the token it came from.
 */
export interface FieldMatch {
  value: number;
  tokenIndex: number;
}

/**
 * Options every matcher needs resolved to concrete numbers.
 */
export interface ResolvedExtractOptions {
  centuryPivot: number;
  referenceYear: number;
}
