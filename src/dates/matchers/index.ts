export { normalizeText, tokenize, pickUnambiguous, isNumberToken } from './tokenize';
export { matchNumericTriple, expandTwoDigitYear } from './numericTriple';
export { matchYear } from './yearMatcher';
export { matchMonthName, monthFromWord } from './monthMatcher';
export { matchDay } from './dayMatcher';
export { matchNumericMonth } from './numericMonthMatcher';

export type {
  Token,
  WordToken,
  NumberToken,
  FieldMatch,
  ResolvedExtractOptions,
} from './types';
