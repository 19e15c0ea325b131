/**
 * Free-text Date Extraction
 *
 * Turns noisy text into a PartialDate. Each field is found by its own
 * matcher, so text that only mentions a month still yields that month.
 *
 * Flow:
 * 1. Normalise (fold accents, lower-case)
 * 2. Fully numeric triple ("21/09/1900") → done
 * 3. Tokenise, then find year, month name, day and numeric month
 * 4. Build the PartialDate from whatever was found
 *
 * Never throws: garbage in, empty date out.
 */

import { env } from '../config';
import {
  matchDay,
  matchMonthName,
  matchNumericMonth,
  matchNumericTriple,
  matchYear,
  normalizeText,
  tokenize,
} from './matchers';
import type { ResolvedExtractOptions } from './matchers';
import { PartialDate } from './partialDate';
import type { ExtractOptions } from './types';

function resolveOptions(options: ExtractOptions): ResolvedExtractOptions {
  return {
    centuryPivot: options.centuryPivot ?? env.DATE_CENTURY_PIVOT,
    referenceYear: options.referenceYear ?? env.DATE_REFERENCE_YEAR,
  };
}

/**
 * Extracts whatever day, month and year the text contains.
 *
 * @param text - Free text, or null/undefined for "nothing known"
 * @param options - Century pivot overrides for two-digit years
 *
 * @example
 * extractDate("Do you remember the 21st night of sep?") // day 21, month 9
 * extractDate("22 September 2024")                     // 2024-9-22
 * extractDate("06/08/24")                              // 2024-8-6
 * extractDate("no date here")                          // empty
 */
export function extractDate(
  text: string | null | undefined,
  options: ExtractOptions = {}
): PartialDate {
  if (!text || typeof text !== 'string') {
    return PartialDate.empty();
  }

  const normalized = normalizeText(text);

  // Fully numeric dates take priority over free-text scanning
  const numeric = matchNumericTriple(normalized, resolveOptions(options));
  if (numeric) {
    return new PartialDate(numeric);
  }

  const tokens = tokenize(normalized);
  const year = matchYear(tokens);
  const month = matchMonthName(tokens);
  const day = matchDay(tokens, month, year);
  const numericMonth = month ? undefined : matchNumericMonth(tokens, day, year);

  return new PartialDate({
    day: day?.value,
    month: (month ?? numericMonth)?.value,
    year: year?.value,
  });
}

export default extractDate;
