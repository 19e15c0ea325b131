/**
 * Candidate ranking for record matching.
 *
 * Scores every candidate record against a target date and returns them
 * best first. Candidates that share too few known fields with the target
 * are dropped, since a score of 0 from "nothing in common" would otherwise
 * rank alongside genuine matches.
 */

import { DEFAULT_MIN_SHARED_FIELDS } from './constants';
import { sharedFields } from './partialDate';
import { scoreBreakdown } from './scoreDates';
import type { DateCandidate, DateParts, RankOptions, RankedCandidate } from './types';

/**
 * Ranks candidates by similarity to the target.
 *
 * Sorting is stable: equal scores keep their input order.
 *
 * @example
 * rankCandidates(target, [
 *   { id: 'census-1900', date: extractDate('Sep 1900') },
 *   { id: 'parish', date: extractDate('21st Sep 1901') },
 * ])
 * // Returns: [{ id: 'parish', score: ... }, { id: 'census-1900', score: ... }]
 */
export function rankCandidates(
  target: DateParts,
  candidates: readonly DateCandidate[],
  options: RankOptions = {}
): RankedCandidate[] {
  const minSharedFields = options.minSharedFields ?? DEFAULT_MIN_SHARED_FIELDS;

  const ranked = candidates
    .map((candidate) => {
      const breakdown = scoreBreakdown(target, candidate.date);
      return {
        ...candidate,
        score: breakdown.total,
        sharedFields: sharedFields(target, candidate.date),
        breakdown,
      };
    })
    .filter((candidate) => candidate.sharedFields.length >= minSharedFields)
    .sort((a, b) => b.score - a.score);

  return options.limit === undefined ? ranked : ranked.slice(0, Math.max(0, options.limit));
}

export default rankCandidates;
