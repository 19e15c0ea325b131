/**
 * Tests for ranking candidate records against a target date
 */

import { PartialDate } from '../../src/dates/partialDate';
import { rankCandidates } from '../../src/dates/rankCandidates';
import type { DateCandidate } from '../../src/dates/types';

describe('rankCandidates', () => {
  const target = new PartialDate({ day: 21, month: 9, year: 1900 });

  const candidates: DateCandidate[] = [
    { id: 'census', date: new PartialDate({ month: 9, year: 1902 }) },
    { id: 'baptism', date: new PartialDate({ day: 21, month: 9, year: 1900 }) },
    { id: 'unknown', date: PartialDate.empty() },
    { id: 'letter', date: new PartialDate({ day: 1 }) },
  ];

  it('should order candidates best first and drop those sharing nothing', () => {
    const ranked = rankCandidates(target, candidates);

    expect(ranked.map((c) => c.id)).toEqual(['baptism', 'census', 'letter']);
    expect(ranked.map((c) => c.score)).toEqual([30, 20, -25]);
  });

  it('should report shared fields and the breakdown', () => {
    const [, census] = rankCandidates(target, candidates);

    expect(census.sharedFields).toEqual(['month', 'year']);
    expect(census.breakdown.year.penalty).toBe(5);
    expect(census.date).toBe(candidates[0].date);
  });

  it('should apply a stricter shared-field minimum', () => {
    const ranked = rankCandidates(target, candidates, { minSharedFields: 2 });

    expect(ranked.map((c) => c.id)).toEqual(['baptism', 'census']);
  });

  it('should keep zero-overlap candidates when the minimum is zero', () => {
    const ranked = rankCandidates(target, candidates, { minSharedFields: 0 });

    expect(ranked.map((c) => c.id)).toEqual(['baptism', 'census', 'unknown', 'letter']);
  });

  it('should limit the result', () => {
    expect(rankCandidates(target, candidates, { limit: 1 }).map((c) => c.id)).toEqual(['baptism']);
    expect(rankCandidates(target, candidates, { limit: 0 })).toEqual([]);
  });

  it('should keep input order for equal scores', () => {
    const ranked = rankCandidates(new PartialDate({ month: 5 }), [
      { id: 'first', date: new PartialDate({ month: 6 }) },
      { id: 'second', date: new PartialDate({ month: 4, year: 1700 }) },
    ]);

    expect(ranked.map((c) => c.id)).toEqual(['first', 'second']);
  });

  it('should return an empty list without candidates', () => {
    expect(rankCandidates(target, [])).toEqual([]);
  });
});
