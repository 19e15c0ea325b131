/**
 * Tests for partial date similarity scoring
 */

import { PartialDate } from '../../src/dates/partialDate';
import { generateExplanation, scoreBreakdown, scoreDates } from '../../src/dates/scoreDates';

describe('scoreDates', () => {
  it('should score a known day against an unknown day as neutral', () => {
    const score = scoreDates(
      new PartialDate({ day: 21, month: 9, year: 1900 }),
      new PartialDate({ month: 9, year: 1902 })
    );

    expect(score).toBe(20);
  });

  it('should be symmetric', () => {
    const a = new PartialDate({ day: 3, month: 4, year: 1851 });
    const b = new PartialDate({ day: 7, month: 2, year: 1856 });

    expect(scoreDates(a, b)).toBe(scoreDates(b, a));
  });

  it('should give identical dates the maximum for their known fields', () => {
    expect(scoreDates(new PartialDate({ day: 15, month: 6, year: 1985 }), new PartialDate({ day: 15, month: 6, year: 1985 }))).toBe(30);
    expect(scoreDates(new PartialDate({ month: 6 }), new PartialDate({ month: 6 }))).toBe(5);
  });

  it('should score no shared fields as zero', () => {
    expect(scoreDates(new PartialDate({ day: 1 }), new PartialDate({ year: 1900 }))).toBe(0);
    expect(scoreDates(PartialDate.empty(), PartialDate.empty())).toBe(0);
  });

  it('should decrease as the day gap grows', () => {
    const target = new PartialDate({ day: 1, month: 5 });
    let previous = scoreDates(target, target);

    for (let day = 2; day <= 31; day++) {
      const score = scoreDates(target, new PartialDate({ day, month: 5 }));
      expect(score).toBeLessThan(previous);
      previous = score;
    }
  });

  it('should forgive year gaps more in older eras', () => {
    const recent = scoreDates(new PartialDate({ year: 1985 }), new PartialDate({ year: 1987 }));
    const early = scoreDates(new PartialDate({ year: 1900 }), new PartialDate({ year: 1902 }));
    const old = scoreDates(new PartialDate({ year: 1650 }), new PartialDate({ year: 1652 }));

    expect(recent).toBe(0);
    expect(early).toBe(15);
    expect(old).toBeCloseTo(19.2);
  });

  it('should go negative for far-apart values', () => {
    expect(scoreDates(new PartialDate({ month: 1 }), new PartialDate({ month: 12 }))).toBe(-17);
  });
});

describe('scoreBreakdown', () => {
  it('should report each field', () => {
    const breakdown = scoreBreakdown(
      new PartialDate({ day: 21, month: 9, year: 1900 }),
      new PartialDate({ month: 9, year: 1902 })
    );

    expect(breakdown.day).toEqual({
      field: 'day',
      left: 21,
      right: undefined,
      compared: false,
      penalty: 0,
      contribution: 0,
    });
    expect(breakdown.month).toMatchObject({ compared: true, penalty: 0, contribution: 5 });
    expect(breakdown.year).toMatchObject({ left: 1900, right: 1902, penalty: 5, contribution: 15 });
    expect(breakdown.total).toBe(20);
  });
});

describe('generateExplanation', () => {
  it('should describe every field and the total', () => {
    const breakdown = scoreBreakdown(
      new PartialDate({ day: 21, month: 9, year: 1900 }),
      new PartialDate({ month: 9, year: 1902 })
    );

    expect(generateExplanation(breakdown)).toBe(
      'Day: not compared (unknown in one or both dates). ' +
        'Month: 9 = 9 → +5. ' +
        'Year: 1900 vs 1902 → +15 (penalty 5). ' +
        'Total score: 20'
    );
  });

  it('should show negative contributions with their sign', () => {
    const breakdown = scoreBreakdown(new PartialDate({ day: 1 }), new PartialDate({ day: 10 }));

    expect(generateExplanation(breakdown)).toBe(
      'Day: 1 vs 10 → -8.5 (penalty 13.5). ' +
        'Month: not compared (unknown in one or both dates). ' +
        'Year: not compared (unknown in one or both dates). ' +
        'Total score: -8.5'
    );
  });

  it('should round long fractions to two decimals', () => {
    const breakdown = scoreBreakdown(new PartialDate({ year: 1900 }), new PartialDate({ year: 1901 }));

    expect(generateExplanation(breakdown)).toContain('Year: 1900 vs 1901 → +16.85 (penalty 3.15)');
  });
});
