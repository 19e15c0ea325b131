/**
 * Tests for the PartialDate value type
 */

import { PartialDate, sharedFields } from '../../src/dates/partialDate';
import { DateError } from '../../src/utils/DateError';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('PartialDate', () => {
  describe('construction', () => {
    it('should keep every provided field', () => {
      const date = new PartialDate({ day: 21, month: 9, year: 1900 });

      expect(date.day).toBe(21);
      expect(date.month).toBe(9);
      expect(date.year).toBe(1900);
    });

    it('should treat missing, undefined and null fields as unknown', () => {
      const date = new PartialDate({ day: undefined, month: null });

      expect(date.day).toBeUndefined();
      expect(date.month).toBeUndefined();
      expect(date.year).toBeUndefined();
      expect(date.isEmpty()).toBe(true);
    });

    it('should accept field boundaries', () => {
      expect(() => new PartialDate({ day: 1, month: 1 })).not.toThrow();
      expect(() => new PartialDate({ day: 31, month: 12 })).not.toThrow();
    });

    it('should accept negative and very old years', () => {
      expect(new PartialDate({ year: -1100 }).year).toBe(-1100);
      expect(new PartialDate({ year: 32 }).year).toBe(32);
    });

    it('should accept impossible calendar combinations', () => {
      const date = new PartialDate({ day: 31, month: 2 });

      expect(date.day).toBe(31);
      expect(date.month).toBe(2);
    });

    it('should be frozen', () => {
      const date = new PartialDate({ day: 5 });

      expect(Object.isFrozen(date)).toBe(true);
    });
  });

  describe('validation', () => {
    it.each([0, 32, -1])('should reject day %p', (day) => {
      expect(() => new PartialDate({ day })).toThrow(DateError);
    });

    it.each([0, 13])('should reject month %p', (month) => {
      expect(() => new PartialDate({ month })).toThrow(DateError);
    });

    it('should reject non-integer values', () => {
      expect(() => new PartialDate({ day: 1.5 })).toThrow(DateError);
      expect(() => new PartialDate({ year: 1900.5 })).toThrow(DateError);
      expect(() => new PartialDate({ year: Number.NaN })).toThrow(DateError);
    });

    it('should report the field and code', () => {
      const error = captureError(() => new PartialDate({ month: 13 }));

      expect(error).toBeInstanceOf(DateError);
      expect(error).toMatchObject({
        code: 'INVALID_FIELD',
        message: 'Invalid month: 13 (expected an integer between 1 and 12)',
        details: { field: 'month', value: 13, range: { min: 1, max: 12 } },
      });
    });

    it('should describe an invalid year without a range', () => {
      expect(() => new PartialDate({ year: 1.5 })).toThrow(
        'Invalid year: 1.5 (expected a safe integer)'
      );
    });
  });

  describe('helpers', () => {
    it('should list present fields in day, month, year order', () => {
      expect(new PartialDate({ year: 1900, day: 3 }).presentFields()).toEqual(['day', 'year']);
      expect(PartialDate.empty().presentFields()).toEqual([]);
    });

    it('should read fields by name', () => {
      const date = new PartialDate({ month: 4 });

      expect(date.get('month')).toBe(4);
      expect(date.get('day')).toBeUndefined();
      expect(date.has('month')).toBe(true);
      expect(date.has('year')).toBe(false);
    });

    it('should serialise only known fields', () => {
      expect(new PartialDate({ month: 9, year: 1902 }).toJSON()).toEqual({ month: 9, year: 1902 });
      expect(JSON.stringify(new PartialDate({ day: 2 }))).toBe('{"day":2}');
    });

    it('should render with the display formatter', () => {
      expect(new PartialDate({ day: 6, month: 8, year: 2024 }).toString()).toBe('2024-8-6');
      expect(`${new PartialDate({ month: 8 })}`).toBe('None-8');
    });
  });

  describe('equals', () => {
    it('should compare field by field', () => {
      const a = new PartialDate({ day: 21, month: 9 });

      expect(a.equals(new PartialDate({ day: 21, month: 9 }))).toBe(true);
      expect(a.equals(new PartialDate({ day: 21, month: 9, year: 1900 }))).toBe(false);
      expect(a.equals(new PartialDate({ day: 22, month: 9 }))).toBe(false);
    });

    it('should treat two empty dates as equal', () => {
      expect(PartialDate.empty().equals(new PartialDate())).toBe(true);
    });
  });

  describe('sharedFields', () => {
    it('should list fields known in both dates', () => {
      const a = new PartialDate({ day: 21, month: 9, year: 1900 });
      const b = new PartialDate({ month: 9, year: 1902 });

      expect(sharedFields(a, b)).toEqual(['month', 'year']);
      expect(sharedFields(a, PartialDate.empty())).toEqual([]);
    });
  });
});
