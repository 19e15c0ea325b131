/**
 * PartialDate value type
 *
 * Holds an optional day, month and year. Values are validated once, here;
 * the scorer and reconciler trust them afterwards.
 */

import { DateError } from '../utils/DateError';
import { FIELD_RANGES } from './constants';
import { formatPartialDate } from './formatDate';
import { DATE_FIELDS } from './types';
import type { DateField, DateParts, PartialDateInput } from './types';

function validateField(field: DateField, value: number | null | undefined): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!Number.isSafeInteger(value)) {
    throw DateError.invalidField(field, value, field === 'year' ? undefined : FIELD_RANGES[field]);
  }

  if (field !== 'year') {
    const range = FIELD_RANGES[field];
    if (value < range.min || value > range.max) {
      throw DateError.invalidField(field, value, range);
    }
  }

  // Normalise -0
  return value === 0 ? 0 : value;
}

/**
 * An immutable date whose fields are each independently known or unknown.
 *
 * @example
 * new PartialDate({ day: 21, month: 9 })          // year unknown
 * new PartialDate({ month: 13 })                   // throws DateError (INVALID_FIELD)
 * new PartialDate({ year: -44 }).toString()        // "-44"
 */
export class PartialDate implements DateParts {
  public readonly day?: number;
  public readonly month?: number;
  public readonly year?: number;

  constructor(input: PartialDateInput = {}) {
    this.day = validateField('day', input.day);
    this.month = validateField('month', input.month);
    this.year = validateField('year', input.year);
    Object.freeze(this);
  }

  /** A date with every field unknown */
  static empty(): PartialDate {
    return new PartialDate();
  }

  get(field: DateField): number | undefined {
    return this[field];
  }

  has(field: DateField): boolean {
    return this[field] !== undefined;
  }

  isEmpty(): boolean {
    return this.presentFields().length === 0;
  }

  /** Known fields in day, month, year order */
  presentFields(): DateField[] {
    return DATE_FIELDS.filter((field) => this.has(field));
  }

  /** Field-wise equality; unknown equals unknown */
  equals(other: DateParts): boolean {
    return DATE_FIELDS.every((field) => this[field] === other[field]);
  }

  toJSON(): DateParts {
    const json: { day?: number; month?: number; year?: number } = {};
    for (const field of this.presentFields()) {
      json[field] = this[field];
    }
    return json;
  }

  toString(): string {
    return formatPartialDate(this);
  }
}

/**
 * Fields known in both dates, in day, month, year order.
 */
export function sharedFields(a: DateParts, b: DateParts): DateField[] {
  return DATE_FIELDS.filter((field) => a[field] !== undefined && b[field] !== undefined);
}

export default PartialDate;
