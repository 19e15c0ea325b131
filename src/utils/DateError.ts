/**
 * Error codes raised by the date library.
 * - INVALID_FIELD: a day, month or year value outside its allowed range
 * - INVALID_INPUT: an operation received input of the wrong shape
 */
export type DateErrorCode = 'INVALID_FIELD' | 'INVALID_INPUT';

/**
 * Custom error class for operational date errors
 */
export class DateError extends Error {
  public readonly code: DateErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: DateErrorCode,
    details?: Record<string, unknown>,
    isOperational = true
  ) {
    super(message);
    this.name = 'DateError';
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Set the prototype explicitly
    Object.setPrototypeOf(this, DateError.prototype);
  }

  static invalidField(
    field: string,
    value: unknown,
    range?: { min: number; max: number }
  ): DateError {
    const expected = range
      ? `an integer between ${range.min} and ${range.max}`
      : 'a safe integer';
    return new DateError(`Invalid ${field}: ${String(value)} (expected ${expected})`, 'INVALID_FIELD', {
      field,
      value,
      ...(range ? { range } : {}),
    });
  }

  static invalidInput(message: string): DateError {
    return new DateError(message, 'INVALID_INPUT');
  }
}

export default DateError;
