/**
 * Display formatting for partial dates.
 *
 * Output is `<year>-<month>-<day>` with unknown fields printed as "None".
 * Trailing unknown fields are dropped:
 * - day known:    "2024-8-6", "None-9-21", "None-None-5"
 * - month known:  "1901-3", "None-8"
 * - neither:      "1850", "None"
 *
 * Downstream tooling parses this exact shape; keep the ordering and marker.
 */

import { ABSENT_MARKER } from './constants';
import type { DateParts } from './types';

function part(value: number | undefined): string {
  return value === undefined ? ABSENT_MARKER : String(value);
}

export function formatPartialDate(date: DateParts): string {
  if (date.day !== undefined) {
    return `${part(date.year)}-${part(date.month)}-${part(date.day)}`;
  }
  if (date.month !== undefined) {
    return `${part(date.year)}-${part(date.month)}`;
  }
  return part(date.year);
}

export default formatPartialDate;
