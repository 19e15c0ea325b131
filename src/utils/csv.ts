/**
 * CSV Utilities for batch date reconciliation
 *
 * Streams a CSV of candidate date texts, one row per record:
 *
 *   event_id,date_text
 *   baptism-42,"21st Sep 1900"
 *   baptism-42,"Sept 1902"
 *
 * Rows are validated one at a time; the file is never held in memory as a whole.
 */

import { createReadStream } from 'fs';
import csvParser from 'csv-parser';
import { EventEmitter } from 'events';
import { DateError } from './DateError';

// ============================================
// Types
// ============================================

/**
 * Raw CSV row
 */
export interface DateCandidateCsvRow {
  event_id?: string;
  date_text?: string;
}

/**
 * Parsed and validated row
 */
export interface ParsedDateCandidate {
  eventId: string;
  dateText: string;
}

/**
 * Result of parsing a single row
 */
export interface RowParseResult {
  success: boolean;
  data?: ParsedDateCandidate;
  error?: string;
  rowNumber: number;
}

export interface CsvStats {
  total: number;
  valid: number;
  invalid: number;
}

export interface CsvParseResult {
  rows: ParsedDateCandidate[];
  errors: Array<{ rowNumber: number; error: string }>;
  stats: CsvStats;
}

/**
 * Required columns in the CSV file
 */
const REQUIRED_COLUMNS = ['event_id', 'date_text'] as const;

// ============================================
// Validation Functions
// ============================================

/**
 * Validates that all required columns are present in the CSV headers
 */
export function validateCsvHeaders(headers: string[]): { valid: boolean; missing: string[] } {
  const normalizedHeaders = headers.map((h) => h.toLowerCase().trim());
  const missing = REQUIRED_COLUMNS.filter((col) => !normalizedHeaders.includes(col));

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * Parses and validates a single CSV row.
 * An empty date_text is valid: it stands for a record with no known date.
 */
export function parseRow(row: DateCandidateCsvRow, rowNumber: number): RowParseResult {
  const eventId = row.event_id?.trim();
  if (!eventId) {
    return {
      success: false,
      error: 'Missing or empty event_id',
      rowNumber,
    };
  }

  return {
    success: true,
    data: {
      eventId,
      dateText: row.date_text?.trim() ?? '',
    },
    rowNumber,
  };
}

// ============================================
// Streaming CSV Parser
// ============================================

/**
 * Creates a streaming CSV processor that emits events for each row
 *
 * Events:
 * - 'row' (RowParseResult)
 * - 'headerError' (missing column names)
 * - 'error' (Error)
 * - 'end' (CsvStats)
 *
 * @example
 * const processor = createCsvStreamProcessor('/path/to/records.csv');
 *
 * processor.on('row', (result) => {
 *   if (result.success) {
 *     console.log('Candidate for', result.data?.eventId);
 *   }
 * });
 */
export function createCsvStreamProcessor(filePath: string): EventEmitter {
  const emitter = new EventEmitter();

  let rowNumber = 0;
  let validCount = 0;
  let invalidCount = 0;
  let headersValidated = false;

  const source = createReadStream(filePath);
  source.on('error', (error: Error) => {
    emitter.emit('error', error);
  });

  const stream = source.pipe(
    csvParser({
      mapHeaders: ({ header }) => header.toLowerCase().trim(),
    })
  );

  stream.on('headers', (headers: string[]) => {
    const validation = validateCsvHeaders(headers);
    if (!validation.valid) {
      emitter.emit('headerError', validation.missing);
      stream.destroy();
      source.destroy();
      return;
    }
    headersValidated = true;
  });

  stream.on('data', (row: DateCandidateCsvRow) => {
    if (!headersValidated) return;

    rowNumber++;
    const result = parseRow(row, rowNumber);

    if (result.success) {
      validCount++;
    } else {
      invalidCount++;
    }

    emitter.emit('row', result);
  });

  stream.on('error', (error: Error) => {
    emitter.emit('error', error);
  });

  stream.on('end', () => {
    emitter.emit('end', {
      total: rowNumber,
      valid: validCount,
      invalid: invalidCount,
    } satisfies CsvStats);
  });

  return emitter;
}

/**
 * Processes a CSV file and returns all parsed rows
 */
export async function parseCsvFile(filePath: string): Promise<CsvParseResult> {
  return new Promise((resolve, reject) => {
    const rows: ParsedDateCandidate[] = [];
    const errors: Array<{ rowNumber: number; error: string }> = [];

    const processor = createCsvStreamProcessor(filePath);

    processor.on('row', (result: RowParseResult) => {
      if (result.success && result.data) {
        rows.push(result.data);
      } else if (result.error) {
        errors.push({ rowNumber: result.rowNumber, error: result.error });
      }
    });

    processor.on('headerError', (missing: string[]) => {
      reject(DateError.invalidInput(`Missing required columns: ${missing.join(', ')}`));
    });

    processor.on('error', (error: Error) => {
      reject(error);
    });

    processor.on('end', (stats: CsvStats) => {
      resolve({ rows, errors, stats });
    });
  });
}

export default {
  createCsvStreamProcessor,
  parseCsvFile,
  parseRow,
  validateCsvHeaders,
};
