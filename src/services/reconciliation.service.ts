/**
 * Reconciliation Service for batch date reconciliation
 *
 * Orchestration layer between raw record text and the date engine:
 * - Extracting a PartialDate from every candidate text
 * - Combining the candidates of one event into a consensus date
 * - Scoring each candidate against that consensus
 * - Reading candidates for many events from a CSV file
 */

import { combineDates, extractDate, formatPartialDate, scoreDates } from '../dates';
import type { ExtractOptions, PartialDate } from '../dates';
import { parseCsvFile } from '../utils/csv';
import type { CsvParseResult } from '../utils/csv';
import { DateError } from '../utils/DateError';
import { Logging } from '../utils/logger';

// ============================================
// Types
// ============================================

export interface EventCandidate {
  text: string;
  extracted: PartialDate;
  /** Similarity of this candidate to the consensus */
  scoreAgainstConsensus: number;
}

export interface EventReconciliation {
  eventId: string;
  consensus: PartialDate;
  /** Consensus in `<year>-<month>-<day>` display form */
  display: string;
  candidates: EventCandidate[];
}

export interface CsvReconciliationResult {
  events: EventReconciliation[];
  errors: Array<{ rowNumber: number; error: string }>;
  stats: { total: number; valid: number; invalid: number; events: number };
}

// ============================================
// Event Reconciliation
// ============================================

/**
 * Reconciles the candidate texts recorded for one event.
 *
 * @param eventId - Identifier of the event (carried through to the result)
 * @param texts - Raw candidate texts in source order
 * @param options - Extraction options (century pivot)
 * @throws DateError with code INVALID_INPUT when `texts` is empty
 *
 * @example
 * reconcileEvent('wedding-7', ['21st of sep', '22 September 2024', '21 Octo'])
 * // Returns: { display: '2024-9-21', candidates: [...] }
 */
export function reconcileEvent(
  eventId: string,
  texts: readonly string[],
  options: ExtractOptions = {}
): EventReconciliation {
  if (texts.length === 0) {
    throw DateError.invalidInput(`Event ${eventId} has no candidate dates`);
  }

  const extracted = texts.map((text) => extractDate(text, options));
  const consensus = combineDates(extracted);

  const candidates = texts.map((text, index) => ({
    text,
    extracted: extracted[index],
    scoreAgainstConsensus: scoreDates(extracted[index], consensus),
  }));

  const display = formatPartialDate(consensus);
  Logging.debug(`Event ${eventId}: ${texts.length} candidate(s) → ${display}`);

  return { eventId, consensus, display, candidates };
}

/**
 * Reads a CSV of `event_id,date_text` rows and reconciles every event.
 * Events keep the order in which they first appear in the file.
 *
 * @param filePath - Path to the CSV file
 * @param options - Extraction options (century pivot)
 */
export async function reconcileCsvFile(
  filePath: string,
  options: ExtractOptions = {}
): Promise<CsvReconciliationResult> {
  Logging.info(`Reconciling dates from ${filePath}`);

  let parsed: CsvParseResult;
  try {
    parsed = await parseCsvFile(filePath);
  } catch (error) {
    Logging.error(
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
    throw error;
  }

  const { rows, errors, stats } = parsed;

  for (const { rowNumber, error } of errors) {
    Logging.warn(`Skipping row ${rowNumber}: ${error}`);
  }

  const textsByEvent = new Map<string, string[]>();
  for (const row of rows) {
    const texts = textsByEvent.get(row.eventId) ?? [];
    texts.push(row.dateText);
    textsByEvent.set(row.eventId, texts);
  }

  const events = [...textsByEvent].map(([eventId, texts]) =>
    reconcileEvent(eventId, texts, options)
  );

  Logging.info(
    `Reconciled ${events.length} event(s) from ${stats.valid} row(s), ${stats.invalid} skipped`
  );

  return {
    events,
    errors,
    stats: { ...stats, events: events.length },
  };
}
