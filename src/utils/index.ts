export { default as logger, Logging } from './logger';
export { DateError } from './DateError';
export type { DateErrorCode } from './DateError';
export { parseCsvFile, createCsvStreamProcessor, parseRow, validateCsvHeaders } from './csv';
export type { CsvParseResult, CsvStats, ParsedDateCandidate } from './csv';
