/**
 * fuzzy-dates
 *
 * Extract, compare and reconcile partial dates from noisy records.
 */

export * from './dates';
export * from './services';
export { DateError, Logging, parseCsvFile } from './utils';
export type { DateErrorCode } from './utils';
export { env, parseEnv } from './config';
export type { Env } from './config';
