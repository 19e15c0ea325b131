export { reconcileEvent, reconcileCsvFile } from './reconciliation.service';
export type {
  EventCandidate,
  EventReconciliation,
  CsvReconciliationResult,
} from './reconciliation.service';
