/**
 * Document Processing Module
 *
 * Watermark-driven polling, ledger de-duplication, dispatch and retry.
 */

// Core types
export type {
  DocumentRecord,
  ProcessedDocument,
  ProcessingResult,
  RetryResult,
  StatusReport,
} from './core/types.js';

export { DEFAULT_LOOKBACK_MS, DEFAULT_STATUS_LIMIT, defaultSince, isFailed } from './core/types.js';

// Core errors
export type { ProcessingError, DatabaseError, LedgerWriteError } from './core/errors.js';
export { createDatabaseError, createLedgerWriteError, getErrorMessage } from './core/errors.js';

// Ports
export type { WatermarkRepository, LedgerRepository } from './core/ports.js';

// Candidate selection
export { selectCandidates, toDocumentRecord, type CandidateSelection } from './core/candidates.js';

// Use cases
export {
  processDocuments,
  type ProcessDocumentsDeps,
  type ProcessDocumentsInput,
} from './core/usecases/process-documents.js';
export {
  retryFailedDocuments,
  type RetryFailedDocumentsDeps,
  type RetryFailedDocumentsInput,
} from './core/usecases/retry-failed-documents.js';
export { getStatus, type GetStatusDeps, type GetStatusInput } from './core/usecases/get-status.js';

// Shell - Repositories
export { makeLedgerRepo, type LedgerRepoConfig } from './shell/repo/ledger-repo.js';
export { makeWatermarkRepo, type WatermarkRepoConfig } from './shell/repo/watermark-repo.js';
