/**
 * Document Processing Module - Domain Types
 */

import type { NotificationTarget } from '@/modules/notifier/core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Documents
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A validated candidate from the document source.
 */
export interface DocumentRecord extends NotificationTarget {
  documentType: string | null;
}

/**
 * Ledger row: the latest outcome for one document.
 */
export interface ProcessedDocument extends NotificationTarget {
  /** Time of the last attempt */
  processedAt: Date;
  notificationSent: boolean;
  errorMessage: string | null;
}

/**
 * A ledger row is in failed state when it was never sent or carries an error.
 */
export const isFailed = (doc: Pick<ProcessedDocument, 'notificationSent' | 'errorMessage'>): boolean =>
  !doc.notificationSent || (doc.errorMessage !== null && doc.errorMessage !== '');

// ─────────────────────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────────────────────

export interface ProcessingResult {
  processedCount: number;
  errorCount: number;
  /** `Failed to process document <id>: <detail>` per failed document */
  errors: string[];
  dryRun: boolean;
  since: Date;
  until: Date;
  /** Valid, de-duplicated documents returned by the source */
  candidateCount: number;
  /** Source records dropped by validation */
  skippedCount: number;
  /** Candidates not yet in the ledger */
  newCount: number;
}

export interface RetryResult {
  processedCount: number;
  errorCount: number;
  /** `Failed to retry document <id>: <detail>` per failed document */
  errors: string[];
  /** Failed rows selected for retry */
  candidateCount: number;
}

export interface StatusReport {
  recent: ProcessedDocument[];
  failed: ProcessedDocument[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Default poll window when no watermark exists */
export const DEFAULT_LOOKBACK_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_STATUS_LIMIT = 10;

export const PROCESSING_FAILED_ALERT = {
  title: 'Document Processing Failed',
  message: 'A critical error occurred during document processing',
} as const;

export const RETRY_FAILED_ALERT = {
  title: 'Document Retry Failed',
  message: 'A critical error occurred during document retry processing',
} as const;

/**
 * Default `since` when no watermark has been stored yet.
 */
export const defaultSince = (now: Date): Date => new Date(now.getTime() - DEFAULT_LOOKBACK_MS);
