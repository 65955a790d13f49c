/**
 * Document Processing Module - Error Types
 *
 * Every error here is fatal for a run.
 */

import type { SourceQueryError } from '@/modules/document-source/core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Ledger or watermark store failure.
 */
export interface DatabaseError {
  type: 'DatabaseError';
  message: string;
}

/**
 * The outcome of a dispatched document could not be recorded.
 */
export interface LedgerWriteError {
  type: 'LedgerWriteError';
  documentId: string;
  message: string;
}

export type ProcessingError = DatabaseError | LedgerWriteError | SourceQueryError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createDatabaseError = (message: string): DatabaseError => ({
  type: 'DatabaseError',
  message,
});

export const createLedgerWriteError = (documentId: string, message: string): LedgerWriteError => ({
  type: 'LedgerWriteError',
  documentId,
  message,
});

// ─────────────────────────────────────────────────────────────────────────────
// Error Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Gets a human-readable message from a processing error.
 */
export const getErrorMessage = (error: ProcessingError): string => {
  switch (error.type) {
    case 'DatabaseError':
      return `Database error: ${error.message}`;
    case 'LedgerWriteError':
      return `Failed to record outcome for document ${error.documentId}: ${error.message}`;
    case 'SourceQueryError':
      return `Document source query failed: ${error.message}`;
  }
};
