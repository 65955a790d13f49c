/**
 * Document Processing Module - Ports (Interfaces)
 */

import type { DatabaseError } from './errors.js';
import type { ProcessedDocument } from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Watermark Repository
// ─────────────────────────────────────────────────────────────────────────────

export interface WatermarkRepository {
  /**
   * The most recently updated watermark, or 24 hours before `now` when none exists.
   */
  getLast(now: Date): Promise<Result<Date, DatabaseError>>;

  /**
   * Moves the watermark to `at`. Never moves it backwards; inserts the first row
   * when the store is empty.
   */
  advance(at: Date): Promise<Result<void, DatabaseError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Ledger Repository
// ─────────────────────────────────────────────────────────────────────────────

export interface LedgerRepository {
  /**
   * Which of the given ids already have a ledger row (any outcome).
   */
  findExistingIds(documentIds: readonly string[]): Promise<Result<Set<string>, DatabaseError>>;

  /**
   * Inserts or replaces the row for `entry.documentId`.
   */
  upsert(entry: ProcessedDocument): Promise<Result<void, DatabaseError>>;

  /**
   * Upserts all entries in one transaction.
   */
  upsertMany(entries: readonly ProcessedDocument[]): Promise<Result<void, DatabaseError>>;

  /**
   * Rows in failed state, newest attempt first. With `documentId`, at most that one row.
   */
  findFailed(documentId?: string): Promise<Result<ProcessedDocument[], DatabaseError>>;

  /**
   * The `limit` most recently processed rows, newest first.
   */
  findRecent(limit: number): Promise<Result<ProcessedDocument[], DatabaseError>>;
}
