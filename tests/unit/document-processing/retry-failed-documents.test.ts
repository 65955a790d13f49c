/**
 * Unit tests for retryFailedDocuments use case
 *
 * Tests cover:
 * - Selection of failed rows (all, or one specific id)
 * - Ledger updates for recovered and still-failing rows
 * - Single batched write of every updated row
 * - Convergence: nothing left to retry after a full recovery
 * - Fatal errors and retry alerts
 */

import { describe, expect, it } from 'vitest';

import {
  isFailed,
  retryFailedDocuments,
  type RetryFailedDocumentsDeps,
} from '@/modules/document-processing/index.js';
import { createEmailSendError } from '@/modules/notifier/core/errors.js';

import { makeProcessedDocument, makeSummaryOptions } from '../../fixtures/builders.js';
import {
  makeFakeLedgerRepo,
  makeFakeNotifier,
  makeFakeSummaryReporter,
  makeTestLogger,
} from '../../fixtures/fakes.js';

import type { ProcessedDocument } from '@/modules/document-processing/index.js';

const NOW = new Date('2025-03-12T10:00:00.000Z');
const EARLIER = new Date('2025-03-11T08:00:00.000Z');

const failedRow = (documentId: string, processedAt: Date = EARLIER): ProcessedDocument =>
  makeProcessedDocument({
    documentId,
    processedAt,
    notificationSent: false,
    errorMessage: 'Broker publish failed: channel closed',
  });

const setup = (
  rows: ProcessedDocument[],
  options: {
    notifier?: Parameters<typeof makeFakeNotifier>[0];
    ledger?: Parameters<typeof makeFakeLedgerRepo>[1];
  } = {}
) => {
  const ledgerRepo = makeFakeLedgerRepo(rows, options.ledger);
  const notifier = makeFakeNotifier({ mode: 'email', ...options.notifier });
  const summaryReporter = makeFakeSummaryReporter();

  const deps: RetryFailedDocumentsDeps = {
    ledgerRepo,
    notifier,
    summaryReporter,
    dispatchConcurrency: 1,
    logger: makeTestLogger(),
    now: () => NOW,
  };

  return { deps, ledgerRepo, notifier, summaryReporter };
};

describe('retryFailedDocuments', () => {
  it('re-dispatches every failed row and marks recovered rows as sent', async () => {
    const { deps, ledgerRepo, notifier } = setup([
      failedRow('F1'),
      failedRow('F2'),
      makeProcessedDocument({ documentId: 'OK' }),
    ]);

    const result = await retryFailedDocuments(deps, { summary: makeSummaryOptions() });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ processedCount: 2, errorCount: 0, errors: [], candidateCount: 2 });
    }
    expect([...notifier.dispatched].sort()).toEqual(['F1', 'F2']);
    expect(ledgerRepo.rows.get('F1')).toEqual({
      ...failedRow('F1'),
      notificationSent: true,
      errorMessage: null,
      processedAt: NOW,
    });
  });

  it('keeps the previous attempt time and stores the new error for rows that still fail', async () => {
    const { deps, ledgerRepo } = setup([failedRow('F1'), failedRow('F2')], {
      notifier: { failures: { F2: createEmailSendError('mailbox full') } },
    });

    const result = await retryFailedDocuments(deps, { summary: makeSummaryOptions() });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.processedCount).toBe(1);
      expect(result.value.errorCount).toBe(1);
      expect(result.value.errors).toEqual(['Failed to retry document F2: Email send failed: mailbox full']);
    }
    expect(ledgerRepo.rows.get('F2')).toEqual({
      ...failedRow('F2'),
      errorMessage: 'Email send failed: mailbox full',
    });
  });

  it('writes all updated rows in one batch', async () => {
    const { deps, ledgerRepo } = setup([failedRow('F1'), failedRow('F2')]);

    await retryFailedDocuments(deps, { summary: makeSummaryOptions() });

    expect(ledgerRepo.upsertManyCalls).toHaveLength(1);
    expect(ledgerRepo.upsertManyCalls[0]?.map((row) => row.documentId).sort()).toEqual(['F1', 'F2']);
    expect(ledgerRepo.upsertCalls).toEqual([]);
  });

  it('retries only the requested document', async () => {
    const { deps, notifier, ledgerRepo } = setup([failedRow('F1'), failedRow('F2')]);

    const result = await retryFailedDocuments(deps, { documentId: 'F2', summary: makeSummaryOptions() });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.candidateCount).toBe(1);
    }
    expect(notifier.dispatched).toEqual(['F2']);
    expect(ledgerRepo.rows.get('F1')?.notificationSent).toBe(false);
  });

  it('does nothing for a document that is not in failed state', async () => {
    const { deps, notifier, ledgerRepo, summaryReporter } = setup([
      makeProcessedDocument({ documentId: 'OK' }),
    ]);

    const result = await retryFailedDocuments(deps, { documentId: 'OK', summary: makeSummaryOptions() });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ processedCount: 0, errorCount: 0, errors: [], candidateCount: 0 });
    }
    expect(notifier.preparedBatches).toEqual([]);
    expect(ledgerRepo.upsertManyCalls).toEqual([]);
    expect(summaryReporter.summaries).toEqual([]);
  });

  it('does nothing for a document id that is not in the ledger', async () => {
    const { deps, notifier, ledgerRepo, summaryReporter } = setup([failedRow('F1')]);

    const result = await retryFailedDocuments(deps, { documentId: 'MISSING', summary: makeSummaryOptions() });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ processedCount: 0, errorCount: 0, errors: [], candidateCount: 0 });
    }
    expect(notifier.preparedBatches).toEqual([]);
    expect(ledgerRepo.upsertManyCalls).toEqual([]);
    expect(summaryReporter.summaries).toEqual([]);
  });

  it('has nothing left to retry after every failed row recovered', async () => {
    const { deps, notifier, ledgerRepo } = setup([failedRow('F1'), failedRow('F2')]);

    const first = await retryFailedDocuments(deps, { summary: makeSummaryOptions() });
    const second = await retryFailedDocuments(deps, { summary: makeSummaryOptions() });

    expect(first.isOk()).toBe(true);
    if (first.isOk()) {
      expect(first.value.processedCount).toBe(2);
    }
    expect(second.isOk()).toBe(true);
    if (second.isOk()) {
      expect(second.value).toEqual({ processedCount: 0, errorCount: 0, errors: [], candidateCount: 0 });
    }
    expect([...notifier.dispatched].sort()).toEqual(['F1', 'F2']);
    expect(ledgerRepo.upsertManyCalls).toHaveLength(1);
  });

  it('treats a sent row that carries an error as failed', async () => {
    const { deps, notifier } = setup([
      makeProcessedDocument({ documentId: 'PARTIAL', notificationSent: true, errorMessage: 'late bounce' }),
    ]);

    await retryFailedDocuments(deps, { summary: makeSummaryOptions() });

    expect(notifier.dispatched).toEqual(['PARTIAL']);
  });

  it('sends a retry summary', async () => {
    const { deps, summaryReporter } = setup([failedRow('F1')]);

    await retryFailedDocuments(deps, { summary: makeSummaryOptions() });

    expect(summaryReporter.summaries).toEqual([
      {
        operation: 'retry',
        processedCount: 1,
        errorCount: 0,
        errors: [],
        dryRun: false,
        completedAt: NOW,
      },
    ]);
  });

  it('fails and alerts when failed rows cannot be loaded', async () => {
    const { deps, summaryReporter } = setup([], { ledger: { failFindFailed: true } });

    const result = await retryFailedDocuments(deps, { summary: makeSummaryOptions() });

    expect(result.isErr()).toBe(true);
    expect(summaryReporter.alerts).toEqual([
      {
        title: 'Document Retry Failed',
        message: 'A critical error occurred during document retry processing',
        details: 'Database error: ledger read failed',
        occurredAt: NOW,
      },
    ]);
  });

  it('fails without a summary when the batch write fails', async () => {
    const { deps, summaryReporter } = setup([failedRow('F1')], { ledger: { failUpsertMany: true } });

    const result = await retryFailedDocuments(deps, { summary: makeSummaryOptions() });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: 'DatabaseError', message: 'ledger batch write failed' });
    }
    expect(summaryReporter.summaries).toEqual([]);
    expect(summaryReporter.alerts).toHaveLength(1);
  });
});

describe('isFailed', () => {
  it('flags unsent rows and rows that carry an error', () => {
    expect(isFailed({ notificationSent: false, errorMessage: null })).toBe(true);
    expect(isFailed({ notificationSent: true, errorMessage: 'late bounce' })).toBe(true);
    expect(isFailed({ notificationSent: true, errorMessage: '' })).toBe(false);
    expect(isFailed({ notificationSent: true, errorMessage: null })).toBe(false);
  });
});
