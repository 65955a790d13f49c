/**
 * Retry Failed Documents Use Case
 *
 * Re-dispatches ledger rows in failed state (one specific row, or all of
 * them) and persists every updated row in a single transaction.
 */

import { ok, err, type Result } from 'neverthrow';

import { mapInBatches } from '../../../../common/utils/concurrency.js';
import { getErrorMessage as getDispatchErrorMessage } from '../../../notifier/core/errors.js';
import { dispatchSafely, emitSummary, prepareDispatcher } from '../dispatch.js';
import { getErrorMessage, type ProcessingError } from '../errors.js';
import { RETRY_FAILED_ALERT, type ProcessedDocument, type RetryResult } from '../types.js';

import type { LedgerRepository } from '../ports.js';
import type { Notifier, SummaryReporter } from '@/modules/notifier/core/ports.js';
import type { SummaryOptions } from '@/modules/notifier/core/summary.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RetryFailedDocumentsDeps {
  ledgerRepo: LedgerRepository;
  notifier: Notifier;
  summaryReporter: SummaryReporter;
  dispatchConcurrency: number;
  logger: Logger;
  now?: () => Date;
}

export interface RetryFailedDocumentsInput {
  /** Retry only this document; all failed rows when omitted */
  documentId?: string | undefined;
  summary: SummaryOptions;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const retryFailedDocuments = async (
  deps: RetryFailedDocumentsDeps,
  input: RetryFailedDocumentsInput
): Promise<Result<RetryResult, ProcessingError>> => {
  const { ledgerRepo, notifier, summaryReporter, dispatchConcurrency, logger } = deps;
  const clock = deps.now ?? (() => new Date());
  const log = logger.child({ usecase: 'retryFailedDocuments', documentId: input.documentId });

  const fail = async (error: ProcessingError): Promise<Result<RetryResult, ProcessingError>> => {
    log.error({ error }, 'Critical error during retry processing');
    await summaryReporter.sendErrorAlert({
      ...RETRY_FAILED_ALERT,
      details: getErrorMessage(error),
      occurredAt: clock(),
    });
    return err(error);
  };

  const selected = await ledgerRepo.findFailed(input.documentId);
  if (selected.isErr()) return fail(selected.error);

  const failedRows = selected.value;
  log.info({ count: failedRows.length }, 'Retrying failed documents');

  if (failedRows.length === 0) {
    if (input.documentId !== undefined) {
      log.info('Document not found or not in failed state, nothing to retry');
    }
    return ok({ processedCount: 0, errorCount: 0, errors: [], candidateCount: 0 });
  }

  const dispatcher = await prepareDispatcher(notifier, failedRows, log);

  const updates = await mapInBatches(
    failedRows,
    dispatchConcurrency,
    async (row): Promise<{ updated: ProcessedDocument; failure: string | null }> => {
      const dispatched = await dispatchSafely(dispatcher, row);

      if (dispatched.isOk()) {
        log.info({ documentId: row.documentId }, 'Successfully retried document');
        return {
          updated: { ...row, notificationSent: true, errorMessage: null, processedAt: clock() },
          failure: null,
        };
      }

      const failure = getDispatchErrorMessage(dispatched.error);
      log.error({ documentId: row.documentId, error: failure }, 'Failed retry for document');
      return {
        updated: { ...row, notificationSent: false, errorMessage: failure },
        failure,
      };
    }
  );

  const saved = await ledgerRepo.upsertMany(updates.map((u) => u.updated));
  if (saved.isErr()) return fail(saved.error);

  let processedCount = 0;
  const errors: string[] = [];
  for (const { updated, failure } of updates) {
    if (failure === null) {
      processedCount++;
    } else {
      errors.push(`Failed to retry document ${updated.documentId}: ${failure}`);
    }
  }
  const errorCount = errors.length;

  log.info({ processedCount, errorCount }, 'Retry completed');

  await emitSummary(
    summaryReporter,
    { operation: 'retry', processedCount, errorCount, errors, dryRun: false, completedAt: clock() },
    input.summary,
    log
  );

  return ok({ processedCount, errorCount, errors, candidateCount: failedRows.length });
};
