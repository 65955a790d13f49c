/**
 * Process Documents Use Case
 *
 * One polling run: fetch documents created since the watermark, notify about
 * every document the ledger has not seen, record each outcome, then move the
 * watermark to the start of this run.
 */

import { ok, err, type Result } from 'neverthrow';

import { mapInBatches } from '../../../../common/utils/concurrency.js';
import { getErrorMessage as getDispatchErrorMessage } from '../../../notifier/core/errors.js';
import { selectCandidates } from '../candidates.js';
import { dispatchSafely, emitSummary, prepareDispatcher } from '../dispatch.js';
import { createLedgerWriteError, getErrorMessage, type ProcessingError } from '../errors.js';
import {
  PROCESSING_FAILED_ALERT,
  type DocumentRecord,
  type ProcessedDocument,
  type ProcessingResult,
} from '../types.js';

import type { LedgerRepository, WatermarkRepository } from '../ports.js';
import type { DatabaseError } from '../errors.js';
import type { DocumentSource } from '@/modules/document-source/core/ports.js';
import type { Notifier, SummaryReporter } from '@/modules/notifier/core/ports.js';
import type { SummaryOptions } from '@/modules/notifier/core/summary.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ProcessDocumentsDeps {
  watermarkRepo: WatermarkRepository;
  ledgerRepo: LedgerRepository;
  documentSource: DocumentSource;
  notifier: Notifier;
  summaryReporter: SummaryReporter;
  /** Document type filter; empty means all types */
  documentTypes: readonly string[];
  /** Documents dispatched at once */
  dispatchConcurrency: number;
  logger: Logger;
  now?: () => Date;
}

export interface ProcessDocumentsInput {
  /** Overrides the stored watermark */
  since?: Date | undefined;
  dryRun: boolean;
  /** Continue (and advance the watermark) even when the source returns nothing */
  force: boolean;
  summary: SummaryOptions;
}

interface DocumentOutcome {
  documentId: string;
  /** Null when the notification went out */
  failure: string | null;
  write: Result<void, DatabaseError>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const processDocuments = async (
  deps: ProcessDocumentsDeps,
  input: ProcessDocumentsInput
): Promise<Result<ProcessingResult, ProcessingError>> => {
  const {
    watermarkRepo,
    ledgerRepo,
    documentSource,
    notifier,
    summaryReporter,
    documentTypes,
    dispatchConcurrency,
    logger,
  } = deps;
  const clock = deps.now ?? (() => new Date());
  const { dryRun, force } = input;

  const log = logger.child({ usecase: 'processDocuments', dryRun });
  const now = clock();

  const fail = async (error: ProcessingError): Promise<Result<ProcessingResult, ProcessingError>> => {
    log.error({ error }, 'Critical error during document processing');
    await summaryReporter.sendErrorAlert({
      ...PROCESSING_FAILED_ALERT,
      details: getErrorMessage(error),
      occurredAt: clock(),
    });
    return err(error);
  };

  // 1. Resolve the window start
  let since: Date;
  if (input.since !== undefined) {
    since = input.since;
  } else {
    const watermark = await watermarkRepo.getLast(now);
    if (watermark.isErr()) return fail(watermark.error);
    since = watermark.value;
  }

  log.info({ since: since.toISOString(), until: now.toISOString() }, 'Starting document processing');

  const emptyResult = (counts: Pick<ProcessingResult, 'candidateCount' | 'skippedCount'>): ProcessingResult => ({
    processedCount: 0,
    errorCount: 0,
    errors: [],
    dryRun,
    since,
    until: now,
    newCount: 0,
    ...counts,
  });

  // 2. Fetch and validate
  const fetched = await documentSource.search({ since, until: now, documentTypes });
  if (fetched.isErr()) return fail(fetched.error);

  const { candidates, skipped, duplicateIds } = selectCandidates(fetched.value, now);
  for (const skip of skipped) {
    log.warn({ documentId: skip.documentId, reason: skip.reason }, 'Skipping invalid document');
  }
  if (duplicateIds.length > 0) {
    log.debug({ duplicateIds }, 'Source returned repeated document ids');
  }

  log.info(
    { found: fetched.value.length, candidates: candidates.length, skipped: skipped.length },
    'Fetched documents'
  );

  if (candidates.length === 0 && !force) {
    log.info('No new documents found');
    return ok(emptyResult({ candidateCount: 0, skippedCount: skipped.length }));
  }

  // 3. Drop everything the ledger has already seen
  let newDocuments: DocumentRecord[] = [];
  if (candidates.length > 0) {
    const existing = await ledgerRepo.findExistingIds(candidates.map((c) => c.documentId));
    if (existing.isErr()) return fail(existing.error);
    newDocuments = candidates.filter((c) => !existing.value.has(c.documentId));

    log.info(
      { newCount: newDocuments.length, alreadyProcessed: candidates.length - newDocuments.length },
      'Filtered already processed documents'
    );
  }

  if (newDocuments.length === 0) {
    if (!dryRun) {
      const advanced = await watermarkRepo.advance(now);
      if (advanced.isErr()) return fail(advanced.error);
    }
    log.info('All documents have already been processed');
    return ok(emptyResult({ candidateCount: candidates.length, skippedCount: skipped.length }));
  }

  // 4. Dispatch and record
  let processedCount = 0;
  let errorCount = 0;
  const errors: string[] = [];

  if (dryRun) {
    for (const doc of newDocuments) {
      log.info(
        { documentId: doc.documentId, portfolioId: doc.portfolioId, mode: notifier.mode },
        '[DRY RUN] Would dispatch notification and record document'
      );
    }
    processedCount = newDocuments.length;
  } else {
    const dispatcher = await prepareDispatcher(notifier, newDocuments, log);

    const outcomes = await mapInBatches(
      newDocuments,
      dispatchConcurrency,
      async (doc): Promise<DocumentOutcome> => {
        const dispatched = await dispatchSafely(dispatcher, doc);
        const failure = dispatched.isErr() ? getDispatchErrorMessage(dispatched.error) : null;

        if (failure !== null) {
          log.error({ documentId: doc.documentId, error: failure }, 'Error processing document');
        }

        const entry: ProcessedDocument = {
          documentId: doc.documentId,
          name: doc.name,
          documentDate: doc.documentDate,
          portfolioId: doc.portfolioId,
          processedAt: clock(),
          notificationSent: failure === null,
          errorMessage: failure,
        };

        return { documentId: doc.documentId, failure, write: await ledgerRepo.upsert(entry) };
      }
    );

    // A notification that cannot be recorded would be sent again next run
    const unrecorded = outcomes.find((o) => o.write.isErr());
    if (unrecorded !== undefined && unrecorded.write.isErr()) {
      return fail(createLedgerWriteError(unrecorded.documentId, unrecorded.write.error.message));
    }

    for (const outcome of outcomes) {
      if (outcome.failure === null) {
        processedCount++;
      } else {
        errorCount++;
        errors.push(`Failed to process document ${outcome.documentId}: ${outcome.failure}`);
      }
    }
  }

  // 5. Advance the watermark
  if (!dryRun) {
    const advanced = await watermarkRepo.advance(now);
    if (advanced.isErr()) return fail(advanced.error);
  }

  log.info({ processedCount, errorCount }, 'Document processing completed');

  // 6. Summary
  await emitSummary(
    summaryReporter,
    { operation: 'process', processedCount, errorCount, errors, dryRun, completedAt: clock() },
    input.summary,
    log
  );

  return ok({
    processedCount,
    errorCount,
    errors,
    dryRun,
    since,
    until: now,
    candidateCount: candidates.length,
    skippedCount: skipped.length,
    newCount: newDocuments.length,
  });
};
