/**
 * Ledger Repository Implementation
 *
 * Kysely-based store of processed documents, keyed by `document_id`.
 */

import { ok, err, type Result } from 'neverthrow';

import { chunk } from '../../../../common/utils/concurrency.js';
import { createDatabaseError, type DatabaseError } from '../../core/errors.js';

import type { LedgerRepository } from '../../core/ports.js';
import type { ProcessedDocument } from '../../core/types.js';
import type { NotifierDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface LedgerRepoConfig {
  db: NotifierDbClient;
  logger: Logger;
}

/** Maximum ids per `IN (...)` lookup */
const LOOKUP_CHUNK_SIZE = 1000;

interface LedgerRow {
  document_id: string;
  name: string;
  document_date: Date | string;
  portfolio_id: string;
  processed_at: Date | string;
  message_sent: boolean;
  error_message: string | null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toDate = (value: Date | string): Date => (value instanceof Date ? value : new Date(value));

const mapRow = (row: LedgerRow): ProcessedDocument => ({
  documentId: row.document_id,
  name: row.name,
  documentDate: toDate(row.document_date),
  portfolioId: row.portfolio_id,
  processedAt: toDate(row.processed_at),
  notificationSent: row.message_sent,
  errorMessage: row.error_message,
});

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const LEDGER_COLUMNS = [
  'document_id',
  'name',
  'document_date',
  'portfolio_id',
  'processed_at',
  'message_sent',
  'error_message',
] as const;

/**
 * Insert-or-replace on the unique `document_id`.
 */
const upsertRow = async (db: NotifierDbClient, entry: ProcessedDocument): Promise<void> => {
  await db
    .insertInto('processed_documents')
    .values({
      document_id: entry.documentId,
      name: entry.name,
      document_date: entry.documentDate,
      portfolio_id: entry.portfolioId,
      processed_at: entry.processedAt,
      message_sent: entry.notificationSent,
      error_message: entry.errorMessage,
    })
    .onConflict((oc) =>
      oc.column('document_id').doUpdateSet((eb) => ({
        name: eb.ref('excluded.name'),
        document_date: eb.ref('excluded.document_date'),
        portfolio_id: eb.ref('excluded.portfolio_id'),
        processed_at: eb.ref('excluded.processed_at'),
        message_sent: eb.ref('excluded.message_sent'),
        error_message: eb.ref('excluded.error_message'),
      }))
    )
    .execute();
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeLedgerRepo = (config: LedgerRepoConfig): LedgerRepository => {
  const { db, logger } = config;
  const log = logger.child({ repo: 'LedgerRepo' });

  return {
    async findExistingIds(
      documentIds: readonly string[]
    ): Promise<Result<Set<string>, DatabaseError>> {
      const existing = new Set<string>();
      if (documentIds.length === 0) return ok(existing);

      try {
        for (const ids of chunk(documentIds, LOOKUP_CHUNK_SIZE)) {
          const rows = await db
            .selectFrom('processed_documents')
            .select('document_id')
            .where('document_id', 'in', ids)
            .execute();

          for (const row of rows) existing.add(row.document_id);
        }
        return ok(existing);
      } catch (error) {
        log.error({ error }, 'Failed to look up processed documents');
        return err(createDatabaseError(`Failed to look up processed documents: ${describe(error)}`));
      }
    },

    async upsert(entry: ProcessedDocument): Promise<Result<void, DatabaseError>> {
      try {
        await upsertRow(db, entry);
        log.debug(
          { documentId: entry.documentId, notificationSent: entry.notificationSent },
          'Saved processed document'
        );
        return ok(undefined);
      } catch (error) {
        log.error({ error, documentId: entry.documentId }, 'Failed to save processed document');
        return err(createDatabaseError(`Failed to save document ${entry.documentId}: ${describe(error)}`));
      }
    },

    async upsertMany(entries: readonly ProcessedDocument[]): Promise<Result<void, DatabaseError>> {
      if (entries.length === 0) return ok(undefined);

      try {
        await db.transaction().execute(async (trx) => {
          for (const entry of entries) {
            await upsertRow(trx, entry);
          }
        });
        log.debug({ count: entries.length }, 'Saved processed documents');
        return ok(undefined);
      } catch (error) {
        log.error({ error, count: entries.length }, 'Failed to save processed documents');
        return err(createDatabaseError(`Failed to save ${String(entries.length)} documents: ${describe(error)}`));
      }
    },

    async findFailed(documentId?: string): Promise<Result<ProcessedDocument[], DatabaseError>> {
      try {
        let query = db
          .selectFrom('processed_documents')
          .select(LEDGER_COLUMNS)
          .where((eb) =>
            eb.or([
              eb('message_sent', '=', false),
              eb.and([eb('error_message', 'is not', null), eb('error_message', '!=', '')]),
            ])
          );

        if (documentId !== undefined) {
          query = query.where('document_id', '=', documentId);
        }

        const rows = await query.orderBy('processed_at', 'desc').execute();
        return ok(rows.map(mapRow));
      } catch (error) {
        log.error({ error, documentId }, 'Failed to load failed documents');
        return err(createDatabaseError(`Failed to load failed documents: ${describe(error)}`));
      }
    },

    async findRecent(limit: number): Promise<Result<ProcessedDocument[], DatabaseError>> {
      try {
        const rows = await db
          .selectFrom('processed_documents')
          .select(LEDGER_COLUMNS)
          .orderBy('processed_at', 'desc')
          .limit(limit)
          .execute();
        return ok(rows.map(mapRow));
      } catch (error) {
        log.error({ error, limit }, 'Failed to load recent documents');
        return err(createDatabaseError(`Failed to load recent documents: ${describe(error)}`));
      }
    },
  };
};
