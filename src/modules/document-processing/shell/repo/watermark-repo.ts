/**
 * Watermark Repository Implementation
 *
 * The most recently updated row of `last_query_timestamps` is authoritative.
 */

import { sql } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type DatabaseError } from '../../core/errors.js';
import { defaultSince } from '../../core/types.js';

import type { WatermarkRepository } from '../../core/ports.js';
import type { NotifierDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

export interface WatermarkRepoConfig {
  db: NotifierDbClient;
  logger: Logger;
}

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const makeWatermarkRepo = (config: WatermarkRepoConfig): WatermarkRepository => {
  const { db, logger } = config;
  const log = logger.child({ repo: 'WatermarkRepo' });

  return {
    async getLast(now: Date): Promise<Result<Date, DatabaseError>> {
      try {
        const row = await db
          .selectFrom('last_query_timestamps')
          .select('last_successful_query')
          .orderBy('updated_at', 'desc')
          .orderBy('id', 'desc')
          .limit(1)
          .executeTakeFirst();

        if (row === undefined) {
          const fallback = defaultSince(now);
          log.debug({ since: fallback.toISOString() }, 'No watermark stored, using default');
          return ok(fallback);
        }

        const value = row.last_successful_query;
        return ok(value instanceof Date ? value : new Date(value));
      } catch (error) {
        log.error({ error }, 'Failed to read watermark');
        return err(createDatabaseError(`Failed to read watermark: ${describe(error)}`));
      }
    },

    async advance(at: Date): Promise<Result<void, DatabaseError>> {
      try {
        await db.transaction().execute(async (trx) => {
          const current = await trx
            .selectFrom('last_query_timestamps')
            .select('id')
            .orderBy('updated_at', 'desc')
            .orderBy('id', 'desc')
            .limit(1)
            .forUpdate()
            .executeTakeFirst();

          if (current === undefined) {
            await trx
              .insertInto('last_query_timestamps')
              .values({ last_successful_query: at, updated_at: at })
              .execute();
            return;
          }

          await trx
            .updateTable('last_query_timestamps')
            .set({
              last_successful_query: sql<Date>`GREATEST(last_successful_query, ${at})`,
              updated_at: at,
            })
            .where('id', '=', current.id)
            .execute();
        });

        log.debug({ at: at.toISOString() }, 'Updated last query timestamp');
        return ok(undefined);
      } catch (error) {
        log.error({ error }, 'Failed to advance watermark');
        return err(createDatabaseError(`Failed to advance watermark: ${describe(error)}`));
      }
    },
  };
};
