import { ok, err, type Result } from 'neverthrow';

import { DEFAULT_STATUS_LIMIT, type StatusReport } from '../types.js';

import type { DatabaseError } from '../errors.js';
import type { LedgerRepository } from '../ports.js';
import type { Logger } from 'pino';

export interface GetStatusDeps {
  ledgerRepo: LedgerRepository;
  logger: Logger;
}

export interface GetStatusInput {
  limit?: number | undefined;
}

/**
 * Recent ledger rows plus every row in failed state.
 */
export const getStatus = async (
  deps: GetStatusDeps,
  input: GetStatusInput
): Promise<Result<StatusReport, DatabaseError>> => {
  const { ledgerRepo, logger } = deps;
  const limit = input.limit ?? DEFAULT_STATUS_LIMIT;
  const log = logger.child({ usecase: 'getStatus' });

  const recent = await ledgerRepo.findRecent(limit);
  if (recent.isErr()) {
    log.error({ error: recent.error }, 'Failed to load recent documents');
    return err(recent.error);
  }

  const failed = await ledgerRepo.findFailed();
  if (failed.isErr()) {
    log.error({ error: failed.error }, 'Failed to load failed documents');
    return err(failed.error);
  }

  return ok({ recent: recent.value, failed: failed.value });
};
