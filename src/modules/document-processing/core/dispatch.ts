/**
 * Helpers shared by the processing and retry use cases.
 */

import { err, type Result } from 'neverthrow';

import {
  createUnexpectedDispatchError,
  type DispatchError,
} from '../../notifier/core/errors.js';
import { decideSummary, type SummaryOptions } from '../../notifier/core/summary.js';

import type { BatchDispatcher, Notifier, SummaryReporter } from '@/modules/notifier/core/ports.js';
import type { NotificationTarget, ProcessingSummary } from '@/modules/notifier/core/types.js';
import type { Logger } from 'pino';

/**
 * Prepares a batch; a throwing notifier yields a dispatcher that fails every document.
 */
export const prepareDispatcher = async (
  notifier: Notifier,
  targets: readonly NotificationTarget[],
  log: Logger
): Promise<BatchDispatcher> => {
  try {
    return await notifier.prepareBatch(targets);
  } catch (error) {
    log.error({ error, mode: notifier.mode }, 'Failed to prepare notification batch');
    const failure = createUnexpectedDispatchError(error);
    return {
      dispatch: () => Promise.resolve(err(failure)),
    };
  }
};

/**
 * Dispatches one document, turning anything thrown into a dispatch error.
 */
export const dispatchSafely = async (
  dispatcher: BatchDispatcher,
  target: NotificationTarget
): Promise<Result<void, DispatchError>> => {
  try {
    return await dispatcher.dispatch(target);
  } catch (error) {
    return err(createUnexpectedDispatchError(error));
  }
};

/**
 * Sends the run summary when the policy allows it.
 */
export const emitSummary = async (
  reporter: SummaryReporter,
  summary: ProcessingSummary,
  options: SummaryOptions,
  log: Logger
): Promise<void> => {
  const decision = decideSummary(summary, options);
  if (!decision.send) {
    log.info({ reason: decision.reason }, 'Skipping summary email');
    return;
  }
  await reporter.sendSummary(summary);
};
