/**
 * Operator summary policy and subjects.
 */

import { SUBJECT_PREFIX, type ProcessingSummary } from './types.js';

/**
 * Summary switches resolved from CLI flags and configuration defaults.
 */
export interface SummaryOptions {
  /** `--no-summary-email` */
  skipSummary: boolean;
  /** `--failures-only` */
  failuresOnly: boolean;
}

export type SummaryDecision =
  | { send: true }
  | { send: false; reason: 'nothing-to-report' | 'disabled' | 'no-failures' };

/**
 * Decides whether a summary goes out. Recipient presence is checked by the reporter.
 */
export const decideSummary = (
  summary: Pick<ProcessingSummary, 'processedCount' | 'errorCount'>,
  options: SummaryOptions
): SummaryDecision => {
  if (summary.processedCount === 0 && summary.errorCount === 0) {
    return { send: false, reason: 'nothing-to-report' };
  }
  if (options.skipSummary) {
    return { send: false, reason: 'disabled' };
  }
  if (options.failuresOnly && summary.errorCount === 0) {
    return { send: false, reason: 'no-failures' };
  }
  return { send: true };
};

/**
 * Resolves summary options: explicit CLI flags override configured defaults.
 */
export const resolveSummaryOptions = (
  defaults: { sendSummaryEmail: boolean; sendFailuresOnly: boolean },
  overrides: { noSummaryEmail?: boolean | undefined; failuresOnly?: boolean | undefined }
): SummaryOptions => ({
  skipSummary: overrides.noSummaryEmail ?? !defaults.sendSummaryEmail,
  failuresOnly: overrides.failuresOnly ?? defaults.sendFailuresOnly,
});

export const buildSummarySubject = (errorCount: number): string =>
  errorCount > 0
    ? `${SUBJECT_PREFIX} Document Processing Complete with ${String(errorCount)} Errors`
    : `${SUBJECT_PREFIX} Document Processing Complete`;

export const buildAlertSubject = (title: string): string => `${SUBJECT_PREFIX} ${title}`;
