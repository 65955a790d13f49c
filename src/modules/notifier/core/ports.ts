/**
 * Notifier Module - Ports (Interfaces)
 */

import type { DispatchError, OwnerLookupError } from './errors.js';
import type {
  ErrorAlert,
  NotificationMode,
  NotificationTarget,
  PortfolioOwner,
  ProcessingSummary,
} from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Notifier
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dispatches notifications for the documents a batch was prepared with.
 */
export interface BatchDispatcher {
  /**
   * Sends one notification. Failures are returned, never thrown.
   */
  dispatch(target: NotificationTarget): Promise<Result<void, DispatchError>>;
}

/**
 * Transport strategy, selected once per run.
 */
export interface Notifier {
  readonly mode: NotificationMode;

  /**
   * Resolves whatever the transport needs before dispatch (e.g. owner lookups).
   * Never fails: lookup problems surface as per-document dispatch errors.
   */
  prepareBatch(targets: readonly NotificationTarget[]): Promise<BatchDispatcher>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Owner Directory
// ─────────────────────────────────────────────────────────────────────────────

export interface OwnerDirectory {
  /**
   * Looks up owners for a set of portfolio ids. Portfolios without an owner
   * are simply absent from the result.
   */
  getOwners(portfolioIds: readonly string[]): Promise<Result<PortfolioOwner[], OwnerLookupError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Summary Reporter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Operator notifications. Best-effort: failures are logged, never surfaced.
 */
export interface SummaryReporter {
  sendSummary(summary: ProcessingSummary): Promise<void>;
  sendErrorAlert(alert: ErrorAlert): Promise<void>;
}
