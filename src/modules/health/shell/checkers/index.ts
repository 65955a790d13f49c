/**
 * Health checker factories
 *
 * Creates health checkers for the notifier's infrastructure dependencies.
 */

export { makeDbHealthChecker, type DbHealthCheckerOptions } from './db-checker.js';
export { makeBrokerHealthChecker, type BrokerHealthCheckerOptions } from './broker-checker.js';
export { makeSmtpHealthChecker, type SmtpHealthCheckerOptions } from './smtp-checker.js';
export { runTimedCheck, DEFAULT_CHECK_TIMEOUT_MS } from './timed-check.js';
