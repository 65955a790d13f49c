/**
 * Health module exports
 */

export { getReadiness, type GetReadinessDeps, type GetReadinessInput } from './core/usecases/get-readiness.js';
export { mapCheckResults, determineOverallStatus } from './core/logic.js';
export { DEFAULT_HEALTH_TIMEOUT_SECONDS } from './core/types.js';

// Health checker factories
export {
  makeDbHealthChecker,
  makeBrokerHealthChecker,
  makeSmtpHealthChecker,
  type DbHealthCheckerOptions,
  type BrokerHealthCheckerOptions,
  type SmtpHealthCheckerOptions,
} from './shell/checkers/index.js';

// Types
export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, ReadinessResponse } from './core/types.js';
