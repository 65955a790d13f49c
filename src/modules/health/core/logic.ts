import { type HealthCheckResult, type ReadinessResponse } from './types.js';

/**
 * Maps settled promises from health checkers to standardized HealthCheckResults.
 * Rejected promises (crashes in checkers) are treated as critical failures.
 */
export const mapCheckResults = (
  results: PromiseSettledResult<HealthCheckResult>[]
): HealthCheckResult[] => {
  return results.map((result) => {
    if (result.status === 'fulfilled') {
      return result.value;
    }
    return {
      name: 'unknown',
      status: 'unhealthy',
      message: result.reason instanceof Error ? result.reason.message : 'Check failed',
      critical: true,
    };
  });
};

/**
 * Determines overall status based on check results.
 * - Any critical unhealthy → "unhealthy"
 * - Any non-critical unhealthy → "degraded"
 * - All healthy → "ok"
 */
export const determineOverallStatus = (
  checks: HealthCheckResult[]
): ReadinessResponse['status'] => {
  const hasCriticalUnhealthy = checks.some((c) => c.status === 'unhealthy' && c.critical !== false);
  if (hasCriticalUnhealthy) {
    return 'unhealthy';
  }

  const hasNonCriticalUnhealthy = checks.some(
    (c) => c.status === 'unhealthy' && c.critical === false
  );
  if (hasNonCriticalUnhealthy) {
    return 'degraded';
  }

  return 'ok';
};
