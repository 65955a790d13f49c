import type { HealthCheckResult } from '../../core/types.js';

/** Default timeout for a single health check in milliseconds */
export const DEFAULT_CHECK_TIMEOUT_MS = 3000;

export interface TimedCheckOptions {
  name: string;
  timeoutMs: number;
  critical: boolean;
}

/**
 * Runs a probe with a timeout and converts the outcome into a HealthCheckResult.
 * The probe signals failure by throwing.
 */
export const runTimedCheck = async (
  options: TimedCheckOptions,
  probe: () => Promise<void>
): Promise<HealthCheckResult> => {
  const { name, timeoutMs, critical } = options;
  const startTime = Date.now();
  let timer: NodeJS.Timeout | undefined;

  try {
    const timeoutPromise = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`${name} health check timed out after ${String(timeoutMs)}ms`));
      }, timeoutMs);
    });

    await Promise.race([probe(), timeoutPromise]);

    return {
      name,
      status: 'healthy',
      latencyMs: Date.now() - startTime,
      critical,
    };
  } catch (error) {
    return {
      name,
      status: 'unhealthy',
      message: error instanceof Error ? error.message : `Unknown ${name} error`,
      latencyMs: Date.now() - startTime,
      critical,
    };
  } finally {
    clearTimeout(timer);
  }
};
