/**
 * Database health checker
 *
 * Executes a simple `SELECT 1` query to verify database connectivity.
 * Returns unhealthy if the query fails or times out.
 */

import { sql, type Kysely } from 'kysely';

import { DEFAULT_CHECK_TIMEOUT_MS, runTimedCheck } from './timed-check.js';

import type { HealthChecker } from '../../core/ports.js';

export interface DbHealthCheckerOptions {
  /** Name to identify this database in health check results */
  name: string;
  /** Timeout in milliseconds (default: 3000) */
  timeoutMs?: number;
}

/**
 * Creates a health checker for a Kysely database client.
 *
 * @example
 * ```typescript
 * const dbChecker = makeDbHealthChecker(db, { name: 'database' });
 * const result = await dbChecker();
 * // { name: 'database', status: 'healthy', latencyMs: 5, critical: true }
 * ```
 */
export const makeDbHealthChecker = <T>(
  db: Kysely<T>,
  options: DbHealthCheckerOptions
): HealthChecker => {
  const { name, timeoutMs = DEFAULT_CHECK_TIMEOUT_MS } = options;

  return () =>
    runTimedCheck({ name, timeoutMs, critical: true }, async () => {
      await sql`SELECT 1`.execute(db);
    });
};
