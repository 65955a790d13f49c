/**
 * Broker health checker
 *
 * Opens (or reuses) the publisher's connection and confirm channel.
 */

import { DEFAULT_CHECK_TIMEOUT_MS, runTimedCheck } from './timed-check.js';

import type { HealthChecker } from '../../core/ports.js';
import type { BrokerPublisher } from '@/infra/broker/client.js';

export interface BrokerHealthCheckerOptions {
  name?: string;
  timeoutMs?: number;
}

export const makeBrokerHealthChecker = (
  publisher: BrokerPublisher,
  options: BrokerHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'broker', timeoutMs = DEFAULT_CHECK_TIMEOUT_MS } = options;

  return () =>
    runTimedCheck({ name, timeoutMs, critical: true }, async () => {
      const result = await publisher.checkConnection();
      if (result.isErr()) {
        throw new Error(result.error.message);
      }
    });
};
