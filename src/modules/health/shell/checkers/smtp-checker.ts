/**
 * SMTP health checker
 *
 * Verifies the SMTP connection (and credentials, when configured).
 * Critical only in e-mail notification mode; otherwise SMTP carries just the
 * operator summaries and a failure degrades the service.
 */

import { DEFAULT_CHECK_TIMEOUT_MS, runTimedCheck } from './timed-check.js';

import type { HealthChecker } from '../../core/ports.js';
import type { EmailSender } from '@/infra/email/client.js';

export interface SmtpHealthCheckerOptions {
  name?: string;
  timeoutMs?: number;
  critical?: boolean;
}

export const makeSmtpHealthChecker = (
  emailSender: EmailSender,
  options: SmtpHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'smtp', timeoutMs = DEFAULT_CHECK_TIMEOUT_MS, critical = true } = options;

  return () =>
    runTimedCheck({ name, timeoutMs, critical }, async () => {
      const result = await emailSender.verify();
      if (result.isErr()) {
        throw new Error(result.error.message);
      }
    });
};
