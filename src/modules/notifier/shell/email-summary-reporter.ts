/**
 * Operator summary and alert e-mails
 *
 * Best-effort: every failure is logged and swallowed.
 */

import { formatTimestamp } from '../core/format.js';
import { buildAlertSubject, buildSummarySubject } from '../core/summary.js';

import type { SummaryReporter } from '../core/ports.js';
import type { ErrorAlert, ProcessingSummary, SummaryOperation } from '../core/types.js';
import type { ProcessingSummaryModel, TemplateRenderer } from './templates/renderer.js';
import type { EmailSender } from '@/infra/email/client.js';
import type { Logger } from 'pino';

export interface EmailSummaryReporterDeps {
  emailSender: EmailSender;
  recipients: readonly string[];
  renderer: TemplateRenderer;
  logger: Logger;
}

const OPERATION_LABELS: Record<SummaryOperation, string> = {
  process: 'Document Processing',
  retry: 'Document Retry',
};

export const buildProcessingSummaryModel = (summary: ProcessingSummary): ProcessingSummaryModel => {
  const hasErrors = summary.errorCount > 0;
  return {
    operationLabel: OPERATION_LABELS[summary.operation],
    statusText: hasErrors ? 'Completed with Errors' : 'Completed Successfully',
    hasErrors,
    dryRun: summary.dryRun,
    completedAt: formatTimestamp(summary.completedAt),
    processedCount: summary.processedCount,
    errorCount: summary.errorCount,
    errors: summary.errors,
  };
};

export const makeEmailSummaryReporter = (deps: EmailSummaryReporterDeps): SummaryReporter => {
  const { emailSender, recipients, renderer, logger } = deps;
  const log = logger.child({ component: 'SummaryReporter' });

  return {
    async sendSummary(summary: ProcessingSummary): Promise<void> {
      if (recipients.length === 0) {
        log.info('No email recipients configured, skipping summary notification');
        return;
      }

      const html = renderer.render('processing-summary', buildProcessingSummaryModel(summary));
      if (html.isErr()) {
        log.error({ error: html.error }, 'Failed to render processing summary email');
        return;
      }

      const sent = await emailSender.send({
        to: [...recipients],
        subject: buildSummarySubject(summary.errorCount),
        html: html.value,
      });

      if (sent.isErr()) {
        log.error({ error: sent.error }, 'Failed to send processing summary email');
        return;
      }

      log.info({ recipients, operation: summary.operation }, 'Processing summary email sent');
    },

    async sendErrorAlert(alert: ErrorAlert): Promise<void> {
      if (recipients.length === 0) {
        log.warn('No email recipients configured, skipping error notification');
        return;
      }

      const html = renderer.render('error-alert', {
        title: alert.title,
        message: alert.message,
        details: alert.details,
        occurredAt: formatTimestamp(alert.occurredAt),
      });
      if (html.isErr()) {
        log.error({ error: html.error }, 'Failed to render error alert email');
        return;
      }

      const sent = await emailSender.send({
        to: [...recipients],
        subject: buildAlertSubject(alert.title),
        html: html.value,
      });

      if (sent.isErr()) {
        log.error({ error: sent.error }, 'Failed to send error notification email');
        return;
      }

      log.info({ recipients }, 'Error notification email sent');
    },
  };
};

/**
 * Reporter used when SMTP is not configured: logs what would have been sent.
 */
export const makeLogOnlySummaryReporter = (logger: Logger): SummaryReporter => {
  const log = logger.child({ component: 'SummaryReporter' });

  return {
    sendSummary(summary: ProcessingSummary): Promise<void> {
      log.info(
        {
          operation: summary.operation,
          processedCount: summary.processedCount,
          errorCount: summary.errorCount,
        },
        'SMTP not configured, summary email not sent'
      );
      return Promise.resolve();
    },

    sendErrorAlert(alert: ErrorAlert): Promise<void> {
      log.warn({ title: alert.title, details: alert.details }, 'SMTP not configured, error alert not sent');
      return Promise.resolve();
    },
  };
};
