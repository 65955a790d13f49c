/**
 * CLI command handlers
 *
 * Each handler runs one use case against the container, prints the outcome
 * and returns the process exit code.
 */

import { applySchemaFile, migrateToLatest } from '../infra/database/migrations.js';
import {
  getErrorMessage,
  getStatus,
  processDocuments,
  retryFailedDocuments,
} from '../modules/document-processing/index.js';
import { getReadiness } from '../modules/health/index.js';
import { resolveSummaryOptions } from '../modules/notifier/index.js';

import type {
  CliCommand,
  HealthCommand,
  MigrateCommand,
  ProcessCommand,
  RetryCommand,
  StatusCommand,
} from './args.js';
import type { AppContainer } from '../app/build-container.js';
import type {
  ProcessedDocument,
  ProcessingResult,
  RetryResult,
  StatusReport,
} from '@/modules/document-processing/index.js';
import type { ReadinessResponse } from '@/modules/health/index.js';

export interface CommandOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

// ─────────────────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────────────────

/** `yyyy-MM-dd HH:mm` in UTC */
const formatProcessedAt = (date: Date): string => date.toISOString().slice(0, 16).replace('T', ' ');

export const formatProcessingResult = (result: ProcessingResult): string[] => {
  const lines = [
    'Processing completed:',
    `  Documents processed: ${String(result.processedCount)}`,
    `  Errors encountered: ${String(result.errorCount)}`,
  ];
  if (result.dryRun) {
    lines.push('  (Dry run - no changes were made)');
  }
  return lines;
};

export const formatRetryResult = (result: RetryResult): string[] => [
  'Retry completed:',
  `  Documents retried successfully: ${String(result.processedCount)}`,
  `  Documents still failing: ${String(result.errorCount)}`,
];

const formatDocumentLine = (doc: ProcessedDocument): string[] => {
  const marker = doc.notificationSent ? '✓' : '✗';
  const lines = [`  ${marker} ${doc.documentId} - ${doc.name} (${formatProcessedAt(doc.processedAt)})`];
  if (doc.errorMessage !== null && doc.errorMessage !== '') {
    lines.push(`    Error: ${doc.errorMessage}`);
  }
  return lines;
};

export const formatStatusReport = (report: StatusReport, limit: number): string[] => {
  const lines = [
    'Document Notifier Status:',
    `Recent documents processed: ${String(report.recent.length)}`,
    `Failed documents: ${String(report.failed.length)}`,
    '',
  ];

  if (report.recent.length > 0) {
    lines.push(`Last ${String(Math.min(limit, report.recent.length))} processed documents:`);
    for (const doc of report.recent) {
      lines.push(...formatDocumentLine(doc));
    }
  }

  return lines;
};

export const formatReadiness = (report: ReadinessResponse): string[] => {
  const lines = [`Health: ${report.status}`];
  for (const check of report.checks) {
    const latency = check.latencyMs !== undefined ? ` (${String(check.latencyMs)}ms)` : '';
    const message = check.message !== undefined ? ` - ${check.message}` : '';
    const optional = check.critical === false ? ' [non-critical]' : '';
    lines.push(`  ${check.name}: ${check.status}${latency}${optional}${message}`);
  }
  return lines;
};

// ─────────────────────────────────────────────────────────────────────────────
// Handlers
// ─────────────────────────────────────────────────────────────────────────────

const printLines = (write: (line: string) => void, lines: string[]): void => {
  for (const line of lines) write(line);
};

export const runProcess = async (
  container: AppContainer,
  command: ProcessCommand,
  output: CommandOutput
): Promise<number> => {
  const { config, logger } = container;

  const result = await processDocuments(
    {
      watermarkRepo: container.watermarkRepo,
      ledgerRepo: container.ledgerRepo,
      documentSource: container.getDocumentSource(),
      notifier: container.getNotifier(),
      summaryReporter: container.getSummaryReporter(),
      documentTypes: config.documentSource.documentTypes,
      dispatchConcurrency: config.dispatch.concurrency,
      logger,
    },
    {
      since: command.since,
      dryRun: command.dryRun,
      force: command.force,
      summary: resolveSummaryOptions(config.summary, command),
    }
  );

  if (result.isErr()) {
    output.err(`Error: ${getErrorMessage(result.error)}`);
    return EXIT_FAILURE;
  }

  printLines(output.out, formatProcessingResult(result.value));
  return result.value.errorCount > 0 ? EXIT_FAILURE : EXIT_SUCCESS;
};

export const runStatus = async (
  container: AppContainer,
  command: StatusCommand,
  output: CommandOutput
): Promise<number> => {
  const result = await getStatus(
    { ledgerRepo: container.ledgerRepo, logger: container.logger },
    { limit: command.limit }
  );

  if (result.isErr()) {
    output.err(`Error: ${getErrorMessage(result.error)}`);
    return EXIT_FAILURE;
  }

  printLines(output.out, formatStatusReport(result.value, command.limit));
  return EXIT_SUCCESS;
};

export const runRetry = async (
  container: AppContainer,
  command: RetryCommand,
  output: CommandOutput
): Promise<number> => {
  const { config, logger } = container;

  const result = await retryFailedDocuments(
    {
      ledgerRepo: container.ledgerRepo,
      notifier: container.getNotifier(),
      summaryReporter: container.getSummaryReporter(),
      dispatchConcurrency: config.dispatch.concurrency,
      logger,
    },
    {
      documentId: command.documentId,
      summary: resolveSummaryOptions(config.summary, command),
    }
  );

  if (result.isErr()) {
    output.err(`Error: ${getErrorMessage(result.error)}`);
    return EXIT_FAILURE;
  }

  printLines(output.out, formatRetryResult(result.value));
  return result.value.errorCount > 0 ? EXIT_FAILURE : EXIT_SUCCESS;
};

export const runMigrate = async (
  container: AppContainer,
  command: MigrateCommand,
  output: CommandOutput
): Promise<number> => {
  const { config, logger } = container;

  if (command.create) {
    const url = config.database.url ?? '';
    const applied = await applySchemaFile(url, logger);
    if (applied.isErr()) {
      output.err(`Error: ${applied.error.message}`);
      return EXIT_FAILURE;
    }
    output.out('Database schema created successfully');
    return EXIT_SUCCESS;
  }

  const migrated = await migrateToLatest(container.db, logger);
  if (migrated.isErr()) {
    output.err(`Error: ${migrated.error.message}`);
    return EXIT_FAILURE;
  }

  output.out('Database migrations applied successfully');
  for (const outcome of migrated.value) {
    output.out(`  ${outcome.migrationName}: ${outcome.status}`);
  }
  return EXIT_SUCCESS;
};

export const runHealth = async (
  container: AppContainer,
  command: HealthCommand,
  output: CommandOutput,
  startedAt: number = Date.now()
): Promise<number> => {
  const report = await getReadiness(
    { checkers: container.getHealthCheckers(command.timeoutSeconds * 1000) },
    {
      uptime: (Date.now() - startedAt) / 1000,
      timestamp: new Date().toISOString(),
    }
  );

  printLines(output.out, formatReadiness(report));
  return report.status === 'unhealthy' ? EXIT_FAILURE : EXIT_SUCCESS;
};

/**
 * Dispatches a parsed command. `help` is handled by the entry point.
 */
export const runCommand = async (
  container: AppContainer,
  command: Exclude<CliCommand, { command: 'help' }>,
  output: CommandOutput
): Promise<number> => {
  switch (command.command) {
    case 'process':
      return runProcess(container, command, output);
    case 'status':
      return runStatus(container, command, output);
    case 'retry':
      return runRetry(container, command, output);
    case 'migrate':
      return runMigrate(container, command, output);
    case 'health':
      return runHealth(container, command, output);
  }
};
