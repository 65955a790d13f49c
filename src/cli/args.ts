/**
 * Command-line argument parsing
 */

import { parseArgs, type ParseArgsConfig } from 'node:util';

import { ok, err, type Result } from 'neverthrow';

import { DEFAULT_STATUS_LIMIT } from '../modules/document-processing/core/types.js';
import { DEFAULT_HEALTH_TIMEOUT_SECONDS } from '../modules/health/core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Summary flags; undefined leaves the configured default in place */
export interface SummaryFlags {
  noSummaryEmail: boolean | undefined;
  failuresOnly: boolean | undefined;
}

export interface ProcessCommand extends SummaryFlags {
  command: 'process';
  dryRun: boolean;
  force: boolean;
  since: Date | undefined;
}

export interface StatusCommand {
  command: 'status';
  limit: number;
}

export interface RetryCommand extends SummaryFlags {
  command: 'retry';
  /** Undefined means `--all` */
  documentId: string | undefined;
}

export interface MigrateCommand {
  command: 'migrate';
  create: boolean;
}

export interface HealthCommand {
  command: 'health';
  timeoutSeconds: number;
}

export interface HelpCommand {
  command: 'help';
}

export type CliCommand =
  | ProcessCommand
  | StatusCommand
  | RetryCommand
  | MigrateCommand
  | HealthCommand
  | HelpCommand;

export interface CliUsageError {
  type: 'CliUsageError';
  message: string;
}

const usageError = (message: string): CliUsageError => ({ type: 'CliUsageError', message });

export const USAGE = `Usage: document-notifier <command> [options]

Commands:
  process   Poll the document store and notify about new documents
            [-d|--dry-run] [-f|--force] [-s|--since=ISO8601]
            [--no-summary-email] [--failures-only]
  status    Show recently processed and failed documents
            [-l|--limit=N] (default ${String(DEFAULT_STATUS_LIMIT)})
  retry     Retry failed notifications
            (-d|--document-id=ID | -a|--all)
            [--no-summary-email] [--failures-only]
  migrate   Apply database migrations
            [-c|--create] (apply schema.sql without migration history)
  health    Check database and transport connectivity
            [-t|--timeout=S] (default ${String(DEFAULT_HEALTH_TIMEOUT_SECONDS)})
`;

// ─────────────────────────────────────────────────────────────────────────────
// Option tables
// ─────────────────────────────────────────────────────────────────────────────

const summaryOptions = {
  'no-summary-email': { type: 'boolean' },
  'failures-only': { type: 'boolean' },
} as const satisfies ParseArgsConfig['options'];

const commandOptions = {
  process: {
    'dry-run': { type: 'boolean', short: 'd' },
    force: { type: 'boolean', short: 'f' },
    since: { type: 'string', short: 's' },
    ...summaryOptions,
  },
  status: {
    limit: { type: 'string', short: 'l' },
  },
  retry: {
    'document-id': { type: 'string', short: 'd' },
    all: { type: 'boolean', short: 'a' },
    ...summaryOptions,
  },
  migrate: {
    create: { type: 'boolean', short: 'c' },
  },
  health: {
    timeout: { type: 'string', short: 't' },
  },
} as const satisfies Record<string, ParseArgsConfig['options']>;

type CommandName = keyof typeof commandOptions;

const isCommandName = (value: string): value is CommandName => Object.hasOwn(commandOptions, value);

// ─────────────────────────────────────────────────────────────────────────────
// Value parsers
// ─────────────────────────────────────────────────────────────────────────────

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}([T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parses an ISO 8601 date or date-time. Values without an offset are read as UTC.
 */
export const parseSinceValue = (value: string): Result<Date, CliUsageError> => {
  const trimmed = value.trim();
  if (!ISO_DATE_PATTERN.test(trimmed)) {
    return err(usageError(`Invalid --since value '${value}': expected an ISO 8601 date`));
  }

  const hasTime = /[T ]/.test(trimmed);
  const hasOffset = /(Z|[+-]\d{2}:?\d{2})$/.test(trimmed);
  const normalized = hasTime && !hasOffset ? `${trimmed.replace(' ', 'T')}Z` : trimmed.replace(' ', 'T');
  const parsed = new Date(normalized);

  if (Number.isNaN(parsed.getTime())) {
    return err(usageError(`Invalid --since value '${value}': expected an ISO 8601 date`));
  }
  return ok(parsed);
};

const parsePositiveInteger = (
  value: string | undefined,
  fallback: number,
  flag: string
): Result<number, CliUsageError> => {
  if (value === undefined) return ok(fallback);
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return err(usageError(`Invalid ${flag} value '${value}': expected a positive integer`));
  }
  return ok(parsed);
};

const flagOrUndefined = (value: boolean | undefined): boolean | undefined =>
  value === true ? true : undefined;

// ─────────────────────────────────────────────────────────────────────────────
// Entry point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Parses `argv` (without the node and script entries) into a command.
 */
export const parseCommand = (argv: readonly string[]): Result<CliCommand, CliUsageError> => {
  const [name, ...rest] = argv;

  if (name === undefined) {
    return err(usageError('No command given'));
  }
  if (name === 'help' || name === '--help' || name === '-h') {
    return ok({ command: 'help' });
  }
  if (!isCommandName(name)) {
    return err(usageError(`Unknown command '${name}'`));
  }

  try {
    switch (name) {
      case 'process': {
        const { values } = parseArgs({ args: [...rest], options: commandOptions.process, strict: true });
        let since: Date | undefined;
        if (values.since !== undefined) {
          const parsed = parseSinceValue(values.since);
          if (parsed.isErr()) return err(parsed.error);
          since = parsed.value;
        }
        return ok({
          command: 'process',
          dryRun: values['dry-run'] === true,
          force: values.force === true,
          since,
          noSummaryEmail: flagOrUndefined(values['no-summary-email']),
          failuresOnly: flagOrUndefined(values['failures-only']),
        });
      }

      case 'status': {
        const { values } = parseArgs({ args: [...rest], options: commandOptions.status, strict: true });
        return parsePositiveInteger(values.limit, DEFAULT_STATUS_LIMIT, '--limit').map(
          (limit): CliCommand => ({ command: 'status', limit })
        );
      }

      case 'retry': {
        const { values } = parseArgs({ args: [...rest], options: commandOptions.retry, strict: true });
        const documentId = values['document-id'];
        const all = values.all === true;
        if ((documentId === undefined) === !all) {
          return err(usageError('retry requires exactly one of --document-id or --all'));
        }
        if (documentId?.trim() === '') {
          return err(usageError('--document-id must not be empty'));
        }
        return ok({
          command: 'retry',
          documentId: documentId?.trim(),
          noSummaryEmail: flagOrUndefined(values['no-summary-email']),
          failuresOnly: flagOrUndefined(values['failures-only']),
        });
      }

      case 'migrate': {
        const { values } = parseArgs({ args: [...rest], options: commandOptions.migrate, strict: true });
        return ok({ command: 'migrate', create: values.create === true });
      }

      case 'health': {
        const { values } = parseArgs({ args: [...rest], options: commandOptions.health, strict: true });
        return parsePositiveInteger(values.timeout, DEFAULT_HEALTH_TIMEOUT_SECONDS, '--timeout').map(
          (timeoutSeconds): CliCommand => ({ command: 'health', timeoutSeconds })
        );
      }
    }
  } catch (error) {
    // parseArgs throws on unknown options and missing option values
    return err(usageError(error instanceof Error ? error.message : String(error)));
  }
};
