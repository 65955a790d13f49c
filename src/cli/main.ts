#!/usr/bin/env node

/**
 * Document notifier CLI entry point
 *
 * Usage:
 *   document-notifier process [--dry-run] [--force] [--since=2025-01-01T00:00:00Z]
 *   document-notifier status [--limit=10]
 *   document-notifier retry --all
 *   document-notifier migrate [--create]
 *   document-notifier health [--timeout=10]
 */

import 'dotenv/config';

import { parseCommand, USAGE } from './args.js';
import { EXIT_FAILURE, EXIT_SUCCESS, runCommand, type CommandOutput } from './commands.js';
import { buildContainer, type AppContainer } from '../app/build-container.js';
import { createConfig, parseEnv } from '../infra/config/index.js';
import { createLogger } from '../infra/logger/index.js';

const output: CommandOutput = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

const main = async (): Promise<number> => {
  const parsed = parseCommand(process.argv.slice(2));
  if (parsed.isErr()) {
    output.err(`Error: ${parsed.error.message}`);
    output.err(USAGE);
    return EXIT_FAILURE;
  }

  const command = parsed.value;
  if (command.command === 'help') {
    output.out(USAGE);
    return EXIT_SUCCESS;
  }

  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'document-notifier',
    pretty: config.logger.pretty,
  });

  let container: AppContainer | undefined;
  try {
    container = buildContainer({ config, logger });
    logger.info({ command: command.command }, 'Running command');
    return await runCommand(container, command, output);
  } catch (error) {
    logger.error({ error, command: command.command }, 'Command failed');
    output.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return EXIT_FAILURE;
  } finally {
    await container?.dispose().catch((error: unknown) => {
      logger.warn({ error }, 'Failed to release resources');
    });
  }
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = EXIT_FAILURE;
  });
