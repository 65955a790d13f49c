/**
 * Unit tests for command-line parsing
 *
 * Tests cover:
 * - Command selection and help
 * - Per-command options and defaults
 * - Usage errors
 */

import { describe, expect, it } from 'vitest';

import { parseCommand, parseSinceValue } from '@/cli/args.js';

describe('parseCommand', () => {
  it('rejects a missing command', () => {
    const result = parseCommand([]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: 'CliUsageError', message: 'No command given' });
    }
  });

  it('rejects an unknown command', () => {
    const result = parseCommand(['purge']);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("Unknown command 'purge'");
    }
  });

  it.each([['toString'], ['constructor'], ['__proto__']])('rejects the inherited name %s', (name) => {
    const result = parseCommand([name]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(`Unknown command '${name}'`);
    }
  });

  it.each([['help'], ['--help'], ['-h']])('recognizes %s', (flag) => {
    expect(parseCommand([flag])._unsafeUnwrap()).toEqual({ command: 'help' });
  });

  describe('process', () => {
    it('uses defaults without options', () => {
      expect(parseCommand(['process'])._unsafeUnwrap()).toEqual({
        command: 'process',
        dryRun: false,
        force: false,
        since: undefined,
        noSummaryEmail: undefined,
        failuresOnly: undefined,
      });
    });

    it('reads short and long flags', () => {
      expect(
        parseCommand(['process', '-d', '--force', '--since=2025-03-01', '--no-summary-email', '--failures-only'])._unsafeUnwrap()
      ).toEqual({
        command: 'process',
        dryRun: true,
        force: true,
        since: new Date('2025-03-01T00:00:00.000Z'),
        noSummaryEmail: true,
        failuresOnly: true,
      });
    });

    it('rejects an invalid --since', () => {
      const result = parseCommand(['process', '-s', 'yesterday']);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe("Invalid --since value 'yesterday': expected an ISO 8601 date");
      }
    });

    it('rejects unknown options', () => {
      expect(parseCommand(['process', '--verbose']).isErr()).toBe(true);
    });
  });

  describe('status', () => {
    it('defaults the limit to 10', () => {
      expect(parseCommand(['status'])._unsafeUnwrap()).toEqual({ command: 'status', limit: 10 });
    });

    it('rejects a non-positive limit', () => {
      const result = parseCommand(['status', '--limit', '0']);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe("Invalid --limit value '0': expected a positive integer");
      }
    });
  });

  describe('retry', () => {
    it('accepts a single document id', () => {
      expect(parseCommand(['retry', '--document-id', ' D-1 '])._unsafeUnwrap()).toEqual({
        command: 'retry',
        documentId: 'D-1',
        noSummaryEmail: undefined,
        failuresOnly: undefined,
      });
    });

    it('accepts --all', () => {
      expect(parseCommand(['retry', '-a'])._unsafeUnwrap()).toMatchObject({
        command: 'retry',
        documentId: undefined,
      });
    });

    it.each([[['retry']], [['retry', '--all', '-d', 'D-1']]])(
      'requires exactly one selector: %j',
      (argv) => {
        const result = parseCommand(argv);

        expect(result.isErr()).toBe(true);
        if (result.isErr()) {
          expect(result.error.message).toBe('retry requires exactly one of --document-id or --all');
        }
      }
    );

    it('rejects a blank document id', () => {
      const result = parseCommand(['retry', '-d', '  ']);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('--document-id must not be empty');
      }
    });
  });

  it('parses migrate --create', () => {
    expect(parseCommand(['migrate', '-c'])._unsafeUnwrap()).toEqual({ command: 'migrate', create: true });
    expect(parseCommand(['migrate'])._unsafeUnwrap()).toEqual({ command: 'migrate', create: false });
  });

  it('parses health --timeout', () => {
    expect(parseCommand(['health', '-t', '5'])._unsafeUnwrap()).toEqual({ command: 'health', timeoutSeconds: 5 });
    expect(parseCommand(['health'])._unsafeUnwrap()).toEqual({ command: 'health', timeoutSeconds: 30 });
  });
});

describe('parseSinceValue', () => {
  it('reads times without an offset as UTC', () => {
    expect(parseSinceValue('2025-03-01T08:30')._unsafeUnwrap()).toEqual(new Date('2025-03-01T08:30:00.000Z'));
    expect(parseSinceValue('2025-03-01 08:30:15')._unsafeUnwrap()).toEqual(new Date('2025-03-01T08:30:15.000Z'));
  });

  it('honours an explicit offset', () => {
    expect(parseSinceValue('2025-03-01T08:30:00+02:00')._unsafeUnwrap()).toEqual(
      new Date('2025-03-01T06:30:00.000Z')
    );
  });

  it('rejects an impossible date', () => {
    expect(parseSinceValue('2025-13-45').isErr()).toBe(true);
  });
});
