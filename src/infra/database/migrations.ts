/**
 * Schema management
 *
 * Two ways to bring the schema up:
 * - `migrateToLatest`: Kysely migrator with history in `kysely_migration`
 * - `applySchemaFile`: executes `schema.sql` directly (idempotent, no history)
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { Migrator, sql, type Kysely, type Migration, type MigrationProvider } from 'kysely';
import { ok, err, type Result } from 'neverthrow';
import pg from 'pg';

import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Migrations
// ─────────────────────────────────────────────────────────────────────────────

export const migrations: Record<string, Migration> = {
  '2025_09_26_001_initial': {
    async up(db: Kysely<unknown>): Promise<void> {
      await db.schema
        .createTable('processed_documents')
        .ifNotExists()
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('document_id', 'varchar(100)', (col) => col.notNull())
        .addColumn('name', 'varchar(500)', (col) => col.notNull())
        .addColumn('document_date', 'timestamptz', (col) => col.notNull())
        .addColumn('portfolio_id', 'varchar(100)', (col) => col.notNull())
        .addColumn('processed_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('message_sent', 'boolean', (col) => col.notNull().defaultTo(false))
        .addColumn('error_message', 'text')
        .execute();

      await db.schema
        .createIndex('ix_processed_documents_document_id')
        .ifNotExists()
        .on('processed_documents')
        .column('document_id')
        .unique()
        .execute();

      await db.schema
        .createIndex('ix_processed_documents_portfolio_id')
        .ifNotExists()
        .on('processed_documents')
        .column('portfolio_id')
        .execute();

      await db.schema
        .createIndex('ix_processed_documents_document_date')
        .ifNotExists()
        .on('processed_documents')
        .column('document_date')
        .execute();

      await db.schema
        .createTable('last_query_timestamps')
        .ifNotExists()
        .addColumn('id', 'serial', (col) => col.primaryKey())
        .addColumn('last_successful_query', 'timestamptz', (col) => col.notNull())
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();
    },

    async down(db: Kysely<unknown>): Promise<void> {
      await db.schema.dropTable('last_query_timestamps').ifExists().execute();
      await db.schema.dropTable('processed_documents').ifExists().execute();
    },
  },
};

/**
 * In-code migration provider (no filesystem lookup at runtime).
 */
const inCodeProvider: MigrationProvider = {
  getMigrations: () => Promise.resolve(migrations),
};

export interface MigrationOutcome {
  migrationName: string;
  status: 'Success' | 'Error' | 'NotExecuted';
}

/**
 * Applies all pending migrations.
 */
export const migrateToLatest = async <T>(
  db: Kysely<T>,
  logger: Logger
): Promise<Result<MigrationOutcome[], Error>> => {
  const log = logger.child({ component: 'Migrator' });
  const migrator = new Migrator({ db, provider: inCodeProvider });

  const { error, results } = await migrator.migrateToLatest();
  const outcomes: MigrationOutcome[] = (results ?? []).map((r) => ({
    migrationName: r.migrationName,
    status: r.status,
  }));

  for (const outcome of outcomes) {
    if (outcome.status === 'Error') {
      log.error({ migration: outcome.migrationName }, 'Migration failed');
    } else {
      log.info({ migration: outcome.migrationName, status: outcome.status }, 'Migration result');
    }
  }

  if (error !== undefined) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }

  return ok(outcomes);
};

// ─────────────────────────────────────────────────────────────────────────────
// Schema file
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Finds schema.sql next to this module, or under the project root when
 * running from the build output.
 */
export const resolveSchemaFile = (): string => {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.join(moduleDir, 'notifier', 'schema.sql'),
    path.resolve(process.cwd(), 'src/infra/database/notifier/schema.sql'),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) return candidate;
  }

  // Neither exists; report the source-relative path
  return candidates[0] ?? 'schema.sql';
};

/**
 * Applies schema.sql using a raw pg client (multi-statement SQL).
 */
export const applySchemaFile = async (
  connectionString: string,
  logger: Logger
): Promise<Result<string, Error>> => {
  const log = logger.child({ component: 'SchemaFile' });
  const schemaPath = resolveSchemaFile();
  const pgClient = new pg.Client({ connectionString });

  try {
    const schema = await fs.promises.readFile(schemaPath, 'utf-8');
    await pgClient.connect();
    await pgClient.query(schema);
    log.info({ schemaPath }, 'Schema applied');
    return ok(schemaPath);
  } catch (error) {
    log.error({ error, schemaPath }, 'Failed to apply schema');
    return err(error instanceof Error ? error : new Error(String(error)));
  } finally {
    await pgClient.end().catch((error: unknown) => {
      log.warn({ error }, 'Failed to close schema client');
    });
  }
};
