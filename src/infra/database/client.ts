import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { NotifierDatabase } from './notifier/types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL } = pg;

export type NotifierDbClient = Kysely<NotifierDatabase>;

/**
 * Create a Kysely instance for a specific database URL
 */
export const createClient = <T>(connectionString: string): Kysely<T> => {
  return new Kysely<T>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

/**
 * Initialize the notifier database client
 */
export const initDatabase = (config: AppConfig): NotifierDbClient => {
  const url = config.database.url;

  if (url === undefined || url === '') {
    throw new Error('Missing configuration for Notifier Database (DATABASE_URL)');
  }

  return createClient<NotifierDatabase>(url);
};

// Re-export types
export * from './notifier/types.js';
