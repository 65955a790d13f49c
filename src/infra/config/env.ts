/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Runtime
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  DATABASE_URL: Type.Optional(Type.String()),

  // Document source
  DOCUMENT_SOURCE_URL: Type.Optional(Type.String()),
  DOCUMENT_SOURCE_USERNAME: Type.Optional(Type.String()),
  DOCUMENT_SOURCE_PASSWORD: Type.Optional(Type.String()),
  DOCUMENT_SOURCE_PAGE_SIZE: Type.Integer({ default: 50, minimum: 1, maximum: 1000 }),
  DOCUMENT_SOURCE_TIMEOUT_MS: Type.Integer({ default: 300_000, minimum: 1 }),
  DOCUMENT_SOURCE_NAMESPACE: Type.String({ default: 'urn:document-handling-api' }),
  DOCUMENT_TYPES: Type.Optional(Type.String()),

  // Dispatch
  NOTIFICATION_MODE: Type.Union([Type.Literal('broker'), Type.Literal('email')], {
    default: 'broker',
  }),
  DISPATCH_CONCURRENCY: Type.Integer({ default: 1, minimum: 1, maximum: 64 }),

  // RabbitMQ
  RABBITMQ_HOST: Type.Optional(Type.String()),
  RABBITMQ_PORT: Type.Integer({ default: 5672, minimum: 1, maximum: 65535 }),
  RABBITMQ_USERNAME: Type.Optional(Type.String()),
  RABBITMQ_PASSWORD: Type.Optional(Type.String()),
  RABBITMQ_VHOST: Type.String({ default: '/' }),
  RABBITMQ_EXCHANGE: Type.Optional(Type.String()),
  RABBITMQ_ROUTING_KEY: Type.String({ default: '' }),
  RABBITMQ_USE_TLS: Type.Boolean({ default: false }),
  RABBITMQ_TLS_SERVER_NAME: Type.Optional(Type.String()),
  RABBITMQ_TLS_CERT_PATH: Type.Optional(Type.String()),
  RABBITMQ_TLS_CERT_PASSPHRASE: Type.Optional(Type.String()),
  RABBITMQ_TENANT_ID: Type.String({ default: '' }),
  RABBITMQ_OPERATION: Type.String({ default: 'comm:communication' }),
  RABBITMQ_APPLICATION: Type.String({ default: 'document-notifier' }),
  RABBITMQ_TEMPLATE_ID: Type.String({ default: '' }),

  // SMTP
  SMTP_HOST: Type.Optional(Type.String()),
  SMTP_PORT: Type.Integer({ default: 587, minimum: 1, maximum: 65535 }),
  SMTP_USE_TLS: Type.Boolean({ default: true }),
  SMTP_USERNAME: Type.Optional(Type.String()),
  SMTP_PASSWORD: Type.Optional(Type.String()),
  SMTP_FROM_ADDRESS: Type.Optional(Type.String()),
  SMTP_FROM_NAME: Type.String({ default: 'Document Notifier' }),

  // Operator summary
  SUMMARY_RECIPIENTS: Type.Optional(Type.String()),
  SEND_SUMMARY_EMAIL: Type.Boolean({ default: true }),
  SEND_FAILURES_ONLY: Type.Boolean({ default: false }),

  // E-mail notification mode
  EMAIL_TEMPLATE_PATH: Type.Optional(Type.String()),

  // CRM directory
  CRM_URL: Type.Optional(Type.String()),
  CRM_TOKEN_URL: Type.Optional(Type.String()),
  CRM_CLIENT_ID: Type.Optional(Type.String()),
  CRM_CLIENT_SECRET: Type.Optional(Type.String()),
  CRM_TIMEOUT_MS: Type.Integer({ default: 300_000, minimum: 1 }),
  CRM_BATCH_SIZE: Type.Integer({ default: 50, minimum: 1, maximum: 500 }),
  CRM_MAX_CONCURRENT_BATCHES: Type.Integer({ default: 4, minimum: 1, maximum: 32 }),
});

export type Env = Static<typeof EnvSchema>;

/**
 * Parses an integer variable, keeping the raw string when it is not numeric
 * so that schema validation reports it.
 */
const toInteger = (value: string | undefined, fallback: number): number | string => {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : value;
};

/**
 * Parses a boolean variable ("true"/"false"/"1"/"0"), keeping the raw string otherwise.
 */
const toBoolean = (value: string | undefined, fallback: boolean): boolean | string => {
  if (value === undefined || value === '') return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
};

/**
 * Treats empty strings as unset.
 */
const optional = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: optional(env['DATABASE_URL']),

    DOCUMENT_SOURCE_URL: optional(env['DOCUMENT_SOURCE_URL']),
    DOCUMENT_SOURCE_USERNAME: optional(env['DOCUMENT_SOURCE_USERNAME']),
    DOCUMENT_SOURCE_PASSWORD: optional(env['DOCUMENT_SOURCE_PASSWORD']),
    DOCUMENT_SOURCE_PAGE_SIZE: toInteger(env['DOCUMENT_SOURCE_PAGE_SIZE'], 50),
    DOCUMENT_SOURCE_TIMEOUT_MS: toInteger(env['DOCUMENT_SOURCE_TIMEOUT_MS'], 300_000),
    DOCUMENT_SOURCE_NAMESPACE: optional(env['DOCUMENT_SOURCE_NAMESPACE']) ?? 'urn:document-handling-api',
    DOCUMENT_TYPES: optional(env['DOCUMENT_TYPES']),

    NOTIFICATION_MODE: optional(env['NOTIFICATION_MODE']) ?? 'broker',
    DISPATCH_CONCURRENCY: toInteger(env['DISPATCH_CONCURRENCY'], 1),

    RABBITMQ_HOST: optional(env['RABBITMQ_HOST']),
    RABBITMQ_PORT: toInteger(env['RABBITMQ_PORT'], 5672),
    RABBITMQ_USERNAME: optional(env['RABBITMQ_USERNAME']),
    RABBITMQ_PASSWORD: optional(env['RABBITMQ_PASSWORD']),
    RABBITMQ_VHOST: optional(env['RABBITMQ_VHOST']) ?? '/',
    RABBITMQ_EXCHANGE: optional(env['RABBITMQ_EXCHANGE']),
    RABBITMQ_ROUTING_KEY: env['RABBITMQ_ROUTING_KEY'] ?? '',
    RABBITMQ_USE_TLS: toBoolean(env['RABBITMQ_USE_TLS'], false),
    RABBITMQ_TLS_SERVER_NAME: optional(env['RABBITMQ_TLS_SERVER_NAME']),
    RABBITMQ_TLS_CERT_PATH: optional(env['RABBITMQ_TLS_CERT_PATH']),
    RABBITMQ_TLS_CERT_PASSPHRASE: optional(env['RABBITMQ_TLS_CERT_PASSPHRASE']),
    RABBITMQ_TENANT_ID: env['RABBITMQ_TENANT_ID'] ?? '',
    RABBITMQ_OPERATION: optional(env['RABBITMQ_OPERATION']) ?? 'comm:communication',
    RABBITMQ_APPLICATION: optional(env['RABBITMQ_APPLICATION']) ?? 'document-notifier',
    RABBITMQ_TEMPLATE_ID: env['RABBITMQ_TEMPLATE_ID'] ?? '',

    SMTP_HOST: optional(env['SMTP_HOST']),
    SMTP_PORT: toInteger(env['SMTP_PORT'], 587),
    SMTP_USE_TLS: toBoolean(env['SMTP_USE_TLS'], true),
    SMTP_USERNAME: optional(env['SMTP_USERNAME']),
    SMTP_PASSWORD: optional(env['SMTP_PASSWORD']),
    SMTP_FROM_ADDRESS: optional(env['SMTP_FROM_ADDRESS']),
    SMTP_FROM_NAME: optional(env['SMTP_FROM_NAME']) ?? 'Document Notifier',

    SUMMARY_RECIPIENTS: optional(env['SUMMARY_RECIPIENTS']),
    SEND_SUMMARY_EMAIL: toBoolean(env['SEND_SUMMARY_EMAIL'], true),
    SEND_FAILURES_ONLY: toBoolean(env['SEND_FAILURES_ONLY'], false),

    EMAIL_TEMPLATE_PATH: optional(env['EMAIL_TEMPLATE_PATH']),

    CRM_URL: optional(env['CRM_URL']),
    CRM_TOKEN_URL: optional(env['CRM_TOKEN_URL']),
    CRM_CLIENT_ID: optional(env['CRM_CLIENT_ID']),
    CRM_CLIENT_SECRET: optional(env['CRM_CLIENT_SECRET']),
    CRM_TIMEOUT_MS: toInteger(env['CRM_TIMEOUT_MS'], 300_000),
    CRM_BATCH_SIZE: toInteger(env['CRM_BATCH_SIZE'], 50),
    CRM_MAX_CONCURRENT_BATCHES: toInteger(env['CRM_MAX_CONCURRENT_BATCHES'], 4),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Splits a comma-separated list, trimming entries and dropping empty ones.
 */
export const splitList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  runtime: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
  },
  documentSource: {
    url: env.DOCUMENT_SOURCE_URL,
    username: env.DOCUMENT_SOURCE_USERNAME,
    password: env.DOCUMENT_SOURCE_PASSWORD,
    pageSize: env.DOCUMENT_SOURCE_PAGE_SIZE,
    timeoutMs: env.DOCUMENT_SOURCE_TIMEOUT_MS,
    /** XML namespace of the document handling service contract */
    namespace: env.DOCUMENT_SOURCE_NAMESPACE,
    documentTypes: splitList(env.DOCUMENT_TYPES),
  },
  dispatch: {
    mode: env.NOTIFICATION_MODE,
    concurrency: env.DISPATCH_CONCURRENCY,
  },
  broker: {
    host: env.RABBITMQ_HOST,
    port: env.RABBITMQ_PORT,
    username: env.RABBITMQ_USERNAME,
    password: env.RABBITMQ_PASSWORD,
    vhost: env.RABBITMQ_VHOST,
    exchange: env.RABBITMQ_EXCHANGE,
    routingKey: env.RABBITMQ_ROUTING_KEY,
    tls: {
      enabled: env.RABBITMQ_USE_TLS,
      serverName: env.RABBITMQ_TLS_SERVER_NAME,
      certificatePath: env.RABBITMQ_TLS_CERT_PATH,
      certificatePassphrase: env.RABBITMQ_TLS_CERT_PASSPHRASE,
    },
    headers: {
      tenantId: env.RABBITMQ_TENANT_ID,
      operation: env.RABBITMQ_OPERATION,
      application: env.RABBITMQ_APPLICATION,
    },
    templateId: env.RABBITMQ_TEMPLATE_ID,
  },
  smtp: {
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    useTls: env.SMTP_USE_TLS,
    username: env.SMTP_USERNAME,
    password: env.SMTP_PASSWORD,
    fromAddress: env.SMTP_FROM_ADDRESS,
    fromName: env.SMTP_FROM_NAME,
  },
  summary: {
    recipients: splitList(env.SUMMARY_RECIPIENTS),
    /** Default for --no-summary-email (inverted) */
    sendSummaryEmail: env.SEND_SUMMARY_EMAIL,
    /** Default for --failures-only */
    sendFailuresOnly: env.SEND_FAILURES_ONLY,
  },
  emailNotification: {
    templatePath: env.EMAIL_TEMPLATE_PATH,
  },
  crm: {
    url: env.CRM_URL,
    tokenUrl: env.CRM_TOKEN_URL,
    clientId: env.CRM_CLIENT_ID,
    clientSecret: env.CRM_CLIENT_SECRET,
    timeoutMs: env.CRM_TIMEOUT_MS,
    batchSize: env.CRM_BATCH_SIZE,
    maxConcurrentBatches: env.CRM_MAX_CONCURRENT_BATCHES,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
