/**
 * Composition root
 *
 * Wires configuration into repositories, transports and use case deps.
 * Transports are created on first use, so commands that never touch a
 * transport run without its settings.
 */

import { makeBrokerPublisher, type BrokerPublisher } from '../infra/broker/client.js';
import { initDatabase } from '../infra/database/client.js';
import {
  createSmtpTransport,
  makeEmailClient,
  type EmailSender,
} from '../infra/email/client.js';
import { makeLedgerRepo, makeWatermarkRepo } from '../modules/document-processing/index.js';
import { makeSoapDocumentSource } from '../modules/document-source/index.js';
import {
  makeBrokerHealthChecker,
  makeDbHealthChecker,
  makeSmtpHealthChecker,
} from '../modules/health/index.js';
import {
  makeBrokerNotifier,
  makeCrmDirectory,
  makeEmailNotifier,
  makeEmailSummaryReporter,
  makeLogOnlySummaryReporter,
  makeTemplateRenderer,
} from '../modules/notifier/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { NotifierDbClient } from '../infra/database/client.js';
import type { LedgerRepository, WatermarkRepository } from '@/modules/document-processing/index.js';
import type { DocumentSource } from '@/modules/document-source/index.js';
import type { HealthChecker } from '@/modules/health/index.js';
import type { Notifier, SummaryReporter, TemplateRenderer } from '@/modules/notifier/index.js';
import type { Logger } from 'pino';

export interface AppContainer {
  config: AppConfig;
  logger: Logger;
  db: NotifierDbClient;
  watermarkRepo: WatermarkRepository;
  ledgerRepo: LedgerRepository;
  /** Throws when the document source is not configured */
  getDocumentSource(): DocumentSource;
  /** Throws when the active transport is not configured */
  getNotifier(): Notifier;
  getSummaryReporter(): SummaryReporter;
  getHealthCheckers(timeoutMs: number): HealthChecker[];
  /** Closes the database pool and any open broker connection */
  dispose(): Promise<void>;
}

export interface BuildContainerOptions {
  config: AppConfig;
  logger: Logger;
  /** Overrides the database created from DATABASE_URL */
  db?: NotifierDbClient;
}

/**
 * Returns the value or throws naming the missing variable.
 */
export const requireSetting = (value: string | undefined, name: string): string => {
  if (value === undefined || value === '') {
    throw new Error(`Missing configuration: ${name}`);
  }
  return value;
};

/**
 * Memoizes a factory. The factory runs on the first call only.
 */
const lazy = <T>(factory: () => T): { get: () => T; peek: () => T | undefined } => {
  let instance: T | undefined;
  return {
    get: () => {
      instance ??= factory();
      return instance;
    },
    peek: () => instance,
  };
};

export const buildContainer = (options: BuildContainerOptions): AppContainer => {
  const { config, logger } = options;
  const db = options.db ?? initDatabase(config);

  const watermarkRepo = makeWatermarkRepo({ db, logger });
  const ledgerRepo = makeLedgerRepo({ db, logger });

  const renderer = lazy<TemplateRenderer>(() =>
    makeTemplateRenderer({
      logger,
      documentTemplatePath: config.emailNotification.templatePath,
    })
  );

  const smtpConfigured = config.smtp.host !== undefined;

  const emailSender = lazy<EmailSender>(() => {
    const host = requireSetting(config.smtp.host, 'SMTP_HOST');
    const fromAddress = requireSetting(config.smtp.fromAddress, 'SMTP_FROM_ADDRESS');

    return makeEmailClient({
      transport: createSmtpTransport({
        host,
        port: config.smtp.port,
        useTls: config.smtp.useTls,
        username: config.smtp.username,
        password: config.smtp.password,
      }),
      fromAddress,
      fromName: config.smtp.fromName,
      logger,
    });
  });

  const publisher = lazy<BrokerPublisher>(() =>
    makeBrokerPublisher({
      settings: {
        host: requireSetting(config.broker.host, 'RABBITMQ_HOST'),
        port: config.broker.port,
        username: config.broker.username,
        password: config.broker.password,
        vhost: config.broker.vhost,
        tls: config.broker.tls,
      },
      logger,
    })
  );

  const documentSource = lazy<DocumentSource>(() =>
    makeSoapDocumentSource({
      settings: {
        url: requireSetting(config.documentSource.url, 'DOCUMENT_SOURCE_URL'),
        username: config.documentSource.username,
        password: config.documentSource.password,
        pageSize: config.documentSource.pageSize,
        timeoutMs: config.documentSource.timeoutMs,
        namespace: config.documentSource.namespace,
      },
      logger,
    })
  );

  const notifier = lazy<Notifier>(() => {
    if (config.dispatch.mode === 'email') {
      const directory = makeCrmDirectory({
        settings: {
          url: requireSetting(config.crm.url, 'CRM_URL'),
          tokenUrl: requireSetting(config.crm.tokenUrl, 'CRM_TOKEN_URL'),
          clientId: requireSetting(config.crm.clientId, 'CRM_CLIENT_ID'),
          clientSecret: requireSetting(config.crm.clientSecret, 'CRM_CLIENT_SECRET'),
          timeoutMs: config.crm.timeoutMs,
        },
        logger,
      });

      return makeEmailNotifier({
        directory,
        emailSender: emailSender.get(),
        renderer: renderer.get(),
        lookup: {
          batchSize: config.crm.batchSize,
          maxConcurrentBatches: config.crm.maxConcurrentBatches,
        },
        logger,
      });
    }

    return makeBrokerNotifier({
      publisher: publisher.get(),
      settings: {
        exchange: requireSetting(config.broker.exchange, 'RABBITMQ_EXCHANGE'),
        routingKey: config.broker.routingKey,
        templateId: config.broker.templateId,
        headers: config.broker.headers,
      },
      logger,
    });
  });

  const summaryReporter = lazy<SummaryReporter>(() => {
    if (!smtpConfigured) {
      return makeLogOnlySummaryReporter(logger);
    }
    return makeEmailSummaryReporter({
      emailSender: emailSender.get(),
      recipients: config.summary.recipients,
      renderer: renderer.get(),
      logger,
    });
  });

  return {
    config,
    logger,
    db,
    watermarkRepo,
    ledgerRepo,
    getDocumentSource: documentSource.get,
    getNotifier: notifier.get,
    getSummaryReporter: summaryReporter.get,

    getHealthCheckers(timeoutMs: number): HealthChecker[] {
      const checkers: HealthChecker[] = [makeDbHealthChecker(db, { name: 'database', timeoutMs })];

      if (config.dispatch.mode === 'broker') {
        checkers.push(makeBrokerHealthChecker(publisher.get(), { timeoutMs }));
      }

      // SMTP carries the notifications in e-mail mode, only summaries otherwise
      if (config.dispatch.mode === 'email' || smtpConfigured) {
        checkers.push(
          makeSmtpHealthChecker(emailSender.get(), {
            timeoutMs,
            critical: config.dispatch.mode === 'email',
          })
        );
      }

      return checkers;
    },

    async dispose(): Promise<void> {
      await publisher.peek()?.close();
      await db.destroy();
    },
  };
};
