/**
 * Broker notifier
 *
 * Publishes one `Communication` request per document to RabbitMQ.
 */

import { XMLBuilder } from 'fast-xml-parser';
import { ok, err, type Result } from 'neverthrow';

import { createBrokerPublishError, type DispatchError } from '../core/errors.js';
import {
  BROKER_CONTENT_TYPE,
  COMMUNICATION_REQUEST_NAMESPACE,
  type NotificationTarget,
} from '../core/types.js';

import type { BatchDispatcher, Notifier } from '../core/ports.js';
import type { BrokerPublisher } from '@/infra/broker/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface BrokerNotifierSettings {
  exchange: string;
  routingKey: string;
  /** Communication template id sent as `<Type>` */
  templateId: string;
  headers: {
    tenantId: string;
    operation: string;
    application: string;
  };
}

export interface BrokerNotifierDeps {
  publisher: BrokerPublisher;
  settings: BrokerNotifierSettings;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Payload
// ─────────────────────────────────────────────────────────────────────────────

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  suppressEmptyNode: false,
});

/**
 * Builds the communication request XML for one portfolio.
 */
export const buildCommunicationPayload = (templateId: string, portfolioId: string): string =>
  builder.build({
    Communication: {
      '@_xmlns:xsi': 'http://www.w3.org/2001/XMLSchema-instance',
      '@_xmlns:xsd': 'http://www.w3.org/2001/XMLSchema',
      '@_xmlns': COMMUNICATION_REQUEST_NAMESPACE,
      Type: templateId,
      EntityID: portfolioId,
      ExternalData: '',
    },
  });

/**
 * Routing headers expected by the consumer.
 */
export const buildBrokerHeaders = (
  headers: BrokerNotifierSettings['headers']
): Record<string, string> => ({
  $tenantid: headers.tenantId,
  $operation: headers.operation,
  $application: headers.application,
});

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeBrokerNotifier = (deps: BrokerNotifierDeps): Notifier => {
  const { publisher, settings, logger } = deps;
  const log = logger.child({ component: 'BrokerNotifier' });
  const headers = buildBrokerHeaders(settings.headers);

  const dispatcher: BatchDispatcher = {
    async dispatch(target: NotificationTarget): Promise<Result<void, DispatchError>> {
      const result = await publisher.publish({
        exchange: settings.exchange,
        routingKey: settings.routingKey,
        body: buildCommunicationPayload(settings.templateId, target.portfolioId),
        messageId: target.documentId,
        contentType: BROKER_CONTENT_TYPE,
        headers,
      });

      if (result.isErr()) {
        log.error(
          { documentId: target.documentId, portfolioId: target.portfolioId, error: result.error },
          'Failed to publish document notification'
        );
        return err(createBrokerPublishError(result.error.message));
      }

      log.info(
        { documentId: target.documentId, portfolioId: target.portfolioId },
        'Published document notification'
      );
      return ok(undefined);
    },
  };

  return {
    mode: 'broker',
    prepareBatch(): Promise<BatchDispatcher> {
      return Promise.resolve(dispatcher);
    },
  };
};
