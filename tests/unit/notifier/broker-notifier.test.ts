import { describe, expect, it } from 'vitest';

import { buildBrokerHeaders } from '@/modules/notifier/shell/broker-notifier.js';
import { buildCommunicationPayload, makeBrokerNotifier } from '@/modules/notifier/index.js';

import { makeProcessedDocument } from '../../fixtures/builders.js';
import { makeFakeBrokerPublisher, makeTestLogger } from '../../fixtures/fakes.js';

import type { BrokerNotifierSettings } from '@/modules/notifier/index.js';

const SETTINGS: BrokerNotifierSettings = {
  exchange: 'communications',
  routingKey: 'document.created',
  templateId: 'NEW_DOCUMENT',
  headers: { tenantId: 'tenant-1', operation: 'Create', application: 'notifier' },
};

describe('buildCommunicationPayload', () => {
  it('renders the communication request', () => {
    expect(buildCommunicationPayload('NEW_DOCUMENT', 'P-100')).toBe(
      '<Communication xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" ' +
        'xmlns:xsd="http://www.w3.org/2001/XMLSchema" ' +
        'xmlns="http://www.objectway.com/comm/request/communicationrequest">' +
        '<Type>NEW_DOCUMENT</Type><EntityID>P-100</EntityID><ExternalData></ExternalData>' +
        '</Communication>'
    );
  });
});

describe('buildBrokerHeaders', () => {
  it('prefixes routing headers with a dollar sign', () => {
    expect(buildBrokerHeaders(SETTINGS.headers)).toEqual({
      $tenantid: 'tenant-1',
      $operation: 'Create',
      $application: 'notifier',
    });
  });
});

describe('BrokerNotifier', () => {
  it('publishes one message per document keyed by the document id', async () => {
    const publisher = makeFakeBrokerPublisher();
    const notifier = makeBrokerNotifier({ publisher, settings: SETTINGS, logger: makeTestLogger() });
    const target = makeProcessedDocument({ documentId: 'DOC-7', portfolioId: 'P-7' });

    const dispatcher = await notifier.prepareBatch([target]);
    const result = await dispatcher.dispatch(target);

    expect(notifier.mode).toBe('broker');
    expect(result.isOk()).toBe(true);
    expect(publisher.published).toEqual([
      {
        exchange: 'communications',
        routingKey: 'document.created',
        body: buildCommunicationPayload('NEW_DOCUMENT', 'P-7'),
        messageId: 'DOC-7',
        contentType: 'application/xml',
        headers: { $tenantid: 'tenant-1', $operation: 'Create', $application: 'notifier' },
      },
    ]);
  });

  it('maps a publisher failure to a broker publish error', async () => {
    const publisher = makeFakeBrokerPublisher({
      failWith: { type: 'UNROUTABLE', message: 'no queue bound' },
    });
    const notifier = makeBrokerNotifier({ publisher, settings: SETTINGS, logger: makeTestLogger() });
    const target = makeProcessedDocument();

    const dispatcher = await notifier.prepareBatch([target]);
    const result = await dispatcher.dispatch(target);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: 'BrokerPublishError', message: 'no queue bound' });
    }
  });
});
