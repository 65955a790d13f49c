import { describe, expect, it } from 'vitest';

import { makeBrokerHealthChecker, makeSmtpHealthChecker } from '@/modules/health/index.js';

import { makeFakeBrokerPublisher, makeFakeEmailSender } from '../../fixtures/fakes.js';

describe('makeBrokerHealthChecker', () => {
  it('is healthy when the connection opens', async () => {
    const result = await makeBrokerHealthChecker(makeFakeBrokerPublisher())();

    expect(result.name).toBe('broker');
    expect(result.status).toBe('healthy');
    expect(result.critical).toBe(true);
  });

  it('reports the connection error', async () => {
    const publisher = makeFakeBrokerPublisher({
      connectionError: { type: 'CONNECTION', message: 'ECONNREFUSED' },
    });

    const result = await makeBrokerHealthChecker(publisher, { name: 'rabbitmq' })();

    expect(result).toMatchObject({ name: 'rabbitmq', status: 'unhealthy', message: 'ECONNREFUSED', critical: true });
  });
});

describe('makeSmtpHealthChecker', () => {
  it('is critical by default', async () => {
    const result = await makeSmtpHealthChecker(makeFakeEmailSender())();

    expect(result).toMatchObject({ name: 'smtp', status: 'healthy', critical: true });
  });

  it('can be marked non-critical', async () => {
    const sender = makeFakeEmailSender({ verifyError: { type: 'AUTH', message: 'Invalid login' } });

    const result = await makeSmtpHealthChecker(sender, { critical: false })();

    expect(result).toMatchObject({ name: 'smtp', status: 'unhealthy', message: 'Invalid login', critical: false });
  });
});
