/**
 * Tests for the requester API client
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  MissingParameterError,
  NetworkError,
  NotAuthorizedError,
  RequestValidationError,
  UnclassifiedError,
} from '../../errors/index.js';
import type { Logger } from '../../observability/logging.js';
import { OPERATIONS, defineOperation } from '../../operations/definitions.js';
import {
  MockTransport,
  createTestConfig,
  fixedClock,
  notAuthorizedResponse,
  requestErrorResponse,
  successResponse,
} from '../../testing/index.js';
import { getText } from '../../xml/parser.js';
import { MTurkClientImpl } from '../client.js';
import { createClient } from '../factory.js';

type Entry = [level: string, message: string, context: unknown];

function createRecordingLogger(entries: Entry[]): Logger {
  return {
    error: (message, context) => void entries.push(['error', message, context]),
    warn: (message, context) => void entries.push(['warn', message, context]),
    info: (message, context) => void entries.push(['info', message, context]),
    debug: (message, context) => void entries.push(['debug', message, context]),
    trace: (message, context) => void entries.push(['trace', message, context]),
  };
}

async function capture(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('MTurkClientImpl', () => {
  let transport: MockTransport;
  let entries: Entry[];
  let client: MTurkClientImpl;

  beforeEach(() => {
    transport = new MockTransport();
    entries = [];
    client = new MTurkClientImpl(
      createTestConfig({
        defaults: {
          production: { LifetimeInSeconds: 86400, MaxAssignments: 5 },
          sandbox: { MaxAssignments: 1 },
        },
      }),
      { transport, logger: createRecordingLogger(entries), clock: fixedClock('2014-08-15T12:00:00Z') }
    );
  });

  describe('invoke', () => {
    it('returns the decoded tree on success', async () => {
      transport.enqueueXml(
        successResponse(
          'GetAccountBalance',
          'GetAccountBalanceResult',
          '<AvailableBalance><Amount>10000.00</Amount><CurrencyCode>USD</CurrencyCode></AvailableBalance>'
        )
      );

      const tree = await client.invoke(OPERATIONS.getAccountBalance);

      expect(getText(tree, 'GetAccountBalanceResult', 'AvailableBalance', 'Amount')).toBe('10000.00');
      expect(getText(tree, 'OperationRequest', 'RequestId')).toBe('test-request-id');
    });

    it('sends one signed GET to the production endpoint', async () => {
      transport.enqueueXml(successResponse('GetAccountBalance', 'GetAccountBalanceResult'));

      await client.invoke(OPERATIONS.getAccountBalance);

      expect(transport.requests).toHaveLength(1);
      expect(transport.requests[0]).toEqual({
        method: 'GET',
        url:
          'https://mturk-requester.us-east-1.amazonaws.com?Service=AWSMechanicalTurkRequester' +
          '&AWSAccessKeyId=test-access-key&Version=2014-08-15&Operation=GetAccountBalance' +
          '&Signature=bwkAIFql5gs3hWOgRAMyAjlymyI%3D&Timestamp=2014-08-15T12%3A00%3A00Z',
        headers: {},
      });
    });

    it('does not send a request with a missing parameter', async () => {
      const error = await capture(client.invoke(OPERATIONS.getHIT, {}));

      expect(error).toBeInstanceOf(MissingParameterError);
      expect(error).toMatchObject({ parameter: 'HITId' });
      expect(transport.requests).toHaveLength(0);
    });

    it('raises NotAuthorizedError', async () => {
      transport.enqueueXml(notAuthorizedResponse('GetHIT'));

      const error = await capture(client.invoke(OPERATIONS.getHIT, { HITId: 'HIT-1' }));

      expect(error).toBeInstanceOf(NotAuthorizedError);
    });

    it('raises RequestValidationError', async () => {
      transport.enqueueXml(
        requestErrorResponse('GrantBonus', 'GrantBonusResult', [
          { code: 'AWS.MechanicalTurk.InsufficientFunds', message: 'Not enough funds.' },
        ])
      );

      const error = await capture(
        client.invoke(OPERATIONS.grantBonus, {
          WorkerId: 'W-1',
          AssignmentId: 'A-1',
          BonusAmount: 1.5,
          Reason: 'Great work',
        })
      );

      expect(error).toBeInstanceOf(RequestValidationError);
      expect(error).toMatchObject({ code: 'AWS.MechanicalTurk.InsufficientFunds' });
    });

    it('raises UnclassifiedError for an undecodable body', async () => {
      transport.enqueueXml('<html><body>Bad Gateway', 502);

      const error = await capture(client.invoke(OPERATIONS.getAccountBalance));

      expect(error).toBeInstanceOf(UnclassifiedError);
      expect(error).toMatchObject({ status: 502 });
    });

    it('passes transport errors through', async () => {
      transport.enqueueError(NetworkError.timeout(30000));

      const error = await capture(client.invoke(OPERATIONS.getAccountBalance));

      expect(error).toBeInstanceOf(NetworkError);
    });

    it('merges production defaults', async () => {
      transport.enqueueXml(successResponse('CreateHIT', 'HIT'));

      await client.invoke(OPERATIONS.createHITByTypeIdAndLayoutId, {
        HITTypeId: 'TYPE-1',
        HITLayoutId: 'LAYOUT-1',
        HITLayoutParameter: [{ Name: 'word', Value: 'hello world' }],
      });

      expect(transport.queryOf(0).slice(6)).toEqual([
        ['HITTypeId', 'TYPE-1'],
        ['HITLayoutId', 'LAYOUT-1'],
        ['LifetimeInSeconds', '86400'],
        ['MaxAssignments', '5'],
        ['HITLayoutParameter.1.Name', 'word'],
        ['HITLayoutParameter.1.Value', 'hello world'],
      ]);
    });

    it('logs without credentials or signature', async () => {
      transport.enqueueXml(successResponse('GetAccountBalance', 'GetAccountBalanceResult'));
      transport.enqueueXml(notAuthorizedResponse('GetAccountBalance'));

      await client.invoke(OPERATIONS.getAccountBalance);
      await capture(client.invoke(OPERATIONS.getAccountBalance));

      expect(entries.map(([level, message]) => [level, message])).toEqual([
        ['debug', 'Sending requester API request'],
        ['info', 'Requester API operation completed'],
        ['debug', 'Sending requester API request'],
        ['warn', 'Requester API operation failed'],
      ]);
      expect(entries[3]?.[2]).toEqual({
        operation: 'GetAccountBalance',
        type: 'not_authorized',
        code: 'AWS.NotAuthorized',
        status: 200,
      });
      const logged = JSON.stringify(entries);
      expect(logged.includes('test-access-key')).toBe(false);
      expect(logged.includes('test-secret')).toBe(false);
      expect(logged.includes('bwkAIFql5gs3hWOgRAMyAjlymyI')).toBe(false);
    });
  });

  describe('modes', () => {
    it('starts in the configured mode', () => {
      expect(client.mode).toBe('production');
      expect(client.endpoint.url).toBe('https://mturk-requester.us-east-1.amazonaws.com');
    });

    it('switches endpoint and defaults together', () => {
      const sandbox = client.sandbox();

      expect(sandbox.mode).toBe('sandbox');
      expect(sandbox.endpoint).toEqual({
        mode: 'sandbox',
        url: 'https://mturk-requester-sandbox.us-east-1.amazonaws.com',
        region: 'us-east-1',
        defaults: { LifetimeInSeconds: 86400, MaxAssignments: 1 },
      });
      expect(client.mode).toBe('production');
    });

    it('switches back to production', () => {
      const production = client.withMode('sandbox').production();

      expect(production.mode).toBe('production');
      expect(production.endpoint.defaults).toEqual({ LifetimeInSeconds: 86400, MaxAssignments: 5 });
    });

    it('sends sandbox requests to the sandbox endpoint with sandbox defaults', async () => {
      transport.enqueueXml(successResponse('CreateHIT', 'HIT'));

      await client.sandbox().hits.createHITByTypeIdAndLayoutId({
        HITTypeId: 'TYPE-1',
        HITLayoutId: 'LAYOUT-1',
        HITLayoutParameter: [],
      });

      const url = transport.requests[0]?.url ?? '';
      expect(url.startsWith('https://mturk-requester-sandbox.us-east-1.amazonaws.com?')).toBe(true);
      expect(transport.queryOf(0)).toContainEqual(['MaxAssignments', '1']);
      expect(transport.queryOf(0)).toContainEqual(['LifetimeInSeconds', '86400']);
    });
  });

  describe('buildRequest', () => {
    it('builds without sending', () => {
      const request = client.buildRequest(OPERATIONS.getHIT, { HITId: 'HIT-123' });

      expect(request.signature).toBe('uhoUGGSgHLuCzPlhhjGNgu5a+C4=');
      expect(request.url.endsWith('&HITId=HIT-123')).toBe(true);
      expect(transport.requests).toHaveLength(0);
    });
  });
});

describe('createClient', () => {
  it('validates configuration and injects collaborators', async () => {
    const transport = new MockTransport().enqueueXml(
      successResponse('GetAccountBalance', 'GetAccountBalanceResult')
    );
    const client = createClient(
      { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret', mode: 'sandbox' },
      { transport, clock: fixedClock('2014-08-15T12:00:00Z') }
    );

    await client.account.getAccountBalance();

    expect(client.mode).toBe('sandbox');
    expect(transport.queryOf(0)).toContainEqual(['Signature', 'bwkAIFql5gs3hWOgRAMyAjlymyI=']);
  });

  it('keeps defaults fixed after construction', () => {
    const keywords = ['a'];
    const client = createClient(
      {
        accessKeyId: 'test-access-key',
        secretAccessKey: 'test-secret',
        defaults: { production: { MaxAssignments: 3, Keywords: keywords } },
      },
      { transport: new MockTransport(), clock: fixedClock('2014-08-15T12:00:00Z') }
    );
    const spec = defineOperation({
      operation: 'CreateHIT',
      required: ['MaxAssignments'],
      structured: ['Keywords'],
      resultKey: 'HIT',
    });

    keywords.push('injected');
    expect(Reflect.set(client.endpoint.defaults, 'MaxAssignments', 99)).toBe(false);

    expect(client.buildRequest(spec).url.endsWith('&MaxAssignments=3&Keywords=a')).toBe(true);
  });

  it('rejects missing credentials', () => {
    expect(() => createClient({ accessKeyId: '', secretAccessKey: '' })).toThrow(
      'An access key ID and a secret access key are required'
    );
  });
});
