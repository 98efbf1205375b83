/**
 * Tests for the testing utilities
 */

import { describe, it, expect } from 'vitest';
import { NetworkError } from '../../errors/index.js';
import { decodeResponse, getText } from '../../xml/index.js';
import {
  MockTransport,
  createTestConfig,
  fixedClock,
  notAuthorizedResponse,
  requestErrorResponse,
  successResponse,
} from '../index.js';

describe('MockTransport', () => {
  it('replays queued replies in order and records requests', async () => {
    const transport = new MockTransport().enqueueXml('<A/>').enqueueXml('<B/>', 400);

    const first = await transport.send({ method: 'GET', url: 'https://mturk.example/?a=1', headers: {} });
    const second = await transport.send({ method: 'GET', url: 'https://mturk.example/?b=2', headers: {} });

    expect([first.status, first.body]).toEqual([200, '<A/>']);
    expect([second.status, second.body]).toEqual([400, '<B/>']);
    expect(transport.queryOf(1)).toEqual([['b', '2']]);
    expect(transport.pending).toBe(0);
  });

  it('fails when nothing is queued', async () => {
    const transport = new MockTransport();
    await expect(
      transport.send({ method: 'GET', url: 'https://mturk.example/', headers: {} })
    ).rejects.toBeInstanceOf(NetworkError);
  });

  it('throws queued errors', async () => {
    const transport = new MockTransport().enqueueError(NetworkError.timeout(5));
    await expect(
      transport.send({ method: 'GET', url: 'https://mturk.example/', headers: {} })
    ).rejects.toThrow('Request timeout after 5ms');
  });

  it('resets', () => {
    const transport = new MockTransport().enqueueXml('<A/>');
    transport.reset();
    expect(transport.pending).toBe(0);
    expect(transport.queryOf(0)).toEqual([]);
  });
});

describe('fixtures', () => {
  it('builds decodable success and error bodies', () => {
    expect(getText(decodeResponse(successResponse('GetHIT', 'HIT')), 'HIT', 'Request', 'IsValid')).toBe(
      'True'
    );
    expect(
      getText(decodeResponse(notAuthorizedResponse('GetHIT')), 'OperationRequest', 'Errors', 'Error', 'Code')
    ).toBe('AWS.NotAuthorized');
    expect(
      getText(
        decodeResponse(requestErrorResponse('GetHIT', 'HIT', [{ code: 'X', message: 'y' }])),
        'HIT',
        'Request',
        'Errors',
        'Error',
        'Code'
      )
    ).toBe('X');
  });
});

describe('fixedClock', () => {
  it('returns the same instant every time', () => {
    const clock = fixedClock('2014-08-15T12:00:00Z');
    expect(clock().toISOString()).toBe('2014-08-15T12:00:00.000Z');
    expect(clock().getTime()).toBe(clock().getTime());
  });
});

describe('createTestConfig', () => {
  it('applies overrides', () => {
    expect(createTestConfig({ mode: 'sandbox' }).mode).toBe('sandbox');
    expect(createTestConfig().secretAccessKey).toBe('test-secret');
  });
});
