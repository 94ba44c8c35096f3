/**
 * Tests for the timeout/retry layer around gateways
 */

import { GatewayError } from '../core/errors';
import { requestTranslation, sleep, toGatewayError } from '../gateway/retry';
import { TranslationGateway, TranslationRequest } from '../gateway/types';
import { FakeGateway } from '../__mocks__/gateway';

jest.mock('../util/log', () => ({ log: jest.fn(), getLogFilePath: () => 'translator.log' }));

const request: TranslationRequest = { texts: ['注释'], sourceLang: 'zh', targetLang: 'en' };
const fast = { baseDelayMs: 1, maxDelayMs: 5 };

describe('requestTranslation', () => {
  it('should return the translations on success', async () => {
    const gateway = new FakeGateway();

    const response = await requestTranslation(gateway, request, fast);

    expect(response).toEqual({ ok: true, translated: ['EN:注释'], attempts: 1 });
  });

  it('should retry timeouts and unavailability with backoff', async () => {
    const gateway = new FakeGateway().script(
      new GatewayError('GatewayTimeout', 'slow'),
      new GatewayError('GatewayUnavailable', 'down'),
      null
    );
    const onRetry = jest.fn();

    const response = await requestTranslation(gateway, request, { baseDelayMs: 1, maxDelayMs: 100, maxRetries: 3, onRetry });

    expect(response).toEqual({ ok: true, translated: ['EN:注释'], attempts: 3 });
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[0][3]).toBe(1);
    expect(onRetry.mock.calls[1][0]).toBe(2);
    expect(onRetry.mock.calls[1][3]).toBe(2);
  });

  it('should never retry protocol errors', async () => {
    const gateway = new FakeGateway().script(new GatewayError('GatewayProtocolError', 'bad reply'));

    const response = await requestTranslation(gateway, request, fast);

    expect(response).toEqual({
      ok: false,
      failure: { kind: 'GatewayProtocolError', message: 'bad reply' },
      attempts: 1,
    });
    expect(gateway.calls).toHaveLength(1);
  });

  it('should not retry errors marked non-retryable', async () => {
    const gateway = new FakeGateway().script(
      new GatewayError('GatewayUnavailable', 'not installed', { retryable: false })
    );

    const response = await requestTranslation(gateway, request, fast);

    expect(response.ok).toBe(false);
    expect(response.attempts).toBe(1);
  });

  it('should give up after maxRetries', async () => {
    const down = new GatewayError('GatewayUnavailable', 'down');
    const gateway = new FakeGateway().script(down, down, down, down);

    const response = await requestTranslation(gateway, request, { ...fast, maxRetries: 2 });

    expect(response).toEqual({
      ok: false,
      failure: { kind: 'GatewayUnavailable', message: 'down' },
      attempts: 3,
    });
  });

  it('should treat a reply of the wrong length as a protocol error', async () => {
    const gateway: TranslationGateway = {
      name: 'short',
      translate: async () => [],
    };

    const response = await requestTranslation(gateway, request, fast);

    expect(response).toEqual({
      ok: false,
      failure: { kind: 'GatewayProtocolError', message: 'short returned 0 translations for 1 texts' },
      attempts: 1,
    });
  });

  it('should time out a backend that does not answer', async () => {
    const gateway: TranslationGateway = {
      name: 'silent',
      translate: (_request, signal) =>
        new Promise(resolve => {
          signal?.addEventListener('abort', () => resolve([]));
        }),
    };

    const response = await requestTranslation(gateway, request, { ...fast, maxRetries: 0, timeoutMs: 20 });

    expect(response).toEqual({
      ok: false,
      failure: { kind: 'GatewayTimeout', message: 'Backend did not answer within 20ms' },
      attempts: 1,
    });
  });

  it('should map unknown errors to GatewayUnavailable', async () => {
    const gateway: TranslationGateway = {
      name: 'broken',
      translate: async () => {
        throw new Error('boom');
      },
    };

    const response = await requestTranslation(gateway, request, { ...fast, maxRetries: 0 });

    expect(response).toEqual({
      ok: false,
      failure: { kind: 'GatewayUnavailable', message: 'boom' },
      attempts: 1,
    });
  });

  it('should not call the backend once cancelled', async () => {
    const gateway = new FakeGateway();
    const controller = new AbortController();
    controller.abort();

    const response = await requestTranslation(gateway, request, { ...fast, signal: controller.signal });

    expect(response).toEqual({
      ok: false,
      failure: { kind: 'GatewayUnavailable', message: 'Request cancelled' },
      attempts: 0,
    });
    expect(gateway.calls).toHaveLength(0);
  });
});

describe('toGatewayError', () => {
  it('should pass gateway errors through', () => {
    const error = new GatewayError('GatewayTimeout', 'slow');
    expect(toGatewayError(error)).toBe(error);
  });

  it('should wrap anything else as retryable unavailability', () => {
    const wrapped = toGatewayError('socket hang up');
    expect(wrapped.code).toBe('GatewayUnavailable');
    expect(wrapped.retryable).toBe(true);
    expect(wrapped.message).toBe('socket hang up');
  });
});

describe('sleep', () => {
  it('should reject when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow('Aborted');
  });
});
