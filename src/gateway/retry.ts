/**
 * Timeout, retry and alignment checks around any gateway
 *
 * Timeouts and unavailability are retried with exponential backoff
 * (baseDelay * 2^attempt, capped at maxDelay). Protocol errors, including a
 * reply whose length does not match the request, fail at once.
 */

import { GatewayError, toError } from '../core/errors';
import { log } from '../util/log';
import { TranslationGateway, TranslationRequest, TranslationResponse } from './types';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff (default: 2000) */
  baseDelayMs?: number;
  /** Maximum delay cap in ms (default: 15000) */
  maxDelayMs?: number;
  /** Per-attempt timeout in ms (default: 120000) */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, maxRetries: number, error: GatewayError, delayMs: number) => void;
}

/**
 * Map anything a backend throws onto the gateway taxonomy.
 * Unknown errors count as the backend being unavailable.
 */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  const cause = toError(error);
  return new GatewayError('GatewayUnavailable', cause.message, { cause });
}

/**
 * Sleep that wakes early (and rejects) when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a backend call against a timer
 */
export async function withTimeout<T>(work: (signal: AbortSignal) => Promise<T>, timeoutMs: number, outer?: AbortSignal): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  outer?.addEventListener('abort', forwardAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new GatewayError('GatewayTimeout', `Backend did not answer within ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    outer?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Send one request through a gateway with timeout and retries.
 * Never throws: failures come back as `{ ok: false }`.
 */
export async function requestTranslation(
  gateway: TranslationGateway,
  request: TranslationRequest,
  options: RetryOptions = {}
): Promise<TranslationResponse> {
  const maxRetries = options.maxRetries ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 2000;
  const maxDelayMs = options.maxDelayMs ?? 15000;
  const timeoutMs = options.timeoutMs ?? 120_000;

  let lastError = new GatewayError('GatewayUnavailable', 'No attempt was made');
  let attempts = 0;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (options.signal?.aborted) {
      lastError = new GatewayError('GatewayUnavailable', 'Request cancelled', { retryable: false });
      break;
    }
    attempts++;

    try {
      const translated = await withTimeout(
        signal => gateway.translate(request, signal),
        timeoutMs,
        options.signal
      );

      if (translated.length !== request.texts.length) {
        throw new GatewayError(
          'GatewayProtocolError',
          `${gateway.name} returned ${translated.length} translations for ${request.texts.length} texts`
        );
      }

      return { ok: true, translated, attempts };
    } catch (error) {
      lastError = toGatewayError(error);

      if (!lastError.retryable || attempt >= maxRetries) {
        break;
      }

      const delayMs = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);

      log(`[Gateway] ${gateway.name} ${lastError.code} on attempt ${attempt + 1}/${maxRetries + 1}: ${lastError.message}`);
      log(`[Gateway] Retrying in ${delayMs}ms...`);

      options.onRetry?.(attempt + 1, maxRetries, lastError, delayMs);

      try {
        await sleep(delayMs, options.signal);
      } catch {
        break;
      }
    }
  }

  return {
    ok: false,
    failure: { kind: lastError.code, message: lastError.message },
    attempts,
  };
}
