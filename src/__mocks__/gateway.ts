/**
 * Fake translation gateway
 *
 * Deterministic stand-in for a backend. By default every text comes back
 * with a prefix; tests can make it echo input, fail a given call, or fail
 * whenever a text contains some marker.
 */

import { GatewayError } from '../core/errors';
import { TranslationGateway, TranslationRequest } from '../gateway/types';

export type FakeBehavior =
  | { type: 'prefix'; prefix: string }
  | { type: 'identity' }
  | { type: 'map'; translate: (text: string) => string };

export interface FakeCall {
  texts: string[];
  sourceLang: string;
  targetLang: string;
}

export class FakeGateway implements TranslationGateway {
  readonly name = 'fake';
  /** Track calls for assertions */
  readonly calls: FakeCall[] = [];
  private behavior: FakeBehavior = { type: 'prefix', prefix: 'EN:' };
  private readonly scriptedErrors: Array<GatewayError | null> = [];
  private failingMarker: { marker: string; error: GatewayError } | null = null;
  /** Resolve each call only after this many milliseconds */
  delayMs = 0;

  setBehavior(behavior: FakeBehavior): this {
    this.behavior = behavior;
    return this;
  }

  /**
   * Queue outcomes for the next calls: an error fails that call, null lets
   * it through
   */
  script(...outcomes: Array<GatewayError | null>): this {
    this.scriptedErrors.push(...outcomes);
    return this;
  }

  /** Fail every call whose texts contain `marker` */
  failWhenTextContains(marker: string, error: GatewayError): this {
    this.failingMarker = { marker, error };
    return this;
  }

  async translate(request: TranslationRequest, signal?: AbortSignal): Promise<string[]> {
    this.calls.push({ texts: [...request.texts], sourceLang: request.sourceLang, targetLang: request.targetLang });

    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    if (signal?.aborted) {
      throw new GatewayError('GatewayUnavailable', 'aborted', { retryable: false });
    }

    const scripted = this.scriptedErrors.shift();
    if (scripted) {
      throw scripted;
    }
    const failing = this.failingMarker;
    if (failing && request.texts.some(text => text.includes(failing.marker))) {
      throw failing.error;
    }

    return request.texts.map(text => this.apply(text));
  }

  private apply(text: string): string {
    switch (this.behavior.type) {
      case 'prefix':
        return `${this.behavior.prefix}${text}`;
      case 'identity':
        return text;
      case 'map':
        return this.behavior.translate(text);
    }
  }
}
