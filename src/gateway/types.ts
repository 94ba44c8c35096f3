import { GatewayErrorCode } from '../core/errors';
import { SpanKind } from '../core/types';

/**
 * One batch of text for a backend
 */
export interface TranslationRequest {
  /** Ordered texts; the reply must be aligned 1:1 */
  texts: string[];
  sourceLang: string;
  targetLang: string;
  model?: string;
  /** What each text is (comment, docstring...), passed to prompts as context */
  kinds?: SpanKind[];
}

export interface GatewayFailure {
  kind: GatewayErrorCode;
  message: string;
}

/**
 * Outcome of a request after timeout, retries and the alignment check
 */
export type TranslationResponse =
  | { ok: true; translated: string[]; attempts: number }
  | { ok: false; failure: GatewayFailure; attempts: number };

export interface ModelInfo {
  name: string;
  /** Size on disk in bytes, when the backend reports it */
  size?: number;
}

/**
 * A translation backend. Implementations throw GatewayError on failure;
 * everything else about them is opaque to the pipeline.
 */
export interface TranslationGateway {
  readonly name: string;
  translate(request: TranslationRequest, signal?: AbortSignal): Promise<string[]>;
  listModels?(): Promise<ModelInfo[]>;
}
