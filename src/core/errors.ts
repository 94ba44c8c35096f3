/**
 * Error taxonomy
 *
 * File-level errors mark one job skipped or failed, chunk-level gateway errors
 * leave that chunk's spans untranslated, and only ConfigError ends a run.
 */

export type TranslatorErrorCode =
  | 'UnsupportedLanguage'
  | 'DecodeError'
  | 'ExtractionError'
  | 'GatewayTimeout'
  | 'GatewayUnavailable'
  | 'GatewayProtocolError'
  | 'WriteError'
  | 'DiffError'
  | 'ConfigError';

export type GatewayErrorCode = Extract<
  TranslatorErrorCode,
  'GatewayTimeout' | 'GatewayUnavailable' | 'GatewayProtocolError'
>;

/**
 * Base class for every error the pipeline raises on purpose
 */
export class TranslatorError extends Error {
  readonly code: TranslatorErrorCode;

  constructor(code: TranslatorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

/** No language profile for the file's extension. The file is skipped. */
export class UnsupportedLanguageError extends TranslatorError {
  constructor(readonly extension: string) {
    super('UnsupportedLanguage', `No language profile for extension "${extension || '(none)'}"`);
  }
}

/** The file is not valid UTF-8 text. The file is skipped. */
export class DecodeError extends TranslatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DecodeError', message, options);
  }
}

/** The scanner reached a state it cannot recover from. The file fails. */
export class ExtractionError extends TranslatorError {
  constructor(message: string, readonly offset: number) {
    super('ExtractionError', `${message} (at offset ${offset})`);
  }
}

/** Writing the rewritten file failed. The original is left in place. */
export class WriteError extends TranslatorError {
  constructor(readonly filePath: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown error');
    super('WriteError', `Failed to write ${filePath}: ${reason}`, options);
  }
}

/** A dry-run patch does not reproduce the rewrite. The file fails unchanged. */
export class DiffError extends TranslatorError {
  constructor(readonly displayPath: string) {
    super('DiffError', `Dry-run patch for ${displayPath} does not reproduce the rewritten file`);
  }
}

/** Bad path, unreadable or invalid config file. Fatal to the run. */
export class ConfigError extends TranslatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ConfigError', message, options);
  }
}

/**
 * Failure reported by (or on behalf of) a translation backend.
 *
 * Timeouts and unavailability are retried unless `retryable` says otherwise;
 * protocol errors never are.
 */
export class GatewayError extends TranslatorError {
  declare readonly code: GatewayErrorCode;
  readonly retryable: boolean;

  constructor(
    code: GatewayErrorCode,
    message: string,
    options?: { cause?: unknown; retryable?: boolean }
  ) {
    super(code, message, options);
    this.retryable = options?.retryable ?? code !== 'GatewayProtocolError';
  }
}

/**
 * Narrow an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
