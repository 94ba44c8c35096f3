/**
 * Chunker
 *
 * Packs an ordered span list into batches for one backend request each.
 * Packing is greedy and never splits a span: a span that alone exceeds the
 * budget becomes its own oversized chunk, and the gateway decides what to do
 * with it.
 *
 * What gets sent is the span's payload, its text with surrounding whitespace
 * trimmed. The whitespace is put back around the translation afterwards so
 * that `// comment` keeps its space after the marker.
 */

import { GatewayError } from './errors';
import { Chunk, Span, TextFilter } from './types';

export const DEFAULT_MAX_CHUNK_SIZE = 5000;

/** Marker line placed between span payloads in a chunk */
export const SEPARATOR_MARKER = '<<<#>>>';
export const SPAN_SEPARATOR = `\n${SEPARATOR_MARKER}\n`;

const SEPARATOR_PATTERN = /\r?\n[ \t]*<<<#>>>[ \t]*\r?\n/;

const NON_ASCII = /[^\x00-\x7f]/;
// Hiragana, Katakana, CJK Unified Ideographs (and Extension A), Hangul
const CJK = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af]/;

export interface ChunkOptions {
  /** Character budget per chunk */
  maxChunkSize?: number;
  textFilter?: TextFilter;
}

/**
 * Text sent to the backend for a span
 */
export function payloadOf(rawText: string): string {
  return rawText.trim();
}

/**
 * Whether a payload passes the configured filter
 */
export function isTranslatable(payload: string, filter: TextFilter = 'any'): boolean {
  if (payload.length === 0) return false;
  switch (filter) {
    case 'any':
      return true;
    case 'non-ascii':
      return NON_ASCII.test(payload);
    case 'cjk':
      return CJK.test(payload);
  }
}

/**
 * Put the span's original leading and trailing whitespace around a translation
 */
export function restoreWhitespace(rawText: string, translated: string): string {
  const core = translated.trim();
  if (rawText.trim().length === 0) {
    return rawText;
  }
  const leading = rawText.slice(0, rawText.length - rawText.trimStart().length);
  const trailing = rawText.slice(rawText.trimEnd().length);
  return `${leading}${core}${trailing}`;
}

/**
 * Join a chunk's payloads into the text the prompt carries
 */
export function joinPayloads(payloads: readonly string[]): string {
  return payloads.join(SPAN_SEPARATOR);
}

/**
 * Split a backend reply back into per-span translations.
 * A reply that does not keep every separator is a protocol violation.
 */
export function splitTranslation(text: string, expectedCount: number): string[] {
  const parts = expectedCount === 1 ? [text] : text.split(SEPARATOR_PATTERN);
  if (parts.length !== expectedCount) {
    throw new GatewayError(
      'GatewayProtocolError',
      `Expected ${expectedCount} segments separated by ${SEPARATOR_MARKER}, got ${parts.length}`
    );
  }
  return parts.map(part => part.trim());
}

export class Chunker {
  private readonly maxChunkSize: number;
  private readonly textFilter: TextFilter;

  constructor(options: ChunkOptions = {}) {
    this.maxChunkSize = options.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE;
    this.textFilter = options.textFilter ?? 'any';
  }

  /**
   * Spans worth translating: non-empty, passing the filter, and free of the
   * separator marker (which would make the reply impossible to split)
   */
  selectSpans(spans: readonly Span[]): Span[] {
    return spans.filter(span => {
      const payload = payloadOf(span.rawText);
      return isTranslatable(payload, this.textFilter) && !payload.includes(SEPARATOR_MARKER);
    });
  }

  chunk(spans: readonly Span[]): Chunk[] {
    const chunks: Chunk[] = [];
    let currentSpans: Span[] = [];
    let currentPayloads: string[] = [];
    let currentSize = 0;

    const flush = () => {
      if (currentSpans.length === 0) return;
      chunks.push({ index: chunks.length, spans: currentSpans, payloads: currentPayloads });
      currentSpans = [];
      currentPayloads = [];
      currentSize = 0;
    };

    for (const span of this.selectSpans(spans)) {
      const payload = payloadOf(span.rawText);

      if (
        currentSpans.length > 0 &&
        currentSize + SPAN_SEPARATOR.length + payload.length > this.maxChunkSize
      ) {
        flush();
      }

      currentSize += (currentSpans.length > 0 ? SPAN_SEPARATOR.length : 0) + payload.length;
      currentSpans.push(span);
      currentPayloads.push(payload);
    }

    flush();
    return chunks;
  }
}

/**
 * One-off chunking without keeping a chunker around
 */
export function chunkSpans(spans: readonly Span[], options?: ChunkOptions): Chunk[] {
  return new Chunker(options).chunk(spans);
}
