/**
 * Translation prompts for LLM backends
 *
 * A chunk is sent as its span payloads joined by the separator line; the
 * model is told to return the translations joined the same way so that
 * the reply can be split back into one string per span.
 */

import { SEPARATOR_MARKER, joinPayloads } from '../core/chunker';
import { SpanKind } from '../core/types';
import { TranslationRequest } from './types';

/** Language display names for prompts */
const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  ja: 'Japanese',
  zh: 'Chinese',
  'zh-tw': 'Traditional Chinese',
  ko: 'Korean',
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  it: 'Italian',
  pt: 'Portuguese',
  ru: 'Russian',
  ar: 'Arabic',
  hi: 'Hindi',
  vi: 'Vietnamese',
  th: 'Thai',
  nl: 'Dutch',
  pl: 'Polish',
  tr: 'Turkish',
  uk: 'Ukrainian',
  cs: 'Czech',
  sv: 'Swedish',
};

/**
 * Display name for a language code; names like "Chinese" pass through
 */
export function getLanguageName(code: string): string {
  return LANGUAGE_NAMES[code.toLowerCase()] || code;
}

const KIND_LABELS: Record<SpanKind, string> = {
  LineComment: 'code comments',
  BlockComment: 'code comments',
  Docstring: 'documentation comments',
  StringLiteral: 'string literals',
};

function describeContents(kinds: readonly SpanKind[] | undefined): string {
  if (!kinds || kinds.length === 0) {
    return 'code comments';
  }
  const labels = [...new Set(kinds.map(kind => KIND_LABELS[kind]))];
  return labels.length === 1 ? labels[0] : `${labels.slice(0, -1).join(', ')} and ${labels[labels.length - 1]}`;
}

/**
 * Build the prompt for one chunk.
 *
 * Structure rules mirror what the rewriter needs: same number of segments,
 * same line structure, markup and code left alone.
 */
export function buildChunkPrompt(request: TranslationRequest): string {
  const sourceLanguage = getLanguageName(request.sourceLang);
  const targetLanguage = getLanguageName(request.targetLang);
  const contents = describeContents(request.kinds);
  const count = request.texts.length;

  return `You are a specialized translator for source code ${contents}.

Translate the following ${sourceLanguage} ${contents} to ${targetLanguage}.

IMPORTANT - INPUT FORMAT:
There ${count === 1 ? 'is 1 segment' : `are ${count} segments`}. Segments are separated by a line containing only ${SEPARATOR_MARKER}

IMPORTANT - OUTPUT FORMAT:
Return ONLY the translated segments, in the same order, separated by the same ${SEPARATOR_MARKER} line.
Return exactly ${count} segment${count === 1 ? '' : 's'}. Do not number them, do not wrap them in code fences.

STRUCTURE PRESERVATION RULES:
1. Keep the same number of lines in every segment
2. Keep leading comment decoration (such as " * ") on each line
3. Keep doc annotations (@param, @returns, :param:, Args:) and only translate their descriptions
4. Keep code, identifiers, URLs, format placeholders (%s, {0}, {name}) and escape sequences exactly as they are
5. Keep TODO, FIXME, NOTE, HACK, XXX markers unchanged
6. If a segment is already in ${targetLanguage} or has nothing to translate, return it unchanged

TRANSLATION GUIDELINES:
- Translate naturally as a native ${targetLanguage} speaker would write
- Keep technical terms and API names unchanged
- Do NOT add explanations or notes, only the translation

Segments to translate:
${joinPayloads(request.texts)}`;
}

/**
 * Remove a single code fence the model may wrap its answer in
 */
export function stripCodeFence(response: string): string {
  const trimmed = response.trim();
  const match = trimmed.match(/^```[\w-]*\r?\n([\s\S]*?)\r?\n```$/);
  return match ? match[1] : trimmed;
}
