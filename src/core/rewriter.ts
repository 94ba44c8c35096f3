/**
 * Rewriter
 *
 * Builds the translated file by copying the untouched gaps and the
 * substituted spans into a fresh buffer in one forward pass. Every
 * replacement is addressed by the span's original offsets, so a translation
 * that is longer or shorter than its source never shifts a later edit.
 *
 * Dry-run uses the same substitution and reports a unified diff instead of
 * writing; applying that diff to the original yields the exact bytes a real
 * run would have written.
 */

import { applyPatch, createTwoFilesPatch, structuredPatch } from 'diff';
import { log } from '../util/log';
import { restoreWhitespace } from './chunker';
import { toError } from './errors';
import { extractSpans, nestedOpenersFor } from './spanExtractor';
import { LanguageProfile, LexicalRule, Span } from './types';

export interface Replacement {
  span: Span;
  text: string;
}

export interface DiffReport {
  path: string;
  patch: string;
  additions: number;
  deletions: number;
}

/**
 * Replace each span's text with its replacement, leaving everything else
 * byte-for-byte intact. Replacements must be sorted and non-overlapping.
 */
export function rewrite(source: string, replacements: readonly Replacement[]): string {
  const parts: string[] = [];
  let prevEnd = 0;

  for (const { span, text } of replacements) {
    if (span.start < prevEnd) {
      throw new Error(`Replacement at ${span.start} overlaps previous replacement ending at ${prevEnd}`);
    }
    if (span.end < span.start || span.end > source.length) {
      throw new RangeError(`Span ${span.start}..${span.end} is outside a buffer of length ${source.length}`);
    }
    parts.push(source.slice(prevEnd, span.start), text);
    prevEnd = span.end;
  }

  parts.push(source.slice(prevEnd));
  return parts.join('');
}

/**
 * Turn a backend translation into the text written in place of the span.
 * Returns null when the result is identical to the original, or when the
 * encoded text still would not read back as the same span.
 */
export function toReplacement(span: Span, translated: string, profile: LanguageProfile): Replacement | null {
  const restored = restoreWhitespace(span.rawText, translated);
  if (restored === span.rawText) {
    return null;
  }
  const text = encodeForSpan(span, restored, profile);
  if (text === span.rawText || !readsBackAs(span, text, profile)) {
    return null;
  }
  return { span, text };
}

/**
 * Keep translated text from escaping its span: a newline would end a line
 * comment early, a closing marker would end a block comment or string, and
 * a nested opener would leave it unterminated. A tail that completes the
 * closer (`Say "hi"` before `"""`) is escaped or padded with a space.
 */
export function encodeForSpan(span: Span, text: string, profile: LanguageProfile): string {
  if (text === span.rawText) {
    return text;
  }

  const { rule } = span;
  let out: string;

  if (rule.end === null) {
    out = text.replace(/\r?\n/g, ' ');
  } else if (rule.escape !== undefined) {
    out = closeAtBoundary(escapeDelimiters(text, rule, rule.end, rule.escape), rule.end, rule.escape, []);
  } else {
    const openers = nestedOpenersFor(profile, rule);
    out = closeAtBoundary(neutralizeMarkers(text, rule, rule.end, openers), rule.end, undefined, openers);
  }

  return guardOpener(out, rule, profile);
}

function escapeDelimiters(text: string, rule: LexicalRule, end: string, escape: string): string {
  let out = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === escape) {
      // Keep existing escape sequences; a dangling escape char is doubled
      out += i + 1 < text.length ? text.slice(i, i + 2) : escape + escape;
      i += 2;
      continue;
    }
    if (text.startsWith(end, i)) {
      out += escape + ch;
      i += 1;
      continue;
    }
    if (rule.singleLine && ch === '\n') {
      out += `${escape}n`;
      i += 1;
      continue;
    }
    if (rule.singleLine && ch === '\r') {
      i += 1;
      continue;
    }
    out += ch;
    i += 1;
  }

  return out;
}

function neutralizeMarkers(text: string, rule: LexicalRule, end: string, openers: readonly string[]): string {
  let out = text.split(end).join(spaced(end));
  for (const opener of openers) {
    out = out.split(opener).join(spaced(opener));
  }
  if (rule.singleLine) {
    out = out.replace(/\r?\n/g, ' ');
  }
  return out;
}

/**
 * Fix a tail that runs into the closer: escape the offending character, or
 * pad with a space where the construct has no escapes.
 */
function closeAtBoundary(text: string, end: string, escape: string | undefined, openers: readonly string[]): string {
  let out = text;
  for (let attempt = 0; attempt <= end.length; attempt++) {
    const at = earlyClose(out, end, escape, openers);
    if (at === -1) {
      break;
    }
    out = escape !== undefined && at < out.length ? out.slice(0, at) + escape + out.slice(at) : `${out} `;
  }
  return out;
}

/**
 * Where `text` followed by `end` stops reading as one construct: the
 * offset of a closer or opener that starts inside the text, or -1.
 */
function earlyClose(text: string, end: string, escape: string | undefined, openers: readonly string[]): number {
  const framed = text + end;
  let depth = 1;
  let i = 0;

  while (i < text.length) {
    if (escape !== undefined && framed[i] === escape) {
      i += 2;
      continue;
    }
    if (framed.startsWith(end, i)) {
      depth -= 1;
      if (depth === 0) return i;
      i += end.length;
      continue;
    }
    const opener = openers.find(candidate => framed.startsWith(candidate, i));
    if (opener !== undefined) {
      if (i + opener.length > text.length) return i;
      depth += 1;
      i += opener.length;
      continue;
    }
    i += 1;
  }

  return depth === 1 && i === text.length ? -1 : text.length;
}

/** `// ` + `/ x` would read as `/// x`; a leading space keeps the opener */
function guardOpener(text: string, rule: LexicalRule, profile: LanguageProfile): string {
  const written = rule.start + text;
  const longer = profile.rules.some(
    other => other.start.length > rule.start.length && other.start.startsWith(rule.start) && written.startsWith(other.start)
  );
  return longer ? ` ${text}` : text;
}

function readsBackAs(span: Span, text: string, profile: LanguageProfile): boolean {
  const written = span.rule.start + text + (span.rule.end ?? '');
  const { spans, warnings } = extractSpans(written, profile, { translateAll: true });
  return warnings.length === 0 && spans.length === 1 && spans[0].kind === span.kind && spans[0].rawText === text;
}

/** `*\/` becomes `* /`; a one-character marker is dropped */
function spaced(marker: string): string {
  return marker.length > 1 ? marker.split('').join(' ') : '';
}

/**
 * Unified diff between the original and rewritten file
 */
export function createDiffReport(filePath: string, before: string, after: string): DiffReport {
  const patch = createTwoFilesPatch(filePath, filePath, before, after, 'original', 'translated');
  const { hunks } = structuredPatch(filePath, filePath, before, after, 'original', 'translated');

  let additions = 0;
  let deletions = 0;
  for (const hunk of hunks) {
    for (const line of hunk.lines) {
      if (line.startsWith('+')) additions++;
      else if (line.startsWith('-')) deletions++;
    }
  }

  return { path: filePath, patch, additions, deletions };
}

/**
 * Apply a dry-run report to the original text.
 * Returns null when the patch does not apply or cannot be parsed back
 * (a lone carriage return splits a patch line in two).
 */
export function applyDiffReport(original: string, report: DiffReport): string | null {
  let result: string | false;
  try {
    result = applyPatch(original, report.patch);
  } catch (error) {
    log(`[Rewriter] Patch for ${report.path} is unreadable: ${toError(error).message}`);
    return null;
  }
  return result === false ? null : result;
}
