/**
 * Kinds of translatable text a scan can produce
 */
export type SpanKind = 'LineComment' | 'BlockComment' | 'Docstring' | 'StringLiteral';

/**
 * One lexical rule of a language profile
 */
export interface LexicalRule {
  kind: SpanKind;
  /** Opening marker, e.g. `//`, `/*`, `"""`, `"` */
  start: string;
  /** Closing marker; null means the construct runs to end of line */
  end: string | null;
  /** Track depth and only close on a balanced closer */
  nests?: boolean;
  /** Escape character; suppresses delimiter matching for the next character */
  escape?: string;
  /** Close at the first newline (strings that cannot span lines) */
  singleLine?: boolean;
  /** Opener only counts when one character or one escape sequence precedes the closer */
  charLiteral?: boolean;
}

/**
 * Static lexical description of one source language
 */
export interface LanguageProfile {
  id: string;
  name: string;
  /** Lower-case extensions including the dot, e.g. `.py` */
  extensions: readonly string[];
  rules: readonly LexicalRule[];
}

/**
 * A contiguous, offset-addressed region of translatable text.
 * Offsets are UTF-16 code-unit offsets into the decoded file and exclude
 * the delimiters of the construct.
 */
export interface Span {
  start: number;
  end: number;
  kind: SpanKind;
  rawText: string;
  /** Rule that produced the span, used to encode replacements safely */
  rule: LexicalRule;
}

/**
 * Non-fatal oddity found while scanning (e.g. an unterminated comment)
 */
export interface ExtractionWarning {
  offset: number;
  message: string;
}

export interface ExtractionResult {
  spans: Span[];
  warnings: ExtractionWarning[];
}

/**
 * Which spans are worth sending to the backend
 * - any: every non-empty span
 * - non-ascii: spans containing at least one non-ASCII character
 * - cjk: spans containing Chinese, Japanese or Korean script
 */
export type TextFilter = 'any' | 'non-ascii' | 'cjk';

/**
 * Ordered batch of spans sent in one backend request
 */
export interface Chunk {
  index: number;
  spans: Span[];
  /** Whitespace-trimmed text of each span, aligned with `spans` */
  payloads: string[];
}

/**
 * Lifecycle of one file through the pipeline
 */
export type FileStatus = 'pending' | 'extracted' | 'translated' | 'rewritten' | 'skipped' | 'failed';

/**
 * Work item for one candidate file. Owned by the worker processing it.
 */
export interface FileJob {
  path: string;
  status: FileStatus;
  profile?: LanguageProfile;
  spans: Span[];
  warnings: ExtractionWarning[];
  /** Why the job was skipped */
  reason?: string;
  error?: Error;
}
