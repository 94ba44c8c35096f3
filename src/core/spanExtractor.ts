import { ExtractionError } from './errors';
import {
  ExtractionResult,
  ExtractionWarning,
  LanguageProfile,
  LexicalRule,
  Span,
  SpanKind,
} from './types';

/** Default limit for nested block comments before the scan gives up */
export const DEFAULT_MAX_NESTING_DEPTH = 64;

export interface ExtractOptions {
  /** Emit string literal contents as spans too */
  translateAll?: boolean;
  maxNestingDepth?: number;
}

/**
 * A construct the scanner is currently inside
 */
interface OpenConstruct {
  rule: LexicalRule;
  /** Offset of the opening marker */
  openerStart: number;
  /** Offset right after the opening marker */
  contentStart: number;
}

/**
 * Lexical states of the scan
 */
type ScanState =
  | { tag: 'Code' }
  | { tag: 'InLineComment'; open: OpenConstruct }
  | { tag: 'InBlockComment'; open: OpenConstruct; depth: number }
  | { tag: 'InString'; open: OpenConstruct }
  | { tag: 'InDocstring'; open: OpenConstruct; depth: number };

type OpenState = Exclude<ScanState, { tag: 'Code' }>;

const CODE: ScanState = { tag: 'Code' };

/**
 * Transition table: the state a matched opener enters, by rule kind
 */
const ENTER: Record<SpanKind, (open: OpenConstruct) => OpenState> = {
  StringLiteral: open => ({ tag: 'InString', open }),
  Docstring: open => ({ tag: 'InDocstring', open, depth: 1 }),
  BlockComment: open => ({ tag: 'InBlockComment', open, depth: 1 }),
  LineComment: open => ({ tag: 'InLineComment', open }),
};

/**
 * Kind of span each state emits when it closes
 */
const EMITS: Record<OpenState['tag'], SpanKind> = {
  InLineComment: 'LineComment',
  InBlockComment: 'BlockComment',
  InString: 'StringLiteral',
  InDocstring: 'Docstring',
};

/**
 * Tie-break between openers of equal length: strings first, so that a
 * comment marker inside a literal can never start a comment
 */
const KIND_PRIORITY: Record<SpanKind, number> = {
  StringLiteral: 0,
  Docstring: 1,
  BlockComment: 2,
  LineComment: 3,
};

/**
 * Single pass over one buffer
 */
class Scanner {
  private state: ScanState = CODE;
  private readonly spans: Span[] = [];
  private readonly warnings: ExtractionWarning[] = [];
  private readonly openers: LexicalRule[];
  private readonly openerChars: Set<string>;
  private readonly nestedOpeners = new Map<LexicalRule, string[]>();
  private readonly shorterTwins = new Map<LexicalRule, LexicalRule[]>();
  private lineStarts: number[] | null = null;

  constructor(
    private readonly source: string,
    profile: LanguageProfile,
    private readonly translateAll: boolean,
    private readonly maxNestingDepth: number
  ) {
    // Longest opener wins; equal lengths fall back to kind priority
    this.openers = [...profile.rules].sort((a, b) =>
      b.start.length - a.start.length || KIND_PRIORITY[a.kind] - KIND_PRIORITY[b.kind]
    );
    this.openerChars = new Set(profile.rules.map(rule => rule.start[0]));

    for (const rule of profile.rules) {
      if (rule.nests && rule.end !== null) {
        this.nestedOpeners.set(rule, nestedOpenersFor(profile, rule));
      }

      // Shorter openers sharing this rule's closer, e.g. `/*` for `/**`
      const twins = profile.rules.filter(other =>
        other !== rule &&
        other.end !== null &&
        other.end === rule.end &&
        other.start.length < rule.start.length &&
        rule.start.startsWith(other.start)
      );
      if (twins.length > 0) {
        this.shorterTwins.set(rule, twins);
      }
    }
  }

  run(): ExtractionResult {
    let pos = 0;
    const length = this.source.length;

    while (pos < length) {
      pos = this.state.tag === 'Code'
        ? this.stepCode(pos)
        : this.stepOpen(this.state, pos);
    }

    if (this.state.tag !== 'Code') {
      const { open } = this.state;
      if (open.rule.end !== null) {
        this.warn(open.openerStart, `Unterminated ${describe(EMITS[this.state.tag])} closed at end of file`);
      }
      this.close(this.state, length);
    }

    return { spans: this.spans, warnings: this.warnings };
  }

  private stepCode(pos: number): number {
    if (!this.openerChars.has(this.source[pos])) {
      return pos + 1;
    }

    const rule = this.matchOpener(pos);
    if (!rule) {
      return pos + 1;
    }

    const contentStart = pos + rule.start.length;
    this.state = ENTER[rule.kind]({ rule, openerStart: pos, contentStart });
    return contentStart;
  }

  private stepOpen(state: OpenState, pos: number): number {
    const { rule } = state.open;
    const source = this.source;

    if (rule.end === null) {
      const newline = source.indexOf('\n', pos);
      const lineEnd = newline === -1 ? source.length : newline;
      this.close(state, this.trimCarriageReturn(pos, lineEnd));
      return lineEnd;
    }

    const ch = source[pos];

    if (rule.escape !== undefined && ch === rule.escape) {
      return pos + 2;
    }

    if (rule.singleLine && ch === '\n') {
      this.warn(state.open.openerStart, `Unterminated ${describe(EMITS[state.tag])} closed at end of line`);
      this.close(state, this.trimCarriageReturn(state.open.contentStart, pos));
      return pos;
    }

    if (source.startsWith(rule.end, pos)) {
      if (state.tag === 'InBlockComment' || state.tag === 'InDocstring') {
        state.depth -= 1;
        if (state.depth > 0) {
          return pos + rule.end.length;
        }
      }
      this.close(state, pos);
      return pos + rule.end.length;
    }

    if (rule.nests && (state.tag === 'InBlockComment' || state.tag === 'InDocstring')) {
      const nested = this.nestedOpeners.get(rule)?.find(opener => source.startsWith(opener, pos));
      if (nested) {
        state.depth += 1;
        if (state.depth > this.maxNestingDepth) {
          throw new ExtractionError(
            `Comment nesting deeper than ${this.maxNestingDepth} levels on line ${this.lineOf(pos)}`,
            pos
          );
        }
        return pos + nested.length;
      }
    }

    return pos + 1;
  }

  /**
   * Pick the opener at `pos`, if any
   */
  private matchOpener(pos: number): LexicalRule | null {
    for (const rule of this.openers) {
      if (!this.source.startsWith(rule.start, pos)) continue;
      if (this.isEmptyShorterConstruct(rule, pos)) continue;
      if (rule.charLiteral && !this.isCharLiteral(rule, pos)) continue;
      return rule;
    }
    return null;
  }

  /**
   * `/**` followed by `/` is the empty comment `/**\/`, not an open doc block
   */
  private isEmptyShorterConstruct(rule: LexicalRule, pos: number): boolean {
    const twins = this.shorterTwins.get(rule);
    if (!twins) return false;
    return twins.some(twin => twin.end !== null && this.source.startsWith(twin.end, pos + twin.start.length));
  }

  /**
   * A character literal holds one character or one escape sequence: `'x'`,
   * `'\n'`, `'\x7f'`, `'\u{1F600}'`. Anything else (`'a, 'b`) is code.
   */
  private isCharLiteral(rule: LexicalRule, pos: number): boolean {
    if (rule.end === null) return true;
    const source = this.source;
    let i = pos + rule.start.length;
    const ch = source[i];
    if (ch === undefined || ch === '\n' || source.startsWith(rule.end, i)) return false;

    if (rule.escape !== undefined && ch === rule.escape) {
      const kind = source[i + 1];
      if (kind === 'u' && source[i + 2] === '{') {
        const close = source.indexOf('}', i + 3);
        if (close === -1 || close - (i + 3) > 6) return false;
        i = close + 1;
      } else if (kind === 'x') {
        i += 4;
      } else {
        i += 2;
      }
    } else {
      const code = source.codePointAt(i) ?? 0;
      i += code > 0xffff ? 2 : 1;
    }

    return source.startsWith(rule.end, i);
  }

  private close(state: OpenState, contentEnd: number): void {
    const start = state.open.contentStart;
    const end = Math.max(start, Math.min(contentEnd, this.source.length));

    if (state.tag !== 'InString' || this.translateAll) {
      this.spans.push({
        start,
        end,
        kind: EMITS[state.tag],
        rawText: this.source.slice(start, end),
        rule: state.open.rule,
      });
    }

    this.state = CODE;
  }

  private trimCarriageReturn(start: number, end: number): number {
    return end > start && this.source[end - 1] === '\r' ? end - 1 : end;
  }

  private warn(offset: number, message: string): void {
    this.warnings.push({ offset, message: `${message} (line ${this.lineOf(offset)})` });
  }

  /** 1-based line number of an offset */
  private lineOf(offset: number): number {
    if (!this.lineStarts) {
      this.lineStarts = [0];
      for (let i = 0; i < this.source.length; i++) {
        if (this.source[i] === '\n') this.lineStarts.push(i + 1);
      }
    }
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }
}

function describe(kind: SpanKind): string {
  switch (kind) {
    case 'LineComment':
      return 'line comment';
    case 'BlockComment':
      return 'block comment';
    case 'Docstring':
      return 'docstring';
    case 'StringLiteral':
      return 'string literal';
  }
}

/**
 * Openers that nest inside a rule's construct: every nesting rule sharing
 * its closer, longest first. In Rust `/**` doc blocks also nest on `/*`.
 */
export function nestedOpenersFor(profile: LanguageProfile, rule: LexicalRule): string[] {
  if (!rule.nests || rule.end === null) return [];
  const closer = rule.end;
  return profile.rules
    .filter(other => other.nests && other.end === closer)
    .map(other => other.start)
    .sort((a, b) => b.length - a.length);
}

/**
 * Span Extractor
 *
 * Scans a decoded file with a language profile and returns the translatable
 * spans in source order. Code text is never emitted. String literal contents
 * are only emitted in translate-all mode, but strings are always scanned so
 * that comment markers inside them are ignored.
 *
 * Unterminated constructs are closed at end of file (or end of line for
 * single-line strings) and reported as warnings. Nesting deeper than
 * `maxNestingDepth` throws ExtractionError.
 */
export class SpanExtractor {
  private readonly translateAll: boolean;
  private readonly maxNestingDepth: number;

  constructor(options: ExtractOptions = {}) {
    this.translateAll = options.translateAll ?? false;
    this.maxNestingDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
  }

  extract(source: string, profile: LanguageProfile): ExtractionResult {
    return new Scanner(source, profile, this.translateAll, this.maxNestingDepth).run();
  }
}

/**
 * One-off extraction without keeping an extractor around
 */
export function extractSpans(
  source: string,
  profile: LanguageProfile,
  options?: ExtractOptions
): ExtractionResult {
  return new SpanExtractor(options).extract(source, profile);
}
