import {
  Chunker,
  SPAN_SEPARATOR,
  chunkSpans,
  isTranslatable,
  joinPayloads,
  payloadOf,
  restoreWhitespace,
  splitTranslation,
} from '../core/chunker';
import { GatewayError } from '../core/errors';
import { LexicalRule, Span } from '../core/types';

const LINE_RULE: LexicalRule = { kind: 'LineComment', start: '//', end: null };

/** Lay out texts as consecutive line comments and return their spans */
function spansOf(texts: string[]): Span[] {
  const spans: Span[] = [];
  let offset = 0;
  for (const text of texts) {
    const start = offset + 2;
    spans.push({ start, end: start + text.length, kind: 'LineComment', rawText: text, rule: LINE_RULE });
    offset = start + text.length + 1;
  }
  return spans;
}

describe('Chunker', () => {
  it('should pack spans greedily within the size budget', () => {
    // 4 + 9 + 4 = 17 fits, adding a third does not
    const chunks = chunkSpans(spansOf(['aaaa', 'bbbb', 'cccc']), { maxChunkSize: 17 });

    expect(chunks).toHaveLength(2);
    expect(chunks[0].index).toBe(0);
    expect(chunks[0].payloads).toEqual(['aaaa', 'bbbb']);
    expect(joinPayloads(chunks[0].payloads)).toBe('aaaa\n<<<#>>>\nbbbb');
    expect(chunks[1].index).toBe(1);
    expect(chunks[1].payloads).toEqual(['cccc']);
  });

  it('should give an oversized span a chunk of its own', () => {
    const long = 'x'.repeat(30);
    const chunks = chunkSpans(spansOf(['ab', long, 'cd']), { maxChunkSize: 10 });

    expect(chunks.map(chunk => chunk.payloads)).toEqual([['ab'], [long], ['cd']]);
  });

  it('should put every translatable span in exactly one chunk, in order', () => {
    const spans = spansOf(['one', 'two', '  ', 'three', 'four', 'five']);
    const chunker = new Chunker({ maxChunkSize: 20 });
    const chunks = chunker.chunk(spans);

    const chunked = chunks.flatMap(chunk => chunk.spans);
    expect(chunked).toEqual(chunker.selectSpans(spans));
    expect(new Set(chunked).size).toBe(chunked.length);
  });

  it('should send trimmed payloads', () => {
    const [chunk] = chunkSpans(spansOf(['  注释  ']));

    expect(chunk.payloads).toEqual(['注释']);
  });

  it('should skip empty and whitespace-only spans', () => {
    expect(chunkSpans(spansOf(['', '   ', '\t']))).toEqual([]);
  });

  it('should leave out spans containing the separator marker', () => {
    const chunks = chunkSpans(spansOf(['uses <<<#>>> inline', 'normal']));

    expect(chunks.flatMap(chunk => chunk.payloads)).toEqual(['normal']);
  });

  describe('text filter', () => {
    it('should keep everything non-empty with "any"', () => {
      expect(isTranslatable('hello')).toBe(true);
      expect(isTranslatable('')).toBe(false);
    });

    it('should keep only non-ASCII text with "non-ascii"', () => {
      expect(isTranslatable('café', 'non-ascii')).toBe(true);
      expect(isTranslatable('hello', 'non-ascii')).toBe(false);
    });

    it('should keep only CJK text with "cjk"', () => {
      expect(isTranslatable('注释', 'cjk')).toBe(true);
      expect(isTranslatable('コメント', 'cjk')).toBe(true);
      expect(isTranslatable('주석', 'cjk')).toBe(true);
      expect(isTranslatable('café', 'cjk')).toBe(false);
    });

    it('should apply the filter when chunking', () => {
      const chunks = chunkSpans(spansOf(['plain english', '中文注释']), { textFilter: 'cjk' });

      expect(chunks.flatMap(chunk => chunk.payloads)).toEqual(['中文注释']);
    });
  });

  describe('splitTranslation', () => {
    it('should split a reply on separator lines', () => {
      expect(splitTranslation(`A${SPAN_SEPARATOR}B`, 2)).toEqual(['A', 'B']);
    });

    it('should tolerate CRLF and padding around the marker', () => {
      expect(splitTranslation(' A \r\n <<<#>>> \r\nB', 2)).toEqual(['A', 'B']);
    });

    it('should not split a single expected segment', () => {
      expect(splitTranslation('X\n<<<#>>>\nY', 1)).toEqual(['X\n<<<#>>>\nY']);
    });

    it('should raise a protocol error on a count mismatch', () => {
      let caught: unknown;
      try {
        splitTranslation('A', 2);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(GatewayError);
      expect(caught).toMatchObject({
        code: 'GatewayProtocolError',
        retryable: false,
        message: 'Expected 2 segments separated by <<<#>>>, got 1',
      });
    });
  });

  describe('whitespace', () => {
    it('should trim payloads', () => {
      expect(payloadOf('  text \n')).toBe('text');
    });

    it('should put the original whitespace back around a translation', () => {
      expect(restoreWhitespace(' 注释\n', 'comment')).toBe(' comment\n');
      expect(restoreWhitespace('\n  说明\n ', ' note ')).toBe('\n  note\n ');
    });

    it('should leave whitespace-only text alone', () => {
      expect(restoreWhitespace('   ', 'x')).toBe('   ');
    });
  });
});
