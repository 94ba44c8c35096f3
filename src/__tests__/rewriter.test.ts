/**
 * Tests for the rewriter and dry-run diffs
 */

import { profileFor } from '../core/profiles';
import { Replacement, applyDiffReport, createDiffReport, encodeForSpan, rewrite, toReplacement } from '../core/rewriter';
import { extractSpans } from '../core/spanExtractor';
import { LanguageProfile, LexicalRule, Span } from '../core/types';

jest.mock('../util/log', () => ({ log: jest.fn(), getLogFilePath: () => 'translator.log' }));

const RULE: LexicalRule = { kind: 'BlockComment', start: '/*', end: '*/' };

function at(start: number, end: number, rawText: string, rule: LexicalRule = RULE): Span {
  return { start, end, kind: rule.kind, rawText, rule };
}

function profile(extension: string): LanguageProfile {
  const found = profileFor(extension);
  if (!found) {
    throw new Error(`no profile for ${extension}`);
  }
  return found;
}

function spansIn(source: string, extension: string, translateAll = false): Span[] {
  return extractSpans(source, profile(extension), { translateAll }).spans;
}

describe('rewrite', () => {
  const buffer = '0123456789abcdefghijklmnopqrstuvwxyz';

  it('should keep gaps intact when replacements change length', () => {
    const result = rewrite(buffer, [
      { span: at(5, 10, 'ab'), text: 'longer-ab' },
      { span: at(20, 25, 'cd'), text: 'cd2' },
    ]);

    expect(result).toBe(buffer.slice(0, 5) + 'longer-ab' + buffer.slice(10, 20) + 'cd2' + buffer.slice(25));
    expect(result).toBe('01234longer-ababcdefghijcd2pqrstuvwxyz');
  });

  it('should return the input when there is nothing to replace', () => {
    expect(rewrite(buffer, [])).toBe(buffer);
  });

  it('should handle a replacement at the very end', () => {
    expect(rewrite('abc', [{ span: at(3, 3, ''), text: 'Z' }])).toBe('abcZ');
  });

  it('should reject overlapping replacements', () => {
    expect(() =>
      rewrite(buffer, [
        { span: at(5, 10, 'x'), text: 'a' },
        { span: at(8, 12, 'y'), text: 'b' },
      ])
    ).toThrow('Replacement at 8 overlaps previous replacement ending at 10');
  });

  it('should reject spans outside the buffer', () => {
    expect(() => rewrite('short', [{ span: at(2, 50, 'x'), text: 'a' }])).toThrow(RangeError);
  });
});

describe('toReplacement', () => {
  it('should restore the whitespace around the translation', () => {
    const [span] = spansIn('x = 1; // 注释\n', '.js');

    expect(toReplacement(span, 'comment', profile('.js'))).toEqual({ span, text: ' comment' });
  });

  it('should return null when the translation changes nothing', () => {
    const [span] = spansIn('x = 1; // 注释\n', '.js');

    expect(toReplacement(span, '注释', profile('.js'))).toBeNull();
  });
});

describe('written translations', () => {
  const cases: Array<[string, string, string, string]> = [
    ['.py', '"""注释"""\nx = 1\n', 'Say "hi"', 'Say "hi\\"'],
    ['.lua', '--[[注释]]\nx = 1\n', 'see t[1]', 'see t[1] '],
    ['.rs', '/** 文档 */\nfn f() {}\n', 'see src/*.rs', ' see src/ *.rs '],
  ];

  it.each(cases)('should read back as the same span (%s %j)', (extension, source, translated, written) => {
    const language = profile(extension);
    const { spans } = extractSpans(source, language);
    const replacements: Replacement[] = [];
    for (const span of spans) {
      const replacement = toReplacement(span, translated, language);
      if (replacement) {
        replacements.push(replacement);
      }
    }

    const reread = extractSpans(rewrite(source, replacements), language);

    expect(replacements.map(replacement => replacement.text)).toEqual([written]);
    expect(reread.warnings).toEqual([]);
    expect(reread.spans.map(span => [span.kind, span.rawText])).toEqual(spans.map(span => [span.kind, written]));
  });

  it('should not write a translation that would stop being a character literal', () => {
    const [span] = spansIn("let c = '字';\n", '.rs', true);

    expect(toReplacement(span, 'word', profile('.rs'))).toBeNull();
  });
});

describe('encodeForSpan', () => {
  it('should collapse newlines in line comments', () => {
    const [span] = spansIn('// 注释\n', '.ts');

    expect(encodeForSpan(span, ' first\nsecond\r\nthird', profile('.ts'))).toBe(' first second third');
  });

  it('should break up a closing marker in block comments', () => {
    const [span] = spansIn('/* 注释 */', '.c');

    expect(encodeForSpan(span, ' see a*/b ', profile('.c'))).toBe(' see a* /b ');
  });

  it('should also break up openers in nesting comments', () => {
    const [span] = spansIn('/* 注释 */', '.rs');

    expect(encodeForSpan(span, 'x /* y */', profile('.rs'))).toBe('x / * y * /');
  });

  it('should escape quotes and newlines in single-line strings', () => {
    const [span] = spansIn('s = "文本";', '.js', true);

    expect(encodeForSpan(span, 'line1\nline2 "q"', profile('.js'))).toBe('line1\\nline2 \\"q\\"');
  });

  it('should keep escape sequences and double a dangling escape', () => {
    const [span] = spansIn('s = "文本";', '.js', true);

    expect(encodeForSpan(span, 'tab\\there', profile('.js'))).toBe('tab\\there');
    expect(encodeForSpan(span, 'ends with \\', profile('.js'))).toBe('ends with \\\\');
  });

  it('should escape a docstring closer', () => {
    const [span] = spansIn('"""文档"""', '.py');

    expect(encodeForSpan(span, 'say """hi"""', profile('.py'))).toBe('say \\"""hi\\"\\"\\"');
  });

  it('should escape a trailing quote that would complete the closer', () => {
    const [span] = spansIn('"""注释"""', '.py');

    expect(encodeForSpan(span, 'Say "hi"', profile('.py'))).toBe('Say "hi\\"');
  });

  it('should pad a tail that would complete a closer without escapes', () => {
    const [span] = spansIn('--[[注释]]', '.lua');

    expect(encodeForSpan(span, 'see t[1]', profile('.lua'))).toBe('see t[1] ');
  });

  it('should break up every opener that nests inside a doc block', () => {
    const [span] = spansIn('/** 文档 */', '.rs');

    expect(encodeForSpan(span, ' see src/*.rs and /*! x ', profile('.rs'))).toBe(' see src/ *.rs and / * ! x ');
  });

  it('should keep a line comment from turning into a doc comment', () => {
    const [span] = spansIn('// 注释\n', '.rs');

    expect(encodeForSpan(span, '/ path', profile('.rs'))).toBe(' / path');
  });

  it('should drop a one-character closer that cannot be escaped', () => {
    const [span] = spansIn('s := `文本`', '.go', true);

    expect(encodeForSpan(span, 'a`b', profile('.go'))).toBe('ab');
  });

  it('should leave an identity translation alone', () => {
    const [span] = spansIn('// a */ b\n', '.js');

    expect(encodeForSpan(span, span.rawText, profile('.js'))).toBe(span.rawText);
  });
});

describe('dry-run reports', () => {
  const before = 'a = 1\n# 注释\nb = 2\n';
  const after = 'a = 1\n# comment\nb = 2\n';

  it('should describe the change as a unified diff', () => {
    const report = createDiffReport('pkg/mod.py', before, after);

    expect(report.path).toBe('pkg/mod.py');
    expect(report.additions).toBe(1);
    expect(report.deletions).toBe(1);
    expect(report.patch).toContain('--- pkg/mod.py\toriginal');
    expect(report.patch).toContain('+++ pkg/mod.py\ttranslated');
    expect(report.patch).toContain('\n-# 注释\n');
    expect(report.patch).toContain('\n+# comment\n');
  });

  it('should reproduce the rewrite when applied to the original', () => {
    const report = createDiffReport('pkg/mod.py', before, after);

    expect(applyDiffReport(before, report)).toBe(after);
  });

  it('should report no changes for identical text', () => {
    const report = createDiffReport('same.py', before, before);

    expect(report.additions).toBe(0);
    expect(report.deletions).toBe(0);
    expect(applyDiffReport(before, report)).toBe(before);
  });
});
