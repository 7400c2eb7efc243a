/**
 * Diagnostic Rendering Tests
 * Snippets, caret output and name suggestions
 */

import { describe, expect, it } from 'vitest';
import {
  createError,
  createLexerError,
  extractSnippet,
  formatDiagnostic,
  parseWithRecovery,
  suggestSimilarNames,
  type SourceSpan,
} from '../../src/index.js';

function lineSpan(line: number, column = 1): SourceSpan {
  const location = { line, column, offset: 0 };
  return { start: location, end: location };
}

describe('extractSnippet', () => {
  const source = 'a\nb\nc\nd\ne';

  it('includes two context lines by default', () => {
    const snippet = extractSnippet(source, lineSpan(3));
    expect(snippet.lines.map((l) => [l.lineNumber, l.content, l.isErrorLine])).toEqual([
      [1, 'a', false],
      [2, 'b', false],
      [3, 'c', true],
      [4, 'd', false],
      [5, 'e', false],
    ]);
  });

  it('clamps context at the source edges', () => {
    const snippet = extractSnippet(source, lineSpan(1), 1);
    expect(snippet.lines.map((l) => l.lineNumber)).toEqual([1, 2]);
  });

  it('marks every line of a multi-line span', () => {
    const span = { start: lineSpan(2).start, end: lineSpan(3).start };
    const snippet = extractSnippet(source, span, 0);
    expect(snippet.lines.map((l) => l.isErrorLine)).toEqual([true, true]);
  });

  it('drops carriage returns', () => {
    expect(extractSnippet('x\r\ny', lineSpan(1), 0).lines[0]?.content).toBe('x');
  });

  it('returns no lines for empty source', () => {
    expect(extractSnippet('', lineSpan(1)).lines).toEqual([]);
  });

  it('throws when the span is out of bounds', () => {
    expect(() => extractSnippet(source, lineSpan(9))).toThrow(
      new RangeError('Span exceeds source bounds')
    );
  });
});

describe('formatDiagnostic', () => {
  it('underlines the opening delimiter of an unclosed block', () => {
    const source = 'fn add(x, y) { x + y';
    const [error] = parseWithRecovery(source).errors;
    if (!error) throw new Error('expected a diagnostic');

    expect(formatDiagnostic(source, error)).toBe(
      [
        "error[TERN-P002]: Unclosed delimiter '{': expected '}'",
        ' --> 1:14',
        '1 | fn add(x, y) { x + y',
        `  | ${' '.repeat(13)}^`,
      ].join('\n')
    );
  });

  it('shows context lines around the error line', () => {
    const source = 'let a = 1\nlet b = ;\nlet c = 3';
    const [error] = parseWithRecovery(source).errors;
    if (!error) throw new Error('expected a diagnostic');

    expect(formatDiagnostic(source, error, { contextLines: 1 })).toBe(
      [
        "error[TERN-P001]: Unexpected token: ';'",
        ' --> 2:9',
        '1 | let a = 1',
        '2 | let b = ;',
        `  | ${' '.repeat(8)}^`,
        '3 | let c = 3',
      ].join('\n')
    );
  });

  it('underlines the whole span on one line', () => {
    const source = 'x = value';
    const span: SourceSpan = {
      start: { line: 1, column: 5, offset: 4 },
      end: { line: 1, column: 10, offset: 9 },
    };
    const error = createError('TERN-P001', { found: "'value'" }, span);
    expect(formatDiagnostic(source, error).split('\n')[3]).toBe('  |     ^^^^^');
  });

  it('labels warnings by severity', () => {
    const source = 'a < b::c::d';
    const { errors } = parseWithRecovery(source, {
      context: 'expression',
      maxTrialTokens: 2,
    });
    const [warning] = errors;
    if (!warning) throw new Error('expected a diagnostic');

    expect(formatDiagnostic(source, warning).split('\n').slice(0, 2)).toEqual([
      "warning[TERN-P006]: Could not resolve '<' after 'a' within 2 tokens; treated as comparison",
      ' --> 1:3',
    ]);
  });

  it('formats lexer errors as errors', () => {
    const source = '`';
    const span: SourceSpan = {
      start: { line: 1, column: 1, offset: 0 },
      end: { line: 1, column: 2, offset: 1 },
    };
    const error = createLexerError('TERN-L002', { char: '`' }, span);
    expect(formatDiagnostic(source, error)).toBe(
      ['error[TERN-L002]: Unexpected character: `', ' --> 1:1', '1 | `', '  | ^'].join('\n')
    );
  });

  it('omits the snippet when the span lies outside the source', () => {
    const error = createError('TERN-P001', { found: "'x'" }, lineSpan(5, 2));
    expect(formatDiagnostic('one line', error)).toBe(
      "error[TERN-P001]: Unexpected token: 'x'\n --> 5:2"
    );
  });
});

describe('suggestSimilarNames', () => {
  it('returns names within two edits, nearest first then alphabetical', () => {
    expect(suggestSimilarNames('lenght', ['width', 'length', 'len', 'height'])).toEqual([
      'height',
      'length',
    ]);
    expect(suggestSimilarNames('mpa', ['map', 'max'])).toEqual(['map', 'max']);
  });

  it('excludes the target itself', () => {
    expect(suggestSimilarNames('map', ['map', 'nap', 'max'])).toEqual(['max', 'nap']);
  });

  it('returns at most three names', () => {
    expect(suggestSimilarNames('ab', ['ae', 'ad', 'ac', 'aa'])).toEqual(['aa', 'ac', 'ad']);
  });

  it('returns nothing for an empty target or candidate list', () => {
    expect(suggestSimilarNames('', ['a'])).toEqual([]);
    expect(suggestSimilarNames('a', [])).toEqual([]);
  });
});
