/**
 * Parse Context and Option Tests
 */

import { describe, expect, it } from 'vitest';
import {
  DEFAULT_MAX_ERRORS,
  DEFAULT_MAX_TRIAL_TOKENS,
  LexerError,
  ParseError,
  parse,
  parseWithRecovery,
  resolveParseOptions,
  type ParseOptions,
} from '../../src/index.js';
import { expectNode, sexp } from '../helpers/ast.js';

describe('Parse contexts', () => {
  describe('module', () => {
    it('spans an empty program at the source start', () => {
      const program = expectNode(parse(''), 'Program');
      expect(program.items).toEqual([]);
      expect(program.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 1, offset: 0 },
      });
    });

    it('skips empty statements', () => {
      expect(expectNode(parse(';;\nlet x = 1;;'), 'Program').items).toHaveLength(1);
    });
  });

  describe('expression', () => {
    it('wraps a single expression in an ExpressionRoot', () => {
      const root = expectNode(parse('1 + 2', { context: 'expression' }), 'ExpressionRoot');
      expect(sexp(root.expression)).toBe('(+ 1 2)');
      expect(root.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 6, offset: 5 },
      });
    });

    it('reports trailing input', () => {
      const result = parseWithRecovery('1 2', { context: 'expression' });
      expect(result.errors.map((e) => e.text)).toEqual([
        "Expected end of input, found '2'",
      ]);
      expect(result.syncCount).toBe(1);
      expect(sexp(expectNode(result.ast, 'ExpressionRoot').expression)).toBe('1');
    });

    it('throws on trailing input in strict mode', () => {
      expect(() => parse('1 2', { context: 'expression' })).toThrow(
        "Expected end of input, found '2' at 1:3"
      );
    });
  });

  describe('repl', () => {
    it('accepts one statement with trailing semicolons', () => {
      const program = expectNode(parse('let x = 1;;', { context: 'repl' }), 'Program');
      expect(program.items.map((item) => item.type)).toEqual(['Let']);
    });

    it('reports a second statement as leftover input', () => {
      const result = parseWithRecovery('let x = 1; let y = 2', { context: 'repl' });
      expect(result.errors.map((e) => e.text)).toEqual([
        "Expected end of input, found 'let'",
      ]);
      const items = expectNode(result.ast, 'Program').items;
      expect(items.map((item) => item.type)).toEqual(['Let', 'Error']);
      expect(expectNode(items[1], 'Error').text).toBe('let y = 2');
    });
  });
});

describe('Strict parsing', () => {
  it('throws the first parse error with its location', () => {
    let thrown: unknown;
    try {
      parse('let = 1');
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(ParseError);
    if (!(thrown instanceof ParseError)) return;
    expect(thrown.errorId).toBe('TERN-P004');
    expect(thrown.message).toBe("Expected pattern, found '=' at 1:5");
    expect(thrown.location).toEqual({ line: 1, column: 5, offset: 4 });
  });

  it('throws lexer errors unconverted', () => {
    expect(() => parse('"abc')).toThrow(LexerError);
  });

  it('throws the first error even when recovery is requested', () => {
    expect(() => parse('let a = ;\nlet b = ;', { recoveryMode: true })).toThrow(
      "Unexpected token: ';' at 1:9"
    );
  });
});

describe('resolveParseOptions', () => {
  it('fills in defaults', () => {
    expect(resolveParseOptions()).toEqual({
      context: 'module',
      recoveryMode: false,
      maxErrors: DEFAULT_MAX_ERRORS,
      maxTrialTokens: DEFAULT_MAX_TRIAL_TOKENS,
      observability: {},
    });
    expect(DEFAULT_MAX_ERRORS).toBe(100);
    expect(DEFAULT_MAX_TRIAL_TOKENS).toBe(64);
  });

  it('takes the recovery default from the caller', () => {
    expect(resolveParseOptions({}, true).recoveryMode).toBe(true);
    expect(resolveParseOptions({ recoveryMode: false }, true).recoveryMode).toBe(false);
  });

  it.each([
    [
      '{"context":"script"}',
      'Invalid parse options: context "script" must be one of module, repl, expression',
    ],
    ['{"maxErrors":0}', 'Invalid parse options: maxErrors must be a positive integer, got 0'],
    [
      '{"maxTrialTokens":1.5}',
      'Invalid parse options: maxTrialTokens must be a positive integer, got 1.5',
    ],
    ['{"recoveryMode":"yes"}', 'Invalid parse options: recoveryMode must be a boolean'],
    [
      '{"observability":{"onTrial":true}}',
      'Invalid parse options: observability.onTrial must be a function',
    ],
  ])('rejects %s', (json, message) => {
    const options: ParseOptions = JSON.parse(json);
    expect(() => resolveParseOptions(options)).toThrow(new TypeError(message));
  });

  it('validates options passed to parse', () => {
    expect(() => parse('1', { maxErrors: -1 })).toThrow(TypeError);
  });
});
