/**
 * Lexer Token Tests
 * Keywords, identifiers, operators, comments and token spans
 */

import { describe, expect, it } from 'vitest';
import {
  createLexerState,
  isCommentToken,
  nextToken,
  tokenize,
  type Token,
} from '../../src/index.js';

const types = (source: string): string[] =>
  tokenize(source).map((t: Token) => t.type);

describe('Lexer', () => {
  describe('basic tokens', () => {
    it('tokenizes a let binding', () => {
      expect(types('let x = 42;')).toEqual([
        'LET',
        'IDENTIFIER',
        'ASSIGN',
        'INTEGER',
        'SEMICOLON',
        'EOF',
      ]);
    });

    it('records line, column and offset for each token', () => {
      const tokens = tokenize('let x = 42;');
      expect(tokens[0]?.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 4, offset: 3 },
      });
      expect(tokens[1]?.span.start).toEqual({ line: 1, column: 5, offset: 4 });
      expect(tokens[3]?.value).toBe('42');
    });

    it('places EOF as an empty span after the last character', () => {
      const eof = tokenize('let x = 42;').at(-1);
      expect(eof?.type).toBe('EOF');
      expect(eof?.span.start).toEqual({ line: 1, column: 12, offset: 11 });
      expect(eof?.span.end).toEqual(eof?.span.start);
    });

    it('advances lines on newlines', () => {
      const tokens = tokenize('a\n  b');
      expect(tokens[1]?.span.start).toEqual({ line: 2, column: 3, offset: 4 });
    });

    it('tokenizes empty input as a single EOF', () => {
      expect(types('')).toEqual(['EOF']);
    });
  });

  describe('identifiers and keywords', () => {
    it('keeps contextual words as identifiers', () => {
      expect(types('fn new get set property operator')).toEqual([
        'FN',
        'IDENTIFIER',
        'IDENTIFIER',
        'IDENTIFIER',
        'IDENTIFIER',
        'IDENTIFIER',
        'EOF',
      ]);
    });

    it('distinguishes a bare underscore from identifiers starting with one', () => {
      expect(types('_ _x')).toEqual(['UNDERSCORE', 'IDENTIFIER', 'EOF']);
    });

    it('accepts Unicode identifiers', () => {
      const [token] = tokenize('café');
      expect(token?.type).toBe('IDENTIFIER');
      expect(token?.value).toBe('café');
    });

    it('recognizes both spellings of paired keywords', () => {
      expect(types('fn fun trait interface mod module')).toEqual([
        'FN',
        'FUN',
        'TRAIT',
        'INTERFACE',
        'MOD',
        'MODULE',
        'EOF',
      ]);
    });
  });

  describe('operators', () => {
    it('prefers the longest operator', () => {
      expect(types('a **= b >>= c ..= d ... e')).toEqual([
        'IDENTIFIER',
        'POWER_ASSIGN',
        'IDENTIFIER',
        'SHR_ASSIGN',
        'IDENTIFIER',
        'DOT_DOT_EQ',
        'IDENTIFIER',
        'ELLIPSIS',
        'IDENTIFIER',
        'EOF',
      ]);
    });

    it('tokenizes pipeline, coalescing and safe navigation', () => {
      expect(types('x |> f ?? y?.z')).toEqual([
        'IDENTIFIER',
        'PIPELINE',
        'IDENTIFIER',
        'NULL_COALESCE',
        'IDENTIFIER',
        'SAFE_NAV',
        'IDENTIFIER',
        'EOF',
      ]);
    });

    it('tokenizes paths and arrows', () => {
      expect(types('a::b -> c => d')).toEqual([
        'IDENTIFIER',
        'DOUBLE_COLON',
        'IDENTIFIER',
        'ARROW',
        'IDENTIFIER',
        'FAT_ARROW',
        'IDENTIFIER',
        'EOF',
      ]);
    });

    it('lexes #[ as an attribute prefix', () => {
      expect(types('#[derive(Debug)]')).toEqual([
        'HASH',
        'LBRACKET',
        'IDENTIFIER',
        'LPAREN',
        'IDENTIFIER',
        'RPAREN',
        'RBRACKET',
        'EOF',
      ]);
    });

    it('lexes digits after a dot as tuple indices', () => {
      const tokens = tokenize('t.0.1');
      expect(tokens.map((t) => t.type)).toEqual([
        'IDENTIFIER',
        'DOT',
        'INTEGER',
        'DOT',
        'INTEGER',
        'EOF',
      ]);
      expect(tokens[2]?.value).toBe('0');
      expect(tokens[4]?.value).toBe('1');
    });

    it('lexes digits after safe navigation as tuple indices', () => {
      expect(types('x?.0')).toEqual(['IDENTIFIER', 'SAFE_NAV', 'INTEGER', 'EOF']);
    });
  });

  describe('comments', () => {
    it('keeps each comment style as a token with its text', () => {
      const tokens = tokenize('x // note\n/// doc\n# hash\n/* block */ y');
      expect(tokens.map((t) => [t.type, t.value])).toEqual([
        ['IDENTIFIER', 'x'],
        ['LINE_COMMENT', ' note'],
        ['DOC_COMMENT', ' doc'],
        ['HASH_COMMENT', ' hash'],
        ['BLOCK_COMMENT', ' block '],
        ['IDENTIFIER', 'y'],
        ['EOF', ''],
      ]);
    });

    it('treats four slashes as a plain line comment', () => {
      const [token] = tokenize('//// x');
      expect(token?.type).toBe('LINE_COMMENT');
      expect(token?.value).toBe('// x');
    });

    it('classifies comment tokens', () => {
      const [comment, name] = tokenize('/* a */ b');
      expect(comment && isCommentToken(comment)).toBe(true);
      expect(name && isCommentToken(name)).toBe(false);
    });
  });

  describe('lazy tokenization', () => {
    it('produces one token per call and repeats EOF at the end', () => {
      const state = createLexerState('a b');
      expect(nextToken(state).value).toBe('a');
      expect(nextToken(state).value).toBe('b');
      expect(nextToken(state).type).toBe('EOF');
      expect(nextToken(state).type).toBe('EOF');
    });
  });
});
