/**
 * Lexer Error Tests
 * Error IDs, spans and resumption after malformed input
 */

import { describe, expect, it } from 'vitest';
import {
  LexerError,
  tokenize,
  tokenizeWithRecovery,
} from '../../src/index.js';

function lexError(source: string): LexerError {
  try {
    tokenize(source);
  } catch (err) {
    if (err instanceof LexerError) return err;
    throw err;
  }
  throw new Error(`Expected a lexer error for: ${source}`);
}

describe('Lexer errors', () => {
  it('reports an unterminated string over the consumed text', () => {
    const err = lexError('"abc');
    expect(err.errorId).toBe('TERN-L001');
    expect(err.span).toEqual({
      start: { line: 1, column: 1, offset: 0 },
      end: { line: 1, column: 5, offset: 4 },
    });
    expect(err.location).toEqual(err.span.start);
  });

  it('throws LexerError from strict tokenize', () => {
    expect(() => tokenize('a ` b')).toThrow(LexerError);
  });

  it('reports an invalid escape after reading the whole string', () => {
    const err = lexError('"a\\qb"');
    expect(err.errorId).toBe('TERN-L005');
    expect(err.toData().message).toBe('Invalid escape sequence: \\q');
    expect(err.span.start).toEqual({ line: 1, column: 3, offset: 2 });
    expect(err.span.end).toEqual({ line: 1, column: 5, offset: 4 });
  });

  it('reports an unterminated block comment', () => {
    const err = lexError('/* x');
    expect(err.errorId).toBe('TERN-L004');
    expect(err.span.end.offset).toBe(4);
  });

  it('reports unterminated and empty char literals', () => {
    const missing = lexError("'1");
    expect(missing.errorId).toBe('TERN-L006');
    expect(missing.span.end.offset).toBe(2);

    const empty = lexError("''");
    expect(empty.errorId).toBe('TERN-L006');
    expect(empty.span.end.offset).toBe(2);
  });

  describe('tokenizeWithRecovery', () => {
    it('skips an unexpected character and continues', () => {
      const { tokens, errors } = tokenizeWithRecovery('a ` b');
      expect(errors).toHaveLength(1);
      expect(errors[0]?.errorId).toBe('TERN-L002');
      expect(errors[0]?.message).toBe('Unexpected character: ` at 1:3');
      expect(tokens.map((t) => t.value)).toEqual(['a', 'b', '']);
    });

    it('drops a string with a bad escape and resumes after it', () => {
      const { tokens, errors } = tokenizeWithRecovery('"a\\qb" x');
      expect(errors.map((e) => e.errorId)).toEqual(['TERN-L005']);
      expect(tokens.map((t) => t.type)).toEqual(['IDENTIFIER', 'EOF']);
    });

    it('closes an unterminated interpolated string at end of input', () => {
      const { tokens, errors } = tokenizeWithRecovery('f"a {x');
      expect(errors.map((e) => e.errorId)).toEqual(['TERN-L001']);
      expect(errors[0]?.span.start.offset).toBe(0);
      expect(tokens.map((t) => t.type)).toEqual([
        'STRING_BEGIN',
        'STRING_FRAGMENT',
        'INTERP_OPEN',
        'IDENTIFIER',
        'EOF',
      ]);
    });
  });

  describe('Unicode positions', () => {
    it('counts columns in code points and offsets in UTF-16 units', () => {
      const [str, name] = tokenize('"😀" x');
      expect(str?.value).toBe('😀');
      expect(str?.span.end).toEqual({ line: 1, column: 4, offset: 4 });
      expect(name?.span.start).toEqual({ line: 1, column: 5, offset: 5 });
    });
  });
});
