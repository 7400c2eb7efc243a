/**
 * Error Hint Tests
 */

import { describe, expect, it } from 'vitest';
import { parse, TOKEN_TYPES, type Token, type TokenType } from '../../src/index.js';
import { generateHint } from '../../src/parser/state.js';

function token(type: TokenType, value: string): Token {
  const location = { line: 1, column: 1, offset: 0 };
  return { type, value, span: { start: location, end: location } };
}

describe('Hints', () => {
  it('suggests the keyword closest to a misspelled identifier', () => {
    expect(() => parse('fn main() retrun')).toThrow(
      "Expected function body, found 'retrun'. Hint: Did you mean 'return'? at 1:11"
    );
  });

  it('points out -> in a match arm', () => {
    expect(() => parse('match x { 1 -> a }')).toThrow(
      "Expected '=>', found '->'. Hint: Match arms use '=>', not '->' at 1:13"
    );
  });

  it('names the unclosed delimiter at end of input', () => {
    const eof = token(TOKEN_TYPES.EOF, '');
    expect(generateHint(TOKEN_TYPES.RPAREN, eof)).toBe(
      'Hint: Check for unclosed parenthesis'
    );
    expect(generateHint(TOKEN_TYPES.RBRACE, eof)).toBe('Hint: Check for unclosed brace');
    expect(generateHint(TOKEN_TYPES.RBRACKET, eof)).toBe(
      'Hint: Check for unclosed bracket'
    );
  });

  it('separates binding from comparison', () => {
    expect(generateHint(TOKEN_TYPES.ASSIGN, token(TOKEN_TYPES.EQ, '=='))).toBe(
      "Hint: Use '=' to bind, '==' compares"
    );
  });

  it('gives no hint for short identifiers or unrelated tokens', () => {
    expect(generateHint(TOKEN_TYPES.COLON, token(TOKEN_TYPES.IDENTIFIER, 'lt'))).toBeNull();
    expect(generateHint(TOKEN_TYPES.COLON, token(TOKEN_TYPES.COMMA, ','))).toBeNull();
  });
});
