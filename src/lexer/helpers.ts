/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';
import { advance, currentLocation, type LexerState } from './state.js';

const ID_START = /^\p{ID_Start}$/u;
const ID_CONTINUE = /^\p{ID_Continue}$/u;

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

/** Takes a whole code point (see peekCodePoint) */
export function isIdentifierStart(ch: string): boolean {
  return ch === '_' || ID_START.test(ch);
}

export function isIdentifierChar(ch: string): boolean {
  return ch === '_' || ID_CONTINUE.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return (
    ch === ' ' ||
    ch === '\t' ||
    ch === '\r' ||
    ch === '\n' ||
    ch === '\f' ||
    ch === '\v' ||
    ch === '\ufeff'
  );
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation,
  suffix?: string
): Token {
  if (suffix === undefined) {
    return { type, value, span: { start, end } };
  }
  return { type, value, span: { start, end }, suffix };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(type, value, start, currentLocation(state));
}
