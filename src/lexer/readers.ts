/**
 * Token Readers
 * Functions to read numbers, identifiers, labels and comments from source
 */

import { TOKEN_TYPES, type Token } from '../token-types.js';
import { lexerError } from './errors.js';
import {
  isDigit,
  isHexDigit,
  isIdentifierChar,
  isIdentifierStart,
  makeToken,
} from './helpers.js';
import { lookupKeyword } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekCodePoint,
} from './state.js';
import { readCharBody } from './strings.js';

// ============================================================
// NUMBERS
// ============================================================

const INTEGER_SUFFIXES: ReadonlySet<string> = new Set([
  'i8',
  'i16',
  'i32',
  'i64',
  'i128',
  'isize',
  'u8',
  'u16',
  'u32',
  'u64',
  'u128',
  'usize',
]);

const FLOAT_SUFFIXES: ReadonlySet<string> = new Set(['f32', 'f64']);

function readIdentifierTail(state: LexerState): string {
  let text = '';
  while (!isAtEnd(state) && isIdentifierChar(peekCodePoint(state))) {
    text += advance(state);
  }
  return text;
}

function readDecimalDigits(state: LexerState): string {
  let digits = '';
  while (isDigit(peek(state)) || peek(state) === '_') {
    digits += advance(state);
  }
  return digits;
}

/** Tuple index after `.`: plain decimal digits, so `t.0.1` lexes as two accesses */
export function readTupleIndex(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';
  while (isDigit(peek(state))) {
    value += advance(state);
  }
  return makeToken(TOKEN_TYPES.INTEGER, value, start, currentLocation(state));
}

function readRadixNumber(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // 0
  const marker = advance(state); // x, o or b
  const radix = marker === 'x' ? 16 : marker === 'o' ? 8 : 2;

  const rest = readIdentifierTail(state);
  const lexeme = `0${marker}${rest}`;

  let i = 0;
  while (i < rest.length && (isHexDigit(rest[i] ?? '') || rest[i] === '_')) {
    if (radix !== 16 && !isDigit(rest[i] ?? '') && rest[i] !== '_') break;
    i++;
  }
  const body = rest.slice(0, i).replace(/_/g, '');
  const suffix = rest.slice(i);

  const validBody =
    body.length > 0 &&
    [...body].every((d) => Number.parseInt(d, 16) < radix);
  if (!validBody || (suffix !== '' && !INTEGER_SUFFIXES.has(suffix))) {
    throw lexerError(state, 'TERN-L003', start, { value: lexeme });
  }

  return makeToken(
    TOKEN_TYPES.INTEGER,
    `0${marker}${body}`,
    start,
    currentLocation(state),
    suffix === '' ? undefined : suffix
  );
}

/**
 * Read a numeric literal. Integer vs float is decided by a fractional
 * part, an exponent, or an `f32`/`f64` suffix.
 */
export function readNumber(state: LexerState): Token {
  const marker = peek(state, 1);
  if (peek(state) === '0' && (marker === 'x' || marker === 'o' || marker === 'b')) {
    return readRadixNumber(state);
  }

  const start = currentLocation(state);
  let lexeme = readDecimalDigits(state);
  let isFloat = false;

  // `1..2` is a range and `1.max()` a method call
  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    isFloat = true;
    lexeme += advance(state);
    lexeme += readDecimalDigits(state);
  }

  if (peek(state) === 'e' || peek(state) === 'E') {
    isFloat = true;
    lexeme += advance(state);
    if (peek(state) === '+' || peek(state) === '-') {
      lexeme += advance(state);
    }
    const exponent = readDecimalDigits(state);
    lexeme += exponent;
    if (exponent.replace(/_/g, '') === '') {
      lexeme += readIdentifierTail(state);
      throw lexerError(state, 'TERN-L003', start, { value: lexeme });
    }
  }

  const value = lexeme.replace(/_/g, '');
  let suffix: string | undefined;
  if (isIdentifierStart(peekCodePoint(state))) {
    suffix = readIdentifierTail(state);
    const valid =
      FLOAT_SUFFIXES.has(suffix) || (!isFloat && INTEGER_SUFFIXES.has(suffix));
    if (!valid) {
      throw lexerError(state, 'TERN-L003', start, { value: lexeme + suffix });
    }
    if (FLOAT_SUFFIXES.has(suffix)) isFloat = true;
  }

  // 1e400 overflows to Infinity
  if (isFloat && !Number.isFinite(Number(value))) {
    throw lexerError(state, 'TERN-L003', start, { value: lexeme + (suffix ?? '') });
  }

  return makeToken(
    isFloat ? TOKEN_TYPES.FLOAT : TOKEN_TYPES.INTEGER,
    value,
    start,
    currentLocation(state),
    suffix
  );
}

// ============================================================
// IDENTIFIERS AND LABELS
// ============================================================

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  const value = readIdentifierTail(state);

  if (value === '_') {
    return makeToken(TOKEN_TYPES.UNDERSCORE, value, start, currentLocation(state));
  }

  const type = lookupKeyword(value) ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}

/**
 * `'` starts either a char literal (`'a'`, `'\n'`) or a label (`'outer`).
 * A label is an identifier after the quote with no closing quote.
 */
export function readQuote(state: LexerState): Token {
  const next = peekCodePoint(state, 1);
  const afterNext = state.source[state.pos + 1 + next.length] ?? '';

  if (isIdentifierStart(next) && afterNext !== "'") {
    const start = currentLocation(state);
    advance(state); // consume '
    const name = readIdentifierTail(state);
    // 'ab' is an overlong char literal, not a label
    if (peek(state) === "'") {
      advance(state);
      throw lexerError(state, 'TERN-L006', start);
    }
    return makeToken(TOKEN_TYPES.LABEL, name, start, currentLocation(state));
  }

  return readCharBody(state, TOKEN_TYPES.CHAR, currentLocation(state));
}

// ============================================================
// COMMENTS
// ============================================================

/** `//`, `///` or `#` through end of line (newline not included) */
export function readLineComment(state: LexerState): Token {
  const start = currentLocation(state);
  let type: Token['type'] = TOKEN_TYPES.LINE_COMMENT;

  if (peek(state) === '#') {
    advance(state);
    type = TOKEN_TYPES.HASH_COMMENT;
  } else {
    advance(state);
    advance(state);
    if (peek(state) === '/' && peek(state, 1) !== '/') {
      advance(state);
      type = TOKEN_TYPES.DOC_COMMENT;
    }
  }

  let text = '';
  while (!isAtEnd(state) && peek(state) !== '\n') {
    text += advance(state);
  }
  return makeToken(type, text, start, currentLocation(state));
}

/** `/* ... *\/`. Block comments do not nest. */
export function readBlockComment(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // /
  advance(state); // *

  let text = '';
  while (!isAtEnd(state)) {
    if (peek(state) === '*' && peek(state, 1) === '/') {
      advance(state);
      advance(state);
      return makeToken(
        TOKEN_TYPES.BLOCK_COMMENT,
        text,
        start,
        currentLocation(state)
      );
    }
    text += advance(state);
  }

  throw lexerError(state, 'TERN-L004', start);
}
