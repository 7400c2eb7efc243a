/**
 * String Readers
 * Plain, raw, byte and interpolated (`f"..."`) strings, plus char literals
 */

import type { LexerError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type Token, type TokenType } from '../token-types.js';
import { lexerError } from './errors.js';
import { isHexDigit, makeToken } from './helpers.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  resetModes,
} from './state.js';

// ============================================================
// ESCAPES
// ============================================================

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = Object.freeze({
  n: '\n',
  r: '\r',
  t: '\t',
  '0': '\0',
  '\\': '\\',
  '"': '"',
  "'": "'",
  '{': '{',
  '}': '}',
});

function readUnicodeEscape(state: LexerState): string | null {
  if (peek(state) !== '{') return null;
  advance(state);
  let hex = '';
  while (isHexDigit(peek(state))) {
    hex += advance(state);
  }
  if (peek(state) !== '}') return null;
  advance(state);

  if (hex.length === 0 || hex.length > 6) return null;
  const cp = Number.parseInt(hex, 16);
  if (cp > 0x10ffff || (cp >= 0xd800 && cp <= 0xdfff)) return null;
  return String.fromCodePoint(cp);
}

/**
 * Consume `\` and its escape. Returns the resolved text, or a LexerError
 * the caller reports once the enclosing literal is fully consumed.
 */
function readEscape(state: LexerState): string | LexerError {
  const start = currentLocation(state);
  advance(state); // backslash
  const escaped = advance(state);

  const simple = Object.hasOwn(SIMPLE_ESCAPES, escaped)
    ? SIMPLE_ESCAPES[escaped]
    : undefined;
  if (simple !== undefined) return simple;

  if (escaped === 'u') {
    const resolved = readUnicodeEscape(state);
    if (resolved !== null) return resolved;
  }

  const sequence = state.source.slice(start.offset + 1, state.pos);
  return lexerError(state, 'TERN-L005', start, { sequence });
}

// ============================================================
// PLAIN AND BYTE STRINGS
// ============================================================

function readQuotedBody(
  state: LexerState,
  type: TokenType,
  start: SourceLocation
): Token {
  advance(state); // opening "

  let value = '';
  let escapeError: LexerError | null = null;
  while (!isAtEnd(state) && peek(state) !== '"') {
    if (peek(state) === '\\') {
      const resolved = readEscape(state);
      if (typeof resolved === 'string') {
        value += resolved;
      } else {
        escapeError ??= resolved;
      }
    } else {
      value += advance(state);
    }
  }

  if (isAtEnd(state)) {
    throw lexerError(state, 'TERN-L001', start);
  }
  advance(state); // closing "

  if (escapeError) throw escapeError;
  return makeToken(type, value, start, currentLocation(state));
}

/** `"..."`: braces are literal text */
export function readString(state: LexerState): Token {
  return readQuotedBody(state, TOKEN_TYPES.STRING, currentLocation(state));
}

/** `b"..."`: braces are literal text */
export function readByteString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // b
  return readQuotedBody(state, TOKEN_TYPES.BYTE_STRING, start);
}

// ============================================================
// RAW STRINGS
// ============================================================

/** True at `r"` or `r#...#"` */
export function isRawStringStart(state: LexerState): boolean {
  let i = 1;
  while (peek(state, i) === '#') i++;
  return peek(state, i) === '"';
}

/** `r"..."` / `r#"..."#`: no escapes, closed by a quote and the same number of hashes */
export function readRawString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // r
  let hashes = 0;
  while (peek(state) === '#') {
    advance(state);
    hashes++;
  }
  advance(state); // opening "

  const closing = '"' + '#'.repeat(hashes);
  let value = '';
  while (!isAtEnd(state)) {
    if (state.source.startsWith(closing, state.pos)) {
      for (let i = 0; i < closing.length; i++) advance(state);
      return makeToken(
        TOKEN_TYPES.RAW_STRING,
        value,
        start,
        currentLocation(state)
      );
    }
    value += advance(state);
  }

  throw lexerError(state, 'TERN-L001', start);
}

// ============================================================
// INTERPOLATED STRINGS
// ============================================================

/** `f"` opening an interpolated string; pushes string mode */
export function beginInterpolatedString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // f
  advance(state); // opening "
  state.modes.push({ kind: 'string', start });
  return makeToken(TOKEN_TYPES.STRING_BEGIN, 'f"', start, currentLocation(state));
}

/**
 * Next token inside an interpolated string: a fragment, `{` opening an
 * interpolation, or the closing quote. Fragments are never empty.
 * `{{` and `}}` are literal braces; `{}` is kept as placeholder text.
 */
export function readStringPart(
  state: LexerState,
  stringStart: SourceLocation
): Token {
  const start = currentLocation(state);

  if (isAtEnd(state)) {
    resetModes(state);
    throw lexerError(state, 'TERN-L001', stringStart);
  }

  if (peek(state) === '"') {
    advance(state);
    state.modes.pop();
    return makeToken(TOKEN_TYPES.STRING_END, '"', start, currentLocation(state));
  }

  if (isInterpolationOpen(state)) {
    advance(state);
    state.modes.push({ kind: 'interp', braceDepth: 0, groupDepth: 0 });
    return makeToken(TOKEN_TYPES.INTERP_OPEN, '{', start, currentLocation(state));
  }

  let value = '';
  let escapeError: LexerError | null = null;
  while (!isAtEnd(state) && peek(state) !== '"' && !isInterpolationOpen(state)) {
    const ch = peek(state);
    if (ch === '\\') {
      const resolved = readEscape(state);
      if (typeof resolved === 'string') {
        value += resolved;
      } else {
        escapeError ??= resolved;
      }
    } else if (ch === '{' || (ch === '}' && peek(state, 1) === '}')) {
      // {{ }} and {}
      const pair = advance(state) + advance(state);
      value += pair === '{}' ? pair : ch;
    } else {
      value += advance(state);
    }
  }

  if (escapeError) throw escapeError;
  return makeToken(
    TOKEN_TYPES.STRING_FRAGMENT,
    value,
    start,
    currentLocation(state)
  );
}

function isInterpolationOpen(state: LexerState): boolean {
  if (peek(state) !== '{') return false;
  const next = peek(state, 1);
  return next !== '{' && next !== '}';
}

/**
 * `:spec` ending an interpolation: the text up to the closing `}`,
 * without the colon. Pops nothing; the `}` still closes the interpolation.
 */
export function readFormatSpec(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // :
  let value = '';
  while (!isAtEnd(state) && peek(state) !== '}' && peek(state) !== '"') {
    value += advance(state);
  }
  return makeToken(TOKEN_TYPES.FORMAT_SPEC, value, start, currentLocation(state));
}

// ============================================================
// CHAR LITERALS
// ============================================================

/** `'c'` or `'\n'`; `start` precedes any `b` prefix */
export function readCharBody(
  state: LexerState,
  type: TokenType,
  start: SourceLocation
): Token {
  advance(state); // opening '

  if (isAtEnd(state) || peek(state) === '\n' || peek(state) === "'") {
    advance(state);
    throw lexerError(state, 'TERN-L006', start);
  }

  let value: string;
  if (peek(state) === '\\') {
    const resolved = readEscape(state);
    if (typeof resolved !== 'string') {
      if (peek(state) === "'") advance(state);
      throw resolved;
    }
    value = resolved;
  } else {
    value = advance(state);
  }

  if (peek(state) !== "'") {
    throw lexerError(state, 'TERN-L006', start);
  }
  advance(state);
  return makeToken(type, value, start, currentLocation(state));
}

/** `b'c'` */
export function readByteChar(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // b
  return readCharBody(state, TOKEN_TYPES.BYTE, start);
}
