/**
 * Tokenizer
 * Main tokenization logic
 */

import { LexerError } from '../error-classes.js';
import { isCommentToken, TOKEN_TYPES, type Token } from '../token-types.js';
import { lexerError } from './errors.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  SINGLE_CHAR_OPERATORS,
  THREE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import {
  readBlockComment,
  readIdentifier,
  readLineComment,
  readNumber,
  readQuote,
  readTupleIndex,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  currentMode,
  isAtEnd,
  type LexerState,
  peek,
  peekCodePoint,
  peekString,
  resetModes,
} from './state.js';
import {
  beginInterpolatedString,
  isRawStringStart,
  readByteChar,
  readByteString,
  readFormatSpec,
  readRawString,
  readString,
  readStringPart,
} from './strings.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

/** `{` and `}` inside an interpolation: the unmatched `}` ends it */
function readBrace(state: LexerState): Token {
  const start = currentLocation(state);
  const mode = currentMode(state);
  const open = peek(state) === '{';

  if (mode.kind === 'interp') {
    if (open) {
      mode.braceDepth++;
    } else if (mode.braceDepth === 0) {
      state.modes.pop();
      return advanceAndMakeToken(state, 1, TOKEN_TYPES.INTERP_CLOSE, '}', start);
    } else {
      mode.braceDepth--;
    }
  }

  return advanceAndMakeToken(
    state,
    1,
    open ? TOKEN_TYPES.LBRACE : TOKEN_TYPES.RBRACE,
    open ? '{' : '}',
    start
  );
}

/** A single `:` outside any brace or group of the current interpolation */
function isFormatSpecStart(
  mode: { braceDepth: number; groupDepth: number },
  ch: string,
  next: string
): boolean {
  return (
    ch === ':' &&
    next !== ':' &&
    mode.braceDepth === 0 &&
    mode.groupDepth === 0
  );
}

function scanToken(state: LexerState): Token {
  const outer = currentMode(state);
  if (outer.kind === 'string') {
    return readStringPart(state, outer.start);
  }

  skipWhitespace(state);

  if (isAtEnd(state)) {
    const outermost = state.modes.find((m) => m.kind === 'string');
    if (outermost?.kind === 'string') {
      resetModes(state);
      throw lexerError(state, 'TERN-L001', outermost.start);
    }
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);
  const next = peek(state, 1);

  // Comments
  if (ch === '/' && next === '/') return readLineComment(state);
  if (ch === '/' && next === '*') return readBlockComment(state);
  if (ch === '#') {
    if (next === '[') {
      return advanceAndMakeToken(state, 1, TOKEN_TYPES.HASH, '#', start);
    }
    return readLineComment(state);
  }

  // Strings and chars
  if (ch === '"') return readString(state);
  if (ch === 'f' && next === '"') return beginInterpolatedString(state);
  if (ch === 'r' && isRawStringStart(state)) return readRawString(state);
  if (ch === 'b' && next === '"') return readByteString(state);
  if (ch === 'b' && next === "'") return readByteChar(state);
  if (ch === "'") return readQuote(state);

  // Numbers (unary minus is handled by the parser)
  if (isDigit(ch)) {
    const afterDot =
      state.lastType === TOKEN_TYPES.DOT ||
      state.lastType === TOKEN_TYPES.SAFE_NAV;
    return afterDot ? readTupleIndex(state) : readNumber(state);
  }

  // Identifier or keyword
  if (isIdentifierStart(peekCodePoint(state))) {
    return readIdentifier(state);
  }

  if (ch === '{' || ch === '}') {
    return readBrace(state);
  }

  const mode = currentMode(state);
  if (mode.kind === 'interp') {
    if (ch === '(' || ch === '[') mode.groupDepth++;
    if ((ch === ')' || ch === ']') && mode.groupDepth > 0) mode.groupDepth--;
    if (isFormatSpecStart(mode, ch, next)) return readFormatSpec(state);
  }

  // Operators, longest match first
  const threeChar = peekString(state, 3);
  const threeCharType = THREE_CHAR_OPERATORS[threeChar];
  if (threeCharType) {
    return advanceAndMakeToken(state, 3, threeCharType, threeChar, start);
  }

  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  const bad = advance(state);
  throw lexerError(state, 'TERN-L002', start, { char: bad });
}

/**
 * Produce the next token. Throws LexerError on malformed input; the
 * offending text has been consumed, so calling again resumes after it.
 */
export function nextToken(state: LexerState): Token {
  const token = scanToken(state);
  if (!isCommentToken(token)) {
    state.lastType = token.type;
  }
  return token;
}

/** Tokenize the whole source, comments included. Throws on the first lexer error. */
export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}

export interface TokenizeResult {
  readonly tokens: Token[];
  readonly errors: LexerError[];
}

/** Tokenize the whole source, collecting lexer errors instead of throwing */
export function tokenizeWithRecovery(source: string): TokenizeResult {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  const errors: LexerError[] = [];

  for (;;) {
    let token: Token;
    try {
      token = nextToken(state);
    } catch (err) {
      if (err instanceof LexerError) {
        errors.push(err);
        continue;
      }
      throw err;
    }
    tokens.push(token);
    if (token.type === TOKEN_TYPES.EOF) break;
  }

  return { tokens, errors };
}

// ============================================================
// NUMERIC VALUES
// ============================================================

export type NumericValue =
  | { readonly kind: 'integer'; readonly value: bigint }
  | { readonly kind: 'float'; readonly value: number };

/**
 * Numeric value of an INTEGER or FLOAT token. Integers are exact
 * (radix prefixes included); floats are IEEE doubles.
 */
export function numericValue(token: Token): NumericValue {
  if (token.type === TOKEN_TYPES.INTEGER) {
    return { kind: 'integer', value: BigInt(token.value) };
  }
  if (token.type === TOKEN_TYPES.FLOAT) {
    return { kind: 'float', value: Number(token.value) };
  }
  throw new TypeError(`Not a numeric token: ${token.type}`);
}
