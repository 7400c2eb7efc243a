/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { SourceLocation } from '../source-location.js';
import type { TokenType } from '../token-types.js';

/**
 * Lexing modes. `code` is the bottom of the stack and is never popped.
 * An interpolated string pushes `string`; each `{` inside it pushes
 * `interp`, which counts its own braces so the matching `}` can be found,
 * and its open parens and brackets so a top-level `:` can start a format spec.
 */
export type LexerMode =
  | { readonly kind: 'code' }
  | { readonly kind: 'string'; readonly start: SourceLocation }
  | { readonly kind: 'interp'; braceDepth: number; groupDepth: number };

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
  modes: LexerMode[];
  /** Type of the last non-comment token produced */
  lastType: TokenType | null;
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    pos: 0,
    line: 1,
    column: 1,
    modes: [{ kind: 'code' }],
    lastType: null,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function currentMode(state: LexerState): LexerMode {
  return state.modes[state.modes.length - 1] ?? { kind: 'code' };
}

/** Drop every open string and interpolation (used when input ends inside one) */
export function resetModes(state: LexerState): void {
  state.modes = [{ kind: 'code' }];
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

/** Full code point at the cursor (two UTF-16 units for astral characters) */
export function peekCodePoint(state: LexerState, offset = 0): string {
  const cp = state.source.codePointAt(state.pos + offset);
  return cp === undefined ? '' : String.fromCodePoint(cp);
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

/** Consume one code point. Columns count code points, offsets count UTF-16 units. */
export function advance(state: LexerState): string {
  const ch = peekCodePoint(state);
  state.pos += ch.length;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else if (ch !== '') {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
