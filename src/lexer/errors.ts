/**
 * Lexer Errors
 */

import { createLexerError, type LexerError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import { currentLocation, type LexerState } from './state.js';

/**
 * Build a LexerError spanning from `start` to the cursor.
 * Callers must have consumed at least one code point (or reset the mode
 * stack at end of input) so the next call makes progress.
 */
export function lexerError(
  state: LexerState,
  errorId: string,
  start: SourceLocation,
  context: Record<string, unknown> = {}
): LexerError {
  return createLexerError(errorId, context, {
    start,
    end: currentLocation(state),
  });
}
