/**
 * Error Recovery
 * Panic-mode resynchronization at statement and member boundaries
 */

import type { ErrorNode } from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type Token, type TokenType } from '../token-types.js';
import {
  type ParserState,
  STATEMENT_KEYWORDS,
  advance,
  current,
  isAtEnd,
  spanFrom,
} from './state.js';

const OPENERS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.LPAREN,
  TOKEN_TYPES.LBRACKET,
  TOKEN_TYPES.LBRACE,
  TOKEN_TYPES.STRING_BEGIN,
  TOKEN_TYPES.INTERP_OPEN,
]);

const CLOSERS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.RPAREN,
  TOKEN_TYPES.RBRACKET,
  TOKEN_TYPES.RBRACE,
  TOKEN_TYPES.STRING_END,
  TOKEN_TYPES.INTERP_CLOSE,
]);

/** Where skipping stops at nesting depth zero */
type StopRule = (token: Token, madeProgress: boolean) => 'stop' | 'consume' | 'skip';

function skipUntil(
  state: ParserState,
  startPos: number,
  level: 'statement' | 'member',
  rule: StopRule
): void {
  let skipped = 0;
  let depth = 0;

  // Each sync event consumes at least one token, except at a member-level
  // closer: the enclosing list stops there and expectClose takes it.
  const first = current(state);
  const heldCloser = level === 'member' && CLOSERS.has(first.type);
  if (state.pos === startPos && !isAtEnd(state) && !heldCloser) {
    advance(state);
    skipped++;
    if (OPENERS.has(first.type)) depth++;
  }

  while (!isAtEnd(state)) {
    const token = current(state);

    if (depth > 0) {
      if (OPENERS.has(token.type)) depth++;
      else if (CLOSERS.has(token.type)) depth--;
      advance(state);
      skipped++;
      continue;
    }

    const action = rule(token, state.pos > startPos);
    if (action === 'stop') break;
    advance(state);
    skipped++;
    if (action === 'consume') break;
    if (OPENERS.has(token.type)) depth++;
  }

  state.panicMode = false;
  state.syncCount++;
  state.options.observability.onSynchronize?.({
    skipped,
    resumeAt: current(state),
    level,
  });
}

/**
 * Discard tokens until a statement boundary: `;` (consumed), a statement
 * or declaration keyword, or the enclosing `}`. Nested delimiters are
 * skipped whole.
 */
export function synchronize(state: ParserState, startPos: number): void {
  skipUntil(state, startPos, 'statement', (token, madeProgress) => {
    if (token.type === TOKEN_TYPES.SEMICOLON) return 'consume';
    if (token.type === TOKEN_TYPES.RBRACE) return 'stop';
    if (STATEMENT_KEYWORDS.has(token.type) && madeProgress) return 'stop';
    return 'skip';
  });
}

/**
 * Discard tokens until a member boundary: `,` or `;` (consumed), a
 * member-start token, or the list's closing delimiter.
 */
export function synchronizeMember(
  state: ParserState,
  startPos: number,
  memberStarts: ReadonlySet<TokenType>
): void {
  skipUntil(state, startPos, 'member', (token, madeProgress) => {
    if (token.type === TOKEN_TYPES.COMMA) return 'consume';
    if (token.type === TOKEN_TYPES.SEMICOLON) return 'consume';
    if (CLOSERS.has(token.type)) return 'stop';
    if (memberStarts.has(token.type) && madeProgress) return 'stop';
    return 'skip';
  });
}

/**
 * The parser is already at a boundary (e.g. right after a dangling
 * `try` block): count the sync without discarding anything.
 */
export function synchronizeHere(state: ParserState): void {
  state.panicMode = false;
  state.syncCount++;
  state.options.observability.onSynchronize?.({
    skipped: 0,
    resumeAt: current(state),
    level: 'statement',
  });
}

/** ErrorNode covering the source skipped since `start` */
export function makeErrorNode(
  state: ParserState,
  start: SourceLocation,
  message: string
): ErrorNode {
  const span = spanFrom(state, start);
  return {
    type: 'Error',
    message,
    text: state.source.slice(span.start.offset, span.end.offset),
    span,
  };
}
