/**
 * Parser State
 * Token cursor over a lazy lexer: lookahead, checkpoints, trials and
 * diagnostic bookkeeping.
 */

import { LexerError, ParseError, createError } from '../error-classes.js';
import { suggestSimilarNames } from '../diagnostics.js';
import { createLexerState, type LexerState } from '../lexer/state.js';
import { nextToken } from '../lexer/tokenizer.js';
import { KEYWORDS } from '../lexer/operators.js';
import {
  emptySpanAt,
  makeSpan,
  type SourceLocation,
  type SourceSpan,
} from '../source-location.js';
import {
  isCommentToken,
  TOKEN_TYPES,
  type Token,
  type TokenType,
} from '../token-types.js';
import {
  MAX_NESTING_DEPTH,
  type ResolvedParseOptions,
  type TrialKind,
} from './options.js';

// ============================================================
// PARSER STATE
// ============================================================

/** Context flags that change how ambiguous constructs are read */
export interface Restrictions {
  /** `Name {` does not start a struct literal (if/while conditions, match subject, for iterable) */
  readonly noStructLiteral: boolean;
  /** `x => body` is not a lambda (match guards) */
  readonly noArrowLambda: boolean;
}

const NO_RESTRICTIONS: Restrictions = Object.freeze({
  noStructLiteral: false,
  noArrowLambda: false,
});

interface SplitRecord {
  readonly index: number;
  readonly original: Token;
}

export interface ParserState {
  readonly source: string;
  readonly options: ResolvedParseOptions;
  readonly lexer: LexerState;
  /** Significant tokens pulled so far. Never trimmed, so checkpoints stay O(1). */
  readonly buffer: Token[];
  /** Every token the lexer produced, comments included */
  readonly allTokens: Token[];
  pos: number;
  /** End of the last consumed token; node spans end here */
  previousEnd: SourceLocation;
  readonly errors: ParseError[];
  /** Set when a diagnostic is recorded; suppresses cascades until the next sync */
  panicMode: boolean;
  /** Nesting depth of disambiguation trials; diagnostics throw while > 0 */
  trialDepth: number;
  readonly trialStarts: number[];
  restrictions: Restrictions;
  syncCount: number;
  /** Open recursive productions (expressions, patterns, types) */
  depth: number;
  /** maxErrors reached: the cursor reports EOF from here on */
  halted: boolean;
  lexerDone: boolean;
  readonly splits: SplitRecord[];
}

export function createParserState(
  source: string,
  options: ResolvedParseOptions
): ParserState {
  const start = { line: 1, column: 1, offset: 0 };
  return {
    source,
    options,
    lexer: createLexerState(source),
    buffer: [],
    allTokens: [],
    pos: 0,
    previousEnd: start,
    errors: [],
    panicMode: false,
    trialDepth: 0,
    trialStarts: [],
    restrictions: NO_RESTRICTIONS,
    syncCount: 0,
    depth: 0,
    halted: false,
    lexerDone: false,
    splits: [],
  };
}

/** Thrown inside a trial that consumed more than maxTrialTokens */
class TrialBudgetExceeded extends Error {
  constructor() {
    super('Trial token budget exceeded');
    this.name = 'TrialBudgetExceeded';
  }
}

// ============================================================
// LEXER PULL
// ============================================================

/**
 * Record a lexer error and leave an ERROR token in its place, so the
 * parser sees one bad operand instead of a gap.
 */
function recordLexerError(state: ParserState, err: LexerError): void {
  if (!state.options.recoveryMode) throw err;
  if (state.halted) return;
  const converted = ParseError.fromLexerError(err);
  state.errors.push(converted);
  state.options.observability.onDiagnostic?.({
    error: converted,
    count: state.errors.length,
  });
  if (state.errors.length >= state.options.maxErrors) {
    state.halted = true;
    return;
  }
  enterPanicMode(state);

  // An unterminated string reports from its opening quote; keep tokens in order
  const last = state.buffer[state.buffer.length - 1];
  const start =
    last && last.span.end.offset > err.span.start.offset
      ? last.span.end
      : err.span.start;
  state.buffer.push({
    type: TOKEN_TYPES.ERROR,
    value: converted.text,
    span: { start, end: err.span.end },
  });
}

function pull(state: ParserState): void {
  let token: Token;
  try {
    token = nextToken(state.lexer);
  } catch (err) {
    if (err instanceof LexerError) {
      recordLexerError(state, err);
      return;
    }
    throw err;
  }

  state.allTokens.push(token);
  if (isCommentToken(token)) return;
  state.buffer.push(token);
  if (token.type === TOKEN_TYPES.EOF) state.lexerDone = true;
}

function fill(state: ParserState, index: number): void {
  while (state.buffer.length <= index && !state.lexerDone) {
    pull(state);
  }
}

/** Drain the lexer so the full token list is available */
export function drainTokens(state: ParserState): Token[] {
  while (!state.lexerDone) pull(state);
  return state.allTokens;
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

function haltToken(state: ParserState): Token {
  return {
    type: TOKEN_TYPES.EOF,
    value: '',
    span: emptySpanAt(state.previousEnd),
  };
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  if (state.halted) return haltToken(state);
  const index = state.pos + offset;
  fill(state, index);
  const token = state.buffer[index] ?? state.buffer[state.buffer.length - 1];
  if (token) return token;
  throw new Error('No tokens available');
}

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function checkAt(
  state: ParserState,
  offset: number,
  ...types: TokenType[]
): boolean {
  return types.includes(peek(state, offset).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (token.type === TOKEN_TYPES.EOF) return token;

  state.pos++;
  state.previousEnd = token.span.end;

  const trialStart = state.trialStarts[state.trialStarts.length - 1];
  if (
    trialStart !== undefined &&
    state.pos - trialStart > state.options.maxTrialTokens
  ) {
    throw new TrialBudgetExceeded();
  }
  return token;
}

/** Consume the current token if it has the given type */
export function match(state: ParserState, type: TokenType): Token | null {
  return check(state, type) ? advance(state) : null;
}

/** @internal */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Token {
  if (check(state, type)) return advance(state);
  throw expectedError(state, expected, type);
}

/** Name the offending token in messages */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.EOF:
      return 'end of input';
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.RAW_STRING:
    case TOKEN_TYPES.BYTE_STRING:
    case TOKEN_TYPES.STRING_BEGIN:
      return 'string literal';
    case TOKEN_TYPES.STRING_FRAGMENT:
      return 'string fragment';
    default:
      return `'${token.value}'`;
  }
}

/** TERN-P007 "{expected}, found {found}" at the current token, with a hint when one applies */
export function expectedError(
  state: ParserState,
  expected: string,
  expectedType?: TokenType
): ParseError {
  const token = current(state);
  const found = describeToken(token);
  const hint = generateHint(expectedType, token);
  const message = `${expected}, found ${found}`;
  return new ParseError(
    'TERN-P007',
    hint ? `${message}. ${hint}` : message,
    token.span,
    { expected, found }
  );
}

// ============================================================
// ERROR HINTS
// ============================================================

const KEYWORD_NAMES = Object.keys(KEYWORDS);

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
export function generateHint(
  expectedType: TokenType | undefined,
  actualToken: Token
): string | null {
  const actual = actualToken.type;

  if (actual === TOKEN_TYPES.EOF) {
    if (expectedType === TOKEN_TYPES.RPAREN) {
      return 'Hint: Check for unclosed parenthesis';
    }
    if (expectedType === TOKEN_TYPES.RBRACE) {
      return 'Hint: Check for unclosed brace';
    }
    if (expectedType === TOKEN_TYPES.RBRACKET) {
      return 'Hint: Check for unclosed bracket';
    }
  }

  // Keyword typos: `retrun`, `fucntion`, `whiel`
  if (actual === TOKEN_TYPES.IDENTIFIER && actualToken.value.length >= 4) {
    const [suggestion] = suggestSimilarNames(actualToken.value, KEYWORD_NAMES);
    if (suggestion !== undefined) {
      return `Hint: Did you mean '${suggestion}'?`;
    }
  }

  if (expectedType === TOKEN_TYPES.FAT_ARROW && actual === TOKEN_TYPES.ARROW) {
    return "Hint: Match arms use '=>', not '->'";
  }

  if (expectedType === TOKEN_TYPES.ASSIGN && actual === TOKEN_TYPES.EQ) {
    return "Hint: Use '=' to bind, '==' compares";
  }

  return null;
}

// ============================================================
// DIAGNOSTICS
// ============================================================

/**
 * Record a diagnostic. Inside a trial the error is thrown (warnings are
 * dropped) so the trial fails; outside recovery mode errors are thrown.
 */
export function report(state: ParserState, error: ParseError): void {
  if (state.trialDepth > 0) {
    if (error.severity === 'warning') return;
    throw error;
  }
  if (!state.options.recoveryMode) {
    if (error.severity === 'error') throw error;
    return;
  }
  if (state.halted) return;
  // An ERROR token carries its lexer diagnostic
  const token = current(state);
  if (
    token.type === TOKEN_TYPES.ERROR &&
    error.span.start.offset === token.span.start.offset
  ) {
    return;
  }
  if (
    state.panicMode &&
    error.severity === 'error' &&
    error.kind !== 'UnclosedDelimiter'
  ) {
    return;
  }

  state.errors.push(error);
  state.options.observability.onDiagnostic?.({
    error,
    count: state.errors.length,
  });
  if (error.severity === 'error') enterPanicMode(state);
  if (state.errors.length >= state.options.maxErrors) state.halted = true;
}

export function enterPanicMode(state: ParserState): void {
  state.panicMode = true;
}

/** Run a recursive production one level deeper; TERN-P008 past MAX_NESTING_DEPTH */
export function nested<T>(state: ParserState, parse: () => T): T {
  if (state.depth >= MAX_NESTING_DEPTH) {
    throw createError(
      'TERN-P008',
      { limit: MAX_NESTING_DEPTH },
      current(state).span
    );
  }
  state.depth++;
  try {
    return parse();
  } finally {
    state.depth--;
  }
}

/** Errors from a nested production propagate when we cannot recover here */
export function canRecover(state: ParserState, err: unknown): err is ParseError {
  return (
    err instanceof ParseError &&
    state.trialDepth === 0 &&
    state.options.recoveryMode
  );
}

// ============================================================
// DELIMITERS
// ============================================================

const CLOSERS: Readonly<Partial<Record<TokenType, string>>> = Object.freeze({
  [TOKEN_TYPES.RPAREN]: ')',
  [TOKEN_TYPES.RBRACKET]: ']',
  [TOKEN_TYPES.RBRACE]: '}',
  [TOKEN_TYPES.INTERP_CLOSE]: '}',
  [TOKEN_TYPES.STRING_END]: '"',
});

/** Statement and declaration keywords the parser resynchronizes at */
export const STATEMENT_KEYWORDS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.LET,
  TOKEN_TYPES.VAR,
  TOKEN_TYPES.CONST,
  TOKEN_TYPES.FN,
  TOKEN_TYPES.FUN,
  TOKEN_TYPES.TYPE,
  TOKEN_TYPES.USE,
  TOKEN_TYPES.IMPORT,
  TOKEN_TYPES.FROM,
  TOKEN_TYPES.STRUCT,
  TOKEN_TYPES.CLASS,
  TOKEN_TYPES.ENUM,
  TOKEN_TYPES.ACTOR,
  TOKEN_TYPES.TRAIT,
  TOKEN_TYPES.INTERFACE,
  TOKEN_TYPES.IMPL,
  TOKEN_TYPES.MOD,
  TOKEN_TYPES.MODULE,
  TOKEN_TYPES.PUB,
  TOKEN_TYPES.IF,
  TOKEN_TYPES.MATCH,
  TOKEN_TYPES.FOR,
  TOKEN_TYPES.WHILE,
  TOKEN_TYPES.LOOP,
  TOKEN_TYPES.RETURN,
  TOKEN_TYPES.BREAK,
  TOKEN_TYPES.CONTINUE,
  TOKEN_TYPES.TRY,
  TOKEN_TYPES.EXPORT,
  TOKEN_TYPES.ASYNC,
]);

/** `)`, `]`, `}` or the end of a string or interpolation */
export function isClosingDelimiter(token: Token): boolean {
  return CLOSERS[token.type] !== undefined;
}

/**
 * Before a list element: the list's own close, end of input, or another
 * construct's closer that ends the list early.
 */
export function atListEnd(state: ParserState, close: TokenType): boolean {
  return check(state, close, TOKEN_TYPES.EOF) || isClosingDelimiter(current(state));
}

/** A token that cannot continue the current delimited construct */
function isCloseSyncPoint(token: Token): boolean {
  return (
    token.type === TOKEN_TYPES.EOF ||
    CLOSERS[token.type] !== undefined ||
    STATEMENT_KEYWORDS.has(token.type)
  );
}

/**
 * Consume the closing delimiter for `open`. At end of input or a sync
 * point (or one of `exits`) the close is synthesized and one
 * UnclosedDelimiter is reported against the opening token; any other
 * token is an UnexpectedToken.
 */
export function expectClose(
  state: ParserState,
  closeType: TokenType,
  open: Token,
  exits: readonly TokenType[] = []
): Token | null {
  if (check(state, closeType)) return advance(state);

  const close = CLOSERS[closeType] ?? closeType;
  const token = current(state);
  if (!isCloseSyncPoint(token) && !exits.includes(token.type)) {
    throw expectedError(state, `Expected '${close}'`, closeType);
  }

  const error = createError(
    'TERN-P002',
    { open: open.value, close },
    open.span
  );
  error.recovery = 'synthesized';
  report(state, error);
  return null;
}

/**
 * Split `>>`, `>=` or `>>=` so a type-argument list can take a single
 * `>`. Returns false if the current token does not start with `>`.
 */
export function splitCompoundGt(state: ParserState): boolean {
  const token = current(state);
  if (token.type === TOKEN_TYPES.GT) return true;

  let restType: TokenType;
  switch (token.type) {
    case TOKEN_TYPES.SHR:
      restType = TOKEN_TYPES.GT;
      break;
    case TOKEN_TYPES.GE:
      restType = TOKEN_TYPES.ASSIGN;
      break;
    case TOKEN_TYPES.SHR_ASSIGN:
      restType = TOKEN_TYPES.GE;
      break;
    default:
      return false;
  }

  const { start, end } = token.span;
  const mid: SourceLocation = {
    line: start.line,
    column: start.column + 1,
    offset: start.offset + 1,
  };
  const first: Token = { type: TOKEN_TYPES.GT, value: '>', span: makeSpan(start, mid) };
  const rest: Token = {
    type: restType,
    value: token.value.slice(1),
    span: makeSpan(mid, end),
  };
  state.buffer.splice(state.pos, 1, first, rest);
  state.splits.push({ index: state.pos, original: token });
  return true;
}

// ============================================================
// CHECKPOINTS AND TRIALS
// ============================================================

export interface Checkpoint {
  readonly pos: number;
  readonly previousEnd: SourceLocation;
  readonly splitCount: number;
}

export function checkpoint(state: ParserState): Checkpoint {
  return {
    pos: state.pos,
    previousEnd: state.previousEnd,
    splitCount: state.splits.length,
  };
}

export function restore(state: ParserState, cp: Checkpoint): void {
  while (state.splits.length > cp.splitCount) {
    const split = state.splits.pop();
    if (split) state.buffer.splice(split.index, 2, split.original);
  }
  state.pos = cp.pos;
  state.previousEnd = cp.previousEnd;
}

export type TrialResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly exhausted: boolean };

/**
 * Run `attempt` speculatively. Diagnostics throw while it runs. If it
 * throws a ParseError, runs out of token budget or returns null, the
 * cursor is restored.
 */
export function withTrial<T>(
  state: ParserState,
  kind: TrialKind,
  attempt: () => T | null
): TrialResult<T> {
  const cp = checkpoint(state);
  const savedRestrictions = state.restrictions;
  const savedPanic = state.panicMode;
  let value: T | null = null;
  let exhausted = false;

  state.trialDepth++;
  state.trialStarts.push(state.pos);
  try {
    value = attempt();
  } catch (err) {
    if (err instanceof TrialBudgetExceeded) {
      exhausted = true;
    } else if (!(err instanceof ParseError)) {
      throw err;
    }
  } finally {
    state.trialDepth--;
    state.trialStarts.pop();
    state.restrictions = savedRestrictions;
    state.panicMode = savedPanic;
  }

  const tokens = state.pos - cp.pos;
  if (value === null) restore(state, cp);
  state.options.observability.onTrial?.({
    kind,
    success: value !== null,
    tokens,
    exhausted,
  });

  return value === null ? { ok: false, exhausted } : { ok: true, value };
}

/** Run `fn` with some restrictions changed, restoring them afterwards */
export function withRestrictions<T>(
  state: ParserState,
  patch: Partial<Restrictions>,
  fn: () => T
): T {
  const saved = state.restrictions;
  state.restrictions = { ...saved, ...patch };
  try {
    return fn();
  } finally {
    state.restrictions = saved;
  }
}

/** Inside brackets every restriction is lifted */
export function unrestricted<T>(state: ParserState, fn: () => T): T {
  return withRestrictions(state, NO_RESTRICTIONS, fn);
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** Span from `start` to the end of the last consumed token */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  const end =
    state.previousEnd.offset >= start.offset ? state.previousEnd : start;
  return makeSpan(start, end);
}

export { makeSpan };
