/**
 * Parser Extension: Control Flow
 * Blocks, conditionals, match, loops, labels and jumps
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  BreakNode,
  ContinueNode,
  ErrorNode,
  ExpressionNode,
  ForNode,
  IfLetNode,
  IfNode,
  LoopNode,
  MatchArmNode,
  MatchNode,
  ReturnNode,
  WhileLetNode,
  WhileNode,
} from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import {
  advance,
  canRecover,
  check,
  current,
  expect,
  expectClose,
  expectedError,
  isClosingDelimiter,
  match,
  report,
  spanFrom,
  unrestricted,
  withRestrictions,
} from './state.js';
import { canStartExpression } from './helpers.js';
import { makeErrorNode, synchronizeMember } from './recovery.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(label: string | null, start: SourceLocation): BlockNode;
    parseIf(): IfNode | IfLetNode;
    parseMatch(): MatchNode;
    parseMatchArm(): MatchArmNode;
    parseFor(label: string | null, start: SourceLocation): ForNode;
    parseWhile(
      label: string | null,
      start: SourceLocation
    ): WhileNode | WhileLetNode;
    parseLoop(label: string | null, start: SourceLocation): LoopNode;
    parseLabeled(): ExpressionNode;
    parseBreak(): BreakNode;
    parseContinue(): ContinueNode;
    parseReturn(): ReturnNode;
    parseJumpValue(keywordLine: number): ExpressionNode | null;
  }
}

/** A match arm body ending in `}` needs no comma */
const BLOCK_BODIED: ReadonlySet<ExpressionNode['type']> = new Set<
  ExpressionNode['type']
>([
  'Block',
  'AsyncBlock',
  'If',
  'IfLet',
  'Match',
  'For',
  'While',
  'WhileLet',
  'Loop',
  'TryCatch',
]);

const NO_MEMBER_STARTS: ReadonlySet<TokenType> = new Set<TokenType>();

// ============================================================
// BLOCKS
// ============================================================

Parser.prototype.parseBlock = function (
  this: Parser,
  label: string | null,
  start: SourceLocation
): BlockNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{'");
  const statements = unrestricted(this.state, () =>
    this.parseItems(TOKEN_TYPES.RBRACE)
  );
  expectClose(this.state, TOKEN_TYPES.RBRACE, open);

  return {
    type: 'Block',
    label,
    statements,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// CONDITIONALS
// ============================================================

/** `if cond {} else if ... else {}` and `if let pat = value {}` */
Parser.prototype.parseIf = function (this: Parser): IfNode | IfLetNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume if

  if (match(this.state, TOKEN_TYPES.LET)) {
    const pattern = this.parsePattern();
    expect(this.state, TOKEN_TYPES.ASSIGN, "Expected '='");
    const value = this.parseExpressionNoStruct();
    const thenBranch = this.parseBlock(null, current(this.state).span.start);
    const elseBranch = parseElse(this);
    return {
      type: 'IfLet',
      pattern,
      value,
      thenBranch,
      elseBranch,
      span: spanFrom(this.state, start),
    };
  }

  const condition = this.parseExpressionNoStruct();
  const thenBranch = this.parseBlock(null, current(this.state).span.start);
  const elseBranch = parseElse(this);
  return {
    type: 'If',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

function parseElse(parser: Parser): BlockNode | IfNode | IfLetNode | null {
  if (!match(parser.state, TOKEN_TYPES.ELSE)) return null;
  if (check(parser.state, TOKEN_TYPES.IF)) return parser.parseIf();
  return parser.parseBlock(null, current(parser.state).span.start);
}

// ============================================================
// MATCH
// ============================================================

/**
 * `match subject { pattern if guard => body, ... }`
 * An arm that fails to parse becomes an ErrorNode and the next arm is
 * read after the following `,`.
 */
Parser.prototype.parseMatch = function (this: Parser): MatchNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume match

  const subject = this.parseExpressionNoStruct();
  const open = expect(
    this.state,
    TOKEN_TYPES.LBRACE,
    "Expected '{' after match subject"
  );

  const arms = unrestricted(this.state, () => {
    const parsed: (MatchArmNode | ErrorNode)[] = [];
    while (!check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) {
      if (isClosingDelimiter(current(this.state))) break;
      const armStart = current(this.state).span.start;
      const startPos = this.state.pos;
      try {
        parsed.push(this.parseMatchArm());
      } catch (err) {
        if (!canRecover(this.state, err)) throw err;
        err.recovery = 'synchronized';
        report(this.state, err);
        synchronizeMember(this.state, startPos, NO_MEMBER_STARTS);
        parsed.push(makeErrorNode(this.state, armStart, err.text));
      }
    }
    return parsed;
  });

  expectClose(this.state, TOKEN_TYPES.RBRACE, open);
  return { type: 'Match', subject, arms, span: spanFrom(this.state, start) };
};

Parser.prototype.parseMatchArm = function (this: Parser): MatchArmNode {
  const start = current(this.state).span.start;
  const pattern = this.parsePattern();

  // `x => ...` inside a guard would swallow the arm arrow
  const guard = match(this.state, TOKEN_TYPES.IF)
    ? withRestrictions(this.state, { noArrowLambda: true }, () =>
        this.parseExpression()
      )
    : null;

  expect(this.state, TOKEN_TYPES.FAT_ARROW, "Expected '=>'");
  const body = this.parseExpression();
  const span = spanFrom(this.state, start);

  if (
    !match(this.state, TOKEN_TYPES.COMMA) &&
    !check(this.state, TOKEN_TYPES.RBRACE) &&
    !BLOCK_BODIED.has(body.type)
  ) {
    throw expectedError(this.state, "Expected ',' or '}' after match arm");
  }

  return { type: 'MatchArm', pattern, guard, body, span };
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseFor = function (
  this: Parser,
  label: string | null,
  start: SourceLocation
): ForNode {
  advance(this.state); // consume for
  const pattern = this.parsePattern();
  expect(this.state, TOKEN_TYPES.IN, "Expected 'in'");
  const iterable = this.parseExpressionNoStruct();
  const body = this.parseBlock(null, current(this.state).span.start);

  return {
    type: 'For',
    label,
    pattern,
    iterable,
    body,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseWhile = function (
  this: Parser,
  label: string | null,
  start: SourceLocation
): WhileNode | WhileLetNode {
  advance(this.state); // consume while

  if (match(this.state, TOKEN_TYPES.LET)) {
    const pattern = this.parsePattern();
    expect(this.state, TOKEN_TYPES.ASSIGN, "Expected '='");
    const value = this.parseExpressionNoStruct();
    const body = this.parseBlock(null, current(this.state).span.start);
    return {
      type: 'WhileLet',
      label,
      pattern,
      value,
      body,
      span: spanFrom(this.state, start),
    };
  }

  const condition = this.parseExpressionNoStruct();
  const body = this.parseBlock(null, current(this.state).span.start);
  return {
    type: 'While',
    label,
    condition,
    body,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseLoop = function (
  this: Parser,
  label: string | null,
  start: SourceLocation
): LoopNode {
  advance(this.state); // consume loop
  const body = this.parseBlock(null, current(this.state).span.start);
  return { type: 'Loop', label, body, span: spanFrom(this.state, start) };
};

/** `'name: loop {}`, `'name: for ...`, `'name: while ...`, `'name: {}` */
Parser.prototype.parseLabeled = function (this: Parser): ExpressionNode {
  const label = advance(this.state);
  const start = label.span.start;
  expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after label");

  switch (current(this.state).type) {
    case TOKEN_TYPES.LOOP:
      return this.parseLoop(label.value, start);
    case TOKEN_TYPES.FOR:
      return this.parseFor(label.value, start);
    case TOKEN_TYPES.WHILE:
      return this.parseWhile(label.value, start);
    case TOKEN_TYPES.LBRACE:
      return this.parseBlock(label.value, start);
    default:
      throw expectedError(this.state, 'Expected loop or block after label');
  }
};

// ============================================================
// JUMPS
// ============================================================

/**
 * Value after `break` or `return`: only when an expression starts on the
 * same line, so a bare `return` before the next statement stays bare.
 */
Parser.prototype.parseJumpValue = function (
  this: Parser,
  keywordLine: number
): ExpressionNode | null {
  const next = current(this.state);
  if (next.span.start.line !== keywordLine) return null;
  if (!canStartExpression(next.type)) return null;
  if (next.type === TOKEN_TYPES.LBRACE && this.state.restrictions.noStructLiteral) {
    return null;
  }
  return this.parseExpression();
};

Parser.prototype.parseBreak = function (this: Parser): BreakNode {
  const keyword = advance(this.state);
  const label = match(this.state, TOKEN_TYPES.LABEL);
  const value = this.parseJumpValue(this.state.previousEnd.line);

  return {
    type: 'Break',
    label: label ? label.value : null,
    value,
    span: spanFrom(this.state, keyword.span.start),
  };
};

Parser.prototype.parseContinue = function (this: Parser): ContinueNode {
  const keyword = advance(this.state);
  const label = match(this.state, TOKEN_TYPES.LABEL);

  return {
    type: 'Continue',
    label: label ? label.value : null,
    span: spanFrom(this.state, keyword.span.start),
  };
};

Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const keyword = advance(this.state);
  const value = this.parseJumpValue(keyword.span.end.line);

  return {
    type: 'Return',
    value,
    span: spanFrom(this.state, keyword.span.start),
  };
};
