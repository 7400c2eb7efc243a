/**
 * Parser Extension: Expression Parsing
 * Precedence climbing, unary operators and primary dispatch
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  RangeNode,
  UnaryExprNode,
  UnaryOp,
} from '../ast-nodes.js';
import { ParseError, createError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type Token, type TokenType } from '../token-types.js';
import {
  advance,
  check,
  current,
  describeToken,
  generateHint,
  makeSpan,
  match,
  nested,
  spanFrom,
  withRestrictions,
} from './state.js';
import { BP, infixInfo } from './precedence.js';
import {
  assertNever,
  canStartExpression,
  classifyLeadingToken,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseExpressionNoStruct(): ExpressionNode;
    parseBinary(minBp: number): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePrimary(): ExpressionNode;
    parsePrefixRange(): RangeNode;
    canStartRangeEnd(): boolean;
    expectOperand(operator: Token): void;
  }
}

const PREFIX_OPERATORS: Readonly<Partial<Record<TokenType, UnaryOp>>> =
  Object.freeze({
    [TOKEN_TYPES.MINUS]: '-',
    [TOKEN_TYPES.BANG]: '!',
    [TOKEN_TYPES.TILDE]: '~',
    [TOKEN_TYPES.STAR]: '*',
    [TOKEN_TYPES.SPAWN]: 'spawn',
    [TOKEN_TYPES.AWAIT]: 'await',
  });

// ============================================================
// ENTRY POINTS
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseBinary(BP.ASSIGN);
};

/** Condition position: `Name {` opens the body, not a struct literal */
Parser.prototype.parseExpressionNoStruct = function (
  this: Parser
): ExpressionNode {
  return withRestrictions(this.state, { noStructLiteral: true }, () =>
    this.parseExpression()
  );
};

// ============================================================
// PRECEDENCE CLIMBING
// ============================================================

/**
 * Parse operators whose left binding power is at least `minBp`.
 * Left-associative operators parse their right side one level higher.
 */
Parser.prototype.parseBinary = function (
  this: Parser,
  minBp: number
): ExpressionNode {
  const start = current(this.state).span.start;
  let left = this.parseUnary();

  for (;;) {
    const token = current(this.state);
    const info = infixInfo(token.type);
    if (!info || info.lbp < minBp) break;
    advance(this.state);

    const { operator } = info;
    switch (operator.kind) {
      case 'cast':
        left = {
          type: 'Cast',
          expression: left,
          targetType: this.parseType(),
          span: spanFrom(this.state, start),
        };
        break;

      case 'range': {
        const end = this.canStartRangeEnd() ? this.parseBinary(info.rbp) : null;
        left = {
          type: 'Range',
          start: left,
          end,
          inclusive: operator.inclusive,
          span: spanFrom(this.state, start),
        };
        break;
      }

      case 'assign': {
        this.expectOperand(token);
        const value = this.parseBinary(info.rbp);
        left = {
          type: 'Assign',
          op: operator.op,
          target: left,
          value,
          span: spanFrom(this.state, start),
        };
        break;
      }

      case 'binary': {
        this.expectOperand(token);
        const right = this.parseBinary(info.rbp);
        left = {
          type: 'BinaryExpr',
          op: operator.op,
          left,
          right,
          span: spanFrom(this.state, start),
        };
        break;
      }

      default:
        return assertNever(operator);
    }
  }

  return left;
};

/** TERN-P003 when an operator has nothing to its right */
Parser.prototype.expectOperand = function (this: Parser, operator: Token): void {
  if (canStartExpression(current(this.state).type)) return;
  throw createError('TERN-P003', { operator: operator.value }, operator.span);
};

Parser.prototype.canStartRangeEnd = function (this: Parser): boolean {
  const { type } = current(this.state);
  if (type === TOKEN_TYPES.LBRACE && this.state.restrictions.noStructLiteral) {
    return false;
  }
  return canStartExpression(type);
};

// ============================================================
// UNARY
// ============================================================

function makeUnary(
  op: UnaryOp,
  operand: ExpressionNode,
  start: SourceLocation,
  end: SourceLocation
): UnaryExprNode {
  return {
    type: 'UnaryExpr',
    op,
    operand,
    postfix: false,
    span: makeSpan(start, end),
  };
}

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  return nested<ExpressionNode>(this.state, () => {
    const token = current(this.state);
    const start = token.span.start;

    const simple = PREFIX_OPERATORS[token.type];
    if (simple !== undefined) {
      advance(this.state);
      this.expectOperand(token);
      const operand = this.parseUnary();
      return makeUnary(simple, operand, start, this.state.previousEnd);
    }

    if (token.type === TOKEN_TYPES.AMPERSAND) {
      advance(this.state);
      const op: UnaryOp = match(this.state, TOKEN_TYPES.MUT) ? '&mut' : '&';
      this.expectOperand(token);
      const operand = this.parseUnary();
      return makeUnary(op, operand, start, this.state.previousEnd);
    }

    // `&&x` lexes as one token: a reference to a reference
    if (token.type === TOKEN_TYPES.AND) {
      advance(this.state);
      const innerStart: SourceLocation = {
        line: start.line,
        column: start.column + 1,
        offset: start.offset + 1,
      };
      const op: UnaryOp = match(this.state, TOKEN_TYPES.MUT) ? '&mut' : '&';
      this.expectOperand(token);
      const operand = this.parseUnary();
      const end = this.state.previousEnd;
      return makeUnary('&', makeUnary(op, operand, innerStart, end), start, end);
    }

    const primary = this.parsePrimary();
    return this.parsePostfix(primary, start, true);
  });
};

// ============================================================
// PRIMARY
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const kind = classifyLeadingToken(token.type);

  switch (kind) {
    case 'literal':
      return this.parseLiteral();
    case 'interpolation':
      return this.parseInterpolation();
    case 'name':
      return this.parseNameExpression();
    case 'paren':
      return this.parseParenthesized();
    case 'bracket':
      return this.parseListLiteral();
    case 'brace':
      return this.parseBlock(null, token.span.start);
    case 'if':
      return this.parseIf();
    case 'match':
      return this.parseMatch();
    case 'for':
      return this.parseFor(null, token.span.start);
    case 'while':
      return this.parseWhile(null, token.span.start);
    case 'loop':
      return this.parseLoop(null, token.span.start);
    case 'label':
      return this.parseLabeled();
    case 'function':
      return this.parseFunctionExpression(token.span.start, false);
    case 'closure':
      return this.parseClosure(token.span.start, false);
    case 'async':
      return this.parseAsync();
    case 'try':
      return this.parseTry();
    case 'throw':
      return this.parseThrow();
    case 'return':
      return this.parseReturn();
    case 'break':
      return this.parseBreak();
    case 'continue':
      return this.parseContinue();
    case 'range':
      return this.parsePrefixRange();
    case 'spread':
      return this.parseSpread();
    case 'unary':
      return this.parseUnary();
    case 'error':
      // Already reported by the lexer
      advance(this.state);
      return {
        type: 'Error',
        message: token.value,
        text: this.state.source.slice(token.span.start.offset, token.span.end.offset),
        span: token.span,
      };
    case 'none': {
      const found = describeToken(token);
      const hint = generateHint(undefined, token);
      if (check(this.state, TOKEN_TYPES.EOF)) {
        throw new ParseError(
          'TERN-P007',
          `Expected expression, found ${found}`,
          token.span,
          { expected: 'Expected expression', found }
        );
      }
      const error = createError('TERN-P001', { found }, token.span);
      if (!hint) throw error;
      throw new ParseError(
        'TERN-P001',
        `${error.text}. ${hint}`,
        token.span,
        { found }
      );
    }
    default:
      return assertNever(kind);
  }
};

/** `..end`, `..=end` or a bare `..` */
Parser.prototype.parsePrefixRange = function (this: Parser): RangeNode {
  const start = current(this.state).span.start;
  const operator = advance(this.state);
  const inclusive = operator.type === TOKEN_TYPES.DOT_DOT_EQ;

  const end = this.canStartRangeEnd() ? this.parseBinary(BP.RANGE + 1) : null;
  if (inclusive && end === null) {
    throw createError('TERN-P003', { operator: operator.value }, operator.span);
  }

  return {
    type: 'Range',
    start: null,
    end,
    inclusive,
    span: spanFrom(this.state, start),
  };
};
