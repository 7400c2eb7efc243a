/**
 * Parser Extension: Postfix Operators
 * Calls, method calls, field and tuple access, indexing, `?` and `.await`
 */

import { Parser } from './parser.js';
import type { ExpressionNode, TypeNode } from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type Token, type TokenType } from '../token-types.js';
import {
  advance,
  atListEnd,
  check,
  checkAt,
  current,
  expectClose,
  expectedError,
  spanFrom,
  unrestricted,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePostfix(
      expr: ExpressionNode,
      start: SourceLocation,
      allowCallIndex: boolean
    ): ExpressionNode;
    parseMemberAccess(
      object: ExpressionNode,
      start: SourceLocation,
      optional: boolean
    ): ExpressionNode;
    parseArguments(close: TokenType, open: Token): ExpressionNode[];
  }
}

/**
 * Apply postfix operators left to right. With `allowCallIndex` false only
 * `.`, `?.` and `?` continue the chain (block-like statement heads).
 */
Parser.prototype.parsePostfix = function (
  this: Parser,
  expr: ExpressionNode,
  start: SourceLocation,
  allowCallIndex: boolean
): ExpressionNode {
  let result = expr;

  for (;;) {
    const token = current(this.state);

    switch (token.type) {
      case TOKEN_TYPES.DOT:
        advance(this.state);
        result = this.parseMemberAccess(result, start, false);
        continue;

      case TOKEN_TYPES.SAFE_NAV:
        advance(this.state);
        result = this.parseMemberAccess(result, start, true);
        continue;

      case TOKEN_TYPES.QUESTION:
        advance(this.state);
        result = {
          type: 'TryOperator',
          expression: result,
          span: spanFrom(this.state, start),
        };
        continue;

      case TOKEN_TYPES.LPAREN: {
        if (!allowCallIndex) return result;
        const open = advance(this.state);
        const args = this.parseArguments(TOKEN_TYPES.RPAREN, open);
        result = {
          type: 'Call',
          callee: result,
          args,
          span: spanFrom(this.state, start),
        };
        continue;
      }

      case TOKEN_TYPES.LBRACKET: {
        if (!allowCallIndex) return result;
        const open = advance(this.state);
        const index = unrestricted(this.state, () => this.parseExpression());
        expectClose(this.state, TOKEN_TYPES.RBRACKET, open);
        result = {
          type: 'Index',
          object: result,
          index,
          span: spanFrom(this.state, start),
        };
        continue;
      }

      default:
        return result;
    }
  }
};

/** After `.` or `?.`: field, tuple index, method call or `.await` */
Parser.prototype.parseMemberAccess = function (
  this: Parser,
  object: ExpressionNode,
  start: SourceLocation,
  optional: boolean
): ExpressionNode {
  const token = current(this.state);

  if (token.type === TOKEN_TYPES.AWAIT && !optional) {
    advance(this.state);
    return {
      type: 'UnaryExpr',
      op: 'await',
      operand: object,
      postfix: true,
      span: spanFrom(this.state, start),
    };
  }

  if (token.type === TOKEN_TYPES.INTEGER) {
    advance(this.state);
    return {
      type: 'FieldAccess',
      object,
      field: token.value,
      optional,
      span: spanFrom(this.state, start),
    };
  }

  if (token.type !== TOKEN_TYPES.IDENTIFIER) {
    throw expectedError(
      this.state,
      optional
        ? "Expected field or method name after '?.'"
        : "Expected field or method name after '.'"
    );
  }
  advance(this.state);

  let typeArgs: TypeNode[] | null = null;
  if (
    check(this.state, TOKEN_TYPES.DOUBLE_COLON) &&
    checkAt(this.state, 1, TOKEN_TYPES.LT)
  ) {
    advance(this.state); // consume ::
    typeArgs = this.parseGenericArgs();
  }

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    const open = advance(this.state);
    const args = this.parseArguments(TOKEN_TYPES.RPAREN, open);
    return {
      type: 'MethodCall',
      receiver: object,
      method: token.value,
      typeArgs,
      args,
      optional,
      span: spanFrom(this.state, start),
    };
  }

  if (typeArgs !== null) {
    throw expectedError(this.state, "Expected '(' after method type arguments");
  }

  return {
    type: 'FieldAccess',
    object,
    field: token.value,
    optional,
    span: spanFrom(this.state, start),
  };
};

/**
 * Comma-separated expressions up to `close`. The opening delimiter has
 * been consumed; the close is consumed or synthesized here.
 */
Parser.prototype.parseArguments = function (
  this: Parser,
  close: TokenType,
  open: Token
): ExpressionNode[] {
  return unrestricted(this.state, () => {
    const args: ExpressionNode[] = [];
    while (!atListEnd(this.state, close)) {
      args.push(this.parseExpression());
      if (!check(this.state, TOKEN_TYPES.COMMA)) break;
      advance(this.state);
    }
    expectClose(this.state, close, open);
    return args;
  });
};
