/**
 * Parser Extension: Collections
 * Parenthesized forms, tuples, lists, repeats, comprehensions and spread
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  LambdaNode,
  ParamNode,
  SpreadNode,
} from '../ast-nodes.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  atListEnd,
  check,
  checkAt,
  current,
  expect,
  expectClose,
  match,
  spanFrom,
  unrestricted,
  withTrial,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseParenthesized(): ExpressionNode;
    tryArrowLambda(isAsync: boolean): LambdaNode | null;
    parseListLiteral(): ExpressionNode;
    parseSpread(): SpreadNode;
  }
}

/**
 * `()`, `(expr)`, `(a, b)`, `(a,)` or an arrow lambda `(a, b) => body`.
 */
Parser.prototype.parseParenthesized = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;

  const lambda = this.tryArrowLambda(false);
  if (lambda) return lambda;

  const open = advance(this.state); // consume (
  if (match(this.state, TOKEN_TYPES.RPAREN)) {
    return { type: 'UnitLiteral', span: spanFrom(this.state, start) };
  }

  return unrestricted(this.state, () => {
    const first = this.parseExpression();

    if (!check(this.state, TOKEN_TYPES.COMMA)) {
      expectClose(this.state, TOKEN_TYPES.RPAREN, open);
      return {
        type: 'GroupedExpr',
        expression: first,
        span: spanFrom(this.state, start),
      };
    }

    const elements: ExpressionNode[] = [first];
    while (match(this.state, TOKEN_TYPES.COMMA)) {
      if (atListEnd(this.state, TOKEN_TYPES.RPAREN)) break;
      elements.push(this.parseExpression());
    }
    expectClose(this.state, TOKEN_TYPES.RPAREN, open);
    return { type: 'Tuple', elements, span: spanFrom(this.state, start) };
  });
};

/**
 * Read `(params) =>` speculatively. Restores the cursor and returns null
 * when the parenthesized text is not a parameter list followed by `=>`.
 */
Parser.prototype.tryArrowLambda = function (
  this: Parser,
  isAsync: boolean
): LambdaNode | null {
  if (this.state.restrictions.noArrowLambda) return null;
  const start = current(this.state).span.start;

  // `() =>` needs no trial
  if (
    checkAt(this.state, 1, TOKEN_TYPES.RPAREN) &&
    !checkAt(this.state, 2, TOKEN_TYPES.FAT_ARROW)
  ) {
    return null;
  }

  const result = withTrial(this.state, 'arrow-lambda', () => {
    const open = advance(this.state); // consume (
    const params: ParamNode[] = [];
    while (!check(this.state, TOKEN_TYPES.RPAREN)) {
      params.push(this.parseParam(true));
      if (!match(this.state, TOKEN_TYPES.COMMA)) break;
    }
    expectClose(this.state, TOKEN_TYPES.RPAREN, open);
    return check(this.state, TOKEN_TYPES.FAT_ARROW) ? params : null;
  });
  if (!result.ok) return null;

  advance(this.state); // consume =>
  const body = this.parseExpression();
  return {
    type: 'Lambda',
    params: result.value,
    body,
    isAsync,
    form: 'arrow',
    span: spanFrom(this.state, start),
  };
};

/** `[a, b]`, `[value; count]` or `[expr for pattern in iterable if cond]` */
Parser.prototype.parseListLiteral = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  const open = advance(this.state); // consume [

  return unrestricted(this.state, () => {
    if (match(this.state, TOKEN_TYPES.RBRACKET)) {
      return { type: 'List', elements: [], span: spanFrom(this.state, start) };
    }

    const first = this.parseExpression();

    if (match(this.state, TOKEN_TYPES.SEMICOLON)) {
      const count = this.parseExpression();
      expectClose(this.state, TOKEN_TYPES.RBRACKET, open);
      return {
        type: 'ArrayRepeat',
        value: first,
        count,
        span: spanFrom(this.state, start),
      };
    }

    if (match(this.state, TOKEN_TYPES.FOR)) {
      const pattern = this.parsePattern();
      expect(this.state, TOKEN_TYPES.IN, "Expected 'in'");
      const iterable = this.parseExpression();
      const condition = match(this.state, TOKEN_TYPES.IF)
        ? this.parseExpression()
        : null;
      expectClose(this.state, TOKEN_TYPES.RBRACKET, open);
      return {
        type: 'ListComprehension',
        element: first,
        pattern,
        iterable,
        condition,
        span: spanFrom(this.state, start),
      };
    }

    const elements: ExpressionNode[] = [first];
    while (match(this.state, TOKEN_TYPES.COMMA)) {
      if (atListEnd(this.state, TOKEN_TYPES.RBRACKET)) break;
      elements.push(this.parseExpression());
    }
    expectClose(this.state, TOKEN_TYPES.RBRACKET, open);
    return { type: 'List', elements, span: spanFrom(this.state, start) };
  });
};

/** `...expr` */
Parser.prototype.parseSpread = function (this: Parser): SpreadNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume ...
  const expression = this.parseUnary();
  return { type: 'Spread', expression, span: spanFrom(this.state, start) };
};
