/**
 * Parser Extension: Function Parsing
 * Function declarations and expressions, parameters, closures, arrow
 * lambdas and async forms
 */

import { Parser } from './parser.js';
import type {
  AsyncBlockNode,
  AttributeNode,
  ExpressionNode,
  FunctionNode,
  LambdaNode,
  ParamNode,
  SelfParamKind,
  Visibility,
} from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type Token, type TokenType } from '../token-types.js';
import {
  advance,
  atListEnd,
  check,
  checkAt,
  current,
  expect,
  expectClose,
  expectedError,
  match,
  spanFrom,
} from './state.js';

/** A body or return type: the parameter list was never closed */
const PARAM_LIST_EXITS: readonly TokenType[] = [TOKEN_TYPES.LBRACE, TOKEN_TYPES.ARROW];

export interface FunctionOptions {
  readonly start: SourceLocation;
  readonly attributes: AttributeNode[];
  readonly visibility: Visibility;
  readonly isAsync: boolean;
  /** Signatures in traits and abstract methods may omit the body */
  readonly requireBody: boolean;
}

export interface ParamList {
  readonly selfParam: SelfParamKind | null;
  readonly params: ParamNode[];
}

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunction(options: FunctionOptions): FunctionNode;
    parseFunctionExpression(start: SourceLocation, isAsync: boolean): FunctionNode;
    parseParamList(open: Token): ParamList;
    parseSelfParam(): SelfParamKind | null;
    parseParam(allowDefault: boolean): ParamNode;
    parseClosure(start: SourceLocation, isAsync: boolean): LambdaNode;
    parseArrowLambda(start: SourceLocation, isAsync: boolean): LambdaNode;
    parseAsync(): AsyncBlockNode | FunctionNode | LambdaNode;
  }
}

// ============================================================
// FUNCTIONS
// ============================================================

/**
 * `fn name<T>(params) -> Ret where ... { body }`
 * The body may also be `= expr` or `=> expr`.
 */
Parser.prototype.parseFunction = function (
  this: Parser,
  options: FunctionOptions
): FunctionNode {
  const keyword = advance(this.state);
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected function name');
  const generics = check(this.state, TOKEN_TYPES.LT)
    ? this.parseGenericParams()
    : [];

  const open = expect(this.state, TOKEN_TYPES.LPAREN, "Expected '(' after function name");
  const { selfParam, params } = this.parseParamList(open);
  const returnType = match(this.state, TOKEN_TYPES.ARROW) ? this.parseType() : null;
  const whereClause = check(this.state, TOKEN_TYPES.WHERE)
    ? this.parseWhereClause()
    : [];

  let body: ExpressionNode | null;
  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    body = this.parseBlock(null, current(this.state).span.start);
  } else if (
    match(this.state, TOKEN_TYPES.ASSIGN) ||
    match(this.state, TOKEN_TYPES.FAT_ARROW)
  ) {
    body = this.parseExpression();
  } else if (!options.requireBody) {
    match(this.state, TOKEN_TYPES.SEMICOLON);
    body = null;
  } else {
    throw expectedError(this.state, 'Expected function body');
  }

  return {
    type: 'Function',
    name: name.value,
    keyword: keyword.type === TOKEN_TYPES.FUN ? 'fun' : 'fn',
    visibility: options.visibility,
    isAsync: options.isAsync,
    attributes: options.attributes,
    generics,
    selfParam,
    params,
    returnType,
    whereClause,
    body,
    span: spanFrom(this.state, options.start),
  };
};

/** `fn(x) body`, `fn name(x) { ... }` in expression position */
Parser.prototype.parseFunctionExpression = function (
  this: Parser,
  start: SourceLocation,
  isAsync: boolean
): FunctionNode {
  const keyword = advance(this.state);
  const name = match(this.state, TOKEN_TYPES.IDENTIFIER);

  const open = expect(this.state, TOKEN_TYPES.LPAREN, "Expected '('");
  const { selfParam, params } = this.parseParamList(open);
  const returnType = match(this.state, TOKEN_TYPES.ARROW) ? this.parseType() : null;

  let body: ExpressionNode;
  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    body = this.parseBlock(null, current(this.state).span.start);
  } else {
    match(this.state, TOKEN_TYPES.FAT_ARROW);
    body = this.parseExpression();
  }

  return {
    type: 'Function',
    name: name ? name.value : null,
    keyword: keyword.type === TOKEN_TYPES.FUN ? 'fun' : 'fn',
    visibility: null,
    isAsync,
    attributes: [],
    generics: [],
    selfParam,
    params,
    returnType,
    whereClause: [],
    body,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// PARAMETERS
// ============================================================

/** Parameters after `(`, up to and including `)` */
Parser.prototype.parseParamList = function (
  this: Parser,
  open: Token
): ParamList {
  const selfParam = this.parseSelfParam();
  const params: ParamNode[] = [];

  if (selfParam === null || match(this.state, TOKEN_TYPES.COMMA)) {
    while (
      !atListEnd(this.state, TOKEN_TYPES.RPAREN) &&
      !check(this.state, ...PARAM_LIST_EXITS)
    ) {
      params.push(this.parseParam(true));
      if (!match(this.state, TOKEN_TYPES.COMMA)) break;
    }
  }

  expectClose(this.state, TOKEN_TYPES.RPAREN, open, PARAM_LIST_EXITS);
  return { selfParam, params };
};

/** `self`, `mut self`, `&self`, `&mut self` */
Parser.prototype.parseSelfParam = function (this: Parser): SelfParamKind | null {
  if (check(this.state, TOKEN_TYPES.SELF)) {
    advance(this.state);
    return 'value';
  }
  if (check(this.state, TOKEN_TYPES.MUT) && checkAt(this.state, 1, TOKEN_TYPES.SELF)) {
    advance(this.state);
    advance(this.state);
    return 'mutValue';
  }
  if (check(this.state, TOKEN_TYPES.AMPERSAND)) {
    if (checkAt(this.state, 1, TOKEN_TYPES.SELF)) {
      advance(this.state);
      advance(this.state);
      return 'ref';
    }
    if (
      checkAt(this.state, 1, TOKEN_TYPES.MUT) &&
      checkAt(this.state, 2, TOKEN_TYPES.SELF)
    ) {
      advance(this.state);
      advance(this.state);
      advance(this.state);
      return 'mutRef';
    }
  }
  return null;
};

/** `pattern: Type = default` */
Parser.prototype.parseParam = function (
  this: Parser,
  allowDefault: boolean
): ParamNode {
  const start = current(this.state).span.start;
  const pattern = this.parsePatternNoOr();
  const typeAnnotation = match(this.state, TOKEN_TYPES.COLON)
    ? this.parseType()
    : null;
  const defaultValue =
    allowDefault && match(this.state, TOKEN_TYPES.ASSIGN)
      ? this.parseExpression()
      : null;

  return {
    type: 'Param',
    pattern,
    typeAnnotation,
    defaultValue,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// CLOSURES
// ============================================================

/** `|a, b: T| body` or `|| body` */
Parser.prototype.parseClosure = function (
  this: Parser,
  start: SourceLocation,
  isAsync: boolean
): LambdaNode {
  const params: ParamNode[] = [];

  // `||` lexes as one token: no parameters
  if (!match(this.state, TOKEN_TYPES.OR)) {
    expect(this.state, TOKEN_TYPES.PIPE, "Expected '|'");
    while (!check(this.state, TOKEN_TYPES.PIPE, TOKEN_TYPES.EOF)) {
      params.push(this.parseParam(false));
      if (!match(this.state, TOKEN_TYPES.COMMA)) break;
    }
    expect(this.state, TOKEN_TYPES.PIPE, "Expected '|' after closure parameters");
  }

  const body = this.parseExpression();
  return {
    type: 'Lambda',
    params,
    body,
    isAsync,
    form: 'pipe',
    span: spanFrom(this.state, start),
  };
};

/** `x => body` */
Parser.prototype.parseArrowLambda = function (
  this: Parser,
  start: SourceLocation,
  isAsync: boolean
): LambdaNode {
  const name = advance(this.state);
  advance(this.state); // consume =>

  const param: ParamNode = {
    type: 'Param',
    pattern: {
      type: 'IdentifierPattern',
      name: name.value,
      mutable: false,
      byRef: false,
      subpattern: null,
      span: name.span,
    },
    typeAnnotation: null,
    defaultValue: null,
    span: name.span,
  };

  const body = this.parseExpression();
  return {
    type: 'Lambda',
    params: [param],
    body,
    isAsync,
    form: 'arrow',
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// ASYNC
// ============================================================

/** `async { }`, `async fn(...)`, `async |x| ...`, `async (x) => ...`, `async x => ...` */
Parser.prototype.parseAsync = function (
  this: Parser
): AsyncBlockNode | FunctionNode | LambdaNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume async

  const next = current(this.state);
  switch (next.type) {
    case TOKEN_TYPES.LBRACE: {
      const body = this.parseBlock(null, next.span.start);
      return { type: 'AsyncBlock', body, span: spanFrom(this.state, start) };
    }
    case TOKEN_TYPES.FN:
    case TOKEN_TYPES.FUN:
      return this.parseFunctionExpression(start, true);
    case TOKEN_TYPES.PIPE:
    case TOKEN_TYPES.OR:
      return this.parseClosure(start, true);
    case TOKEN_TYPES.LPAREN: {
      const lambda = this.tryArrowLambda(true);
      if (lambda) return { ...lambda, span: spanFrom(this.state, start) };
      break;
    }
    case TOKEN_TYPES.IDENTIFIER:
      if (checkAt(this.state, 1, TOKEN_TYPES.FAT_ARROW)) {
        return this.parseArrowLambda(start, true);
      }
      break;
    default:
      break;
  }

  throw expectedError(
    this.state,
    "Expected block, function or closure after 'async'"
  );
};
