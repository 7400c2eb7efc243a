/**
 * Parser Extension: Classes
 * Fields, constructors, methods, constants, properties and operator
 * overloads
 */

import { Parser } from './parser.js';
import type {
  AttributeNode,
  ClassMemberNode,
  ClassNode,
  ConstantNode,
  ConstructorNode,
  ExpressionNode,
  MemberModifiers,
  OperatorOverloadNode,
  PropertyAccessorNode,
  PropertyNode,
  TypeNode,
  Visibility,
} from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import {
  advance,
  check,
  checkAt,
  current,
  expect,
  expectClose,
  expectedError,
  match,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseClass(
      start: SourceLocation,
      decorators: AttributeNode[],
      visibility: Visibility
    ): ClassNode;
    parseClassMember(): ClassMemberNode;
    parseConstant(start: SourceLocation, visibility: Visibility): ConstantNode;
    parseConstructor(
      start: SourceLocation,
      decorators: AttributeNode[],
      visibility: Visibility
    ): ConstructorNode;
    parseProperty(start: SourceLocation, visibility: Visibility): PropertyNode;
    parsePropertyAccessor(): PropertyAccessorNode;
    parseOperatorOverload(start: SourceLocation): OperatorOverloadNode;
  }
}

const CLASS_MEMBER_STARTS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.PUB,
  TOKEN_TYPES.PRIVATE,
  TOKEN_TYPES.PROTECTED,
  TOKEN_TYPES.STATIC,
  TOKEN_TYPES.OVERRIDE,
  TOKEN_TYPES.FINAL,
  TOKEN_TYPES.ABSTRACT,
  TOKEN_TYPES.ASYNC,
  TOKEN_TYPES.FN,
  TOKEN_TYPES.FUN,
  TOKEN_TYPES.CONST,
  TOKEN_TYPES.HASH,
  TOKEN_TYPES.AT,
]);

/** Tokens accepted after `operator` */
const OVERLOADABLE: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.PLUS,
  TOKEN_TYPES.MINUS,
  TOKEN_TYPES.STAR,
  TOKEN_TYPES.SLASH,
  TOKEN_TYPES.PERCENT,
  TOKEN_TYPES.POWER,
  TOKEN_TYPES.EQ,
  TOKEN_TYPES.NE,
  TOKEN_TYPES.LT,
  TOKEN_TYPES.GT,
  TOKEN_TYPES.LE,
  TOKEN_TYPES.GE,
  TOKEN_TYPES.BANG,
  TOKEN_TYPES.TILDE,
  TOKEN_TYPES.AMPERSAND,
  TOKEN_TYPES.PIPE,
  TOKEN_TYPES.CARET,
  TOKEN_TYPES.SHL,
  TOKEN_TYPES.SHR,
]);

/**
 * `class Name<T> : Base + Trait { members }`
 */
Parser.prototype.parseClass = function (
  this: Parser,
  start: SourceLocation,
  decorators: AttributeNode[],
  visibility: Visibility
): ClassNode {
  advance(this.state); // consume class
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected class name');
  const generics = check(this.state, TOKEN_TYPES.LT)
    ? this.parseGenericParams()
    : [];

  let superclass: TypeNode | null = null;
  const traits: TypeNode[] = [];
  if (match(this.state, TOKEN_TYPES.COLON)) {
    superclass = this.parseType();
    while (match(this.state, TOKEN_TYPES.PLUS)) {
      traits.push(this.parseType());
    }
  }

  const open = expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' after class header");
  const members = this.parseDelimitedList(
    TOKEN_TYPES.RBRACE,
    CLASS_MEMBER_STARTS,
    () => this.parseClassMember(),
    false
  );
  expectClose(this.state, TOKEN_TYPES.RBRACE, open);

  return {
    type: 'Class',
    name: name.value,
    visibility,
    decorators,
    generics,
    superclass,
    traits,
    members,
    span: spanFrom(this.state, start),
  };
};

/** Decorators and modifiers in any order, then the member itself */
Parser.prototype.parseClassMember = function (this: Parser): ClassMemberNode {
  const start = current(this.state).span.start;
  const decorators = this.parseAttributes();

  let visibility: Visibility = null;
  let isStatic = false;
  let isOverride = false;
  let isFinal = false;
  let isAbstract = false;
  let isAsync = false;
  let mutable = false;

  for (;;) {
    const { type } = current(this.state);
    if (
      visibility === null &&
      (type === TOKEN_TYPES.PUB ||
        type === TOKEN_TYPES.PRIVATE ||
        type === TOKEN_TYPES.PROTECTED)
    ) {
      visibility = this.parseVisibility();
    } else if (match(this.state, TOKEN_TYPES.STATIC)) {
      isStatic = true;
    } else if (match(this.state, TOKEN_TYPES.OVERRIDE)) {
      isOverride = true;
    } else if (match(this.state, TOKEN_TYPES.FINAL)) {
      isFinal = true;
    } else if (match(this.state, TOKEN_TYPES.ABSTRACT)) {
      isAbstract = true;
    } else if (match(this.state, TOKEN_TYPES.ASYNC)) {
      isAsync = true;
    } else if (match(this.state, TOKEN_TYPES.MUT)) {
      mutable = true;
    } else {
      break;
    }
  }

  const token = current(this.state);

  if (token.type === TOKEN_TYPES.FN || token.type === TOKEN_TYPES.FUN) {
    const fn = this.parseFunction({
      start: token.span.start,
      attributes: [],
      visibility,
      isAsync,
      requireBody: false,
    });
    const modifiers: MemberModifiers = { isStatic, isOverride, isFinal, isAbstract };
    return {
      type: 'Method',
      decorators,
      modifiers,
      function: fn,
      span: spanFrom(this.state, start),
    };
  }

  if (token.type === TOKEN_TYPES.CONST) {
    return this.parseConstant(start, visibility);
  }

  if (token.type !== TOKEN_TYPES.IDENTIFIER) {
    throw expectedError(this.state, 'Expected class member');
  }

  // Contextual words: `new`, `property`, `operator`
  if (
    token.value === 'new' &&
    (checkAt(this.state, 1, TOKEN_TYPES.LPAREN) ||
      (checkAt(this.state, 1, TOKEN_TYPES.IDENTIFIER) &&
        checkAt(this.state, 2, TOKEN_TYPES.LPAREN)))
  ) {
    return this.parseConstructor(start, decorators, visibility);
  }
  if (token.value === 'property' && checkAt(this.state, 1, TOKEN_TYPES.IDENTIFIER)) {
    return this.parseProperty(start, visibility);
  }
  if (
    token.value === 'operator' &&
    !checkAt(this.state, 1, TOKEN_TYPES.COLON, TOKEN_TYPES.ASSIGN)
  ) {
    return this.parseOperatorOverload(start);
  }

  // Field: `name: Type = default`
  advance(this.state);
  const fieldType = match(this.state, TOKEN_TYPES.COLON) ? this.parseType() : null;
  let defaultValue: ExpressionNode | null = null;
  if (match(this.state, TOKEN_TYPES.ASSIGN)) {
    defaultValue = this.parseExpression();
  } else if (fieldType === null) {
    throw expectedError(this.state, "Expected ':' or '=' after field name");
  }

  return {
    type: 'ClassField',
    name: token.value,
    visibility,
    mutable,
    isStatic,
    decorators,
    fieldType,
    defaultValue,
    span: spanFrom(this.state, start),
  };
};

/** `const NAME: Type = value` (the value may be omitted in traits) */
Parser.prototype.parseConstant = function (
  this: Parser,
  start: SourceLocation,
  visibility: Visibility
): ConstantNode {
  advance(this.state); // consume const
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected constant name');
  const constType = match(this.state, TOKEN_TYPES.COLON) ? this.parseType() : null;
  const value = match(this.state, TOKEN_TYPES.ASSIGN)
    ? this.parseExpression()
    : null;
  match(this.state, TOKEN_TYPES.SEMICOLON);

  return {
    type: 'Constant',
    name: name.value,
    visibility,
    constType,
    value,
    span: spanFrom(this.state, start),
  };
};

/** `new(params) { }` or `new name(params) { }` */
Parser.prototype.parseConstructor = function (
  this: Parser,
  start: SourceLocation,
  decorators: AttributeNode[],
  visibility: Visibility
): ConstructorNode {
  advance(this.state); // consume new
  const name = match(this.state, TOKEN_TYPES.IDENTIFIER);
  const open = expect(this.state, TOKEN_TYPES.LPAREN, "Expected '('");
  const { params } = this.parseParamList(open);
  const body = this.parseBlock(null, current(this.state).span.start);

  return {
    type: 'Constructor',
    name: name ? name.value : null,
    visibility,
    decorators,
    params,
    body,
    span: spanFrom(this.state, start),
  };
};

/** `property name: Type { get => expr, set(v) { ... } }` */
Parser.prototype.parseProperty = function (
  this: Parser,
  start: SourceLocation,
  visibility: Visibility
): PropertyNode {
  advance(this.state); // consume property
  const name = advance(this.state);
  expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after property name");
  const propertyType = this.parseType();

  const open = expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' after property type");
  const accessors = this.parseDelimitedList(
    TOKEN_TYPES.RBRACE,
    new Set<TokenType>(),
    () => this.parsePropertyAccessor(),
    false
  );
  expectClose(this.state, TOKEN_TYPES.RBRACE, open);

  return {
    type: 'Property',
    name: name.value,
    visibility,
    propertyType,
    accessors,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parsePropertyAccessor = function (
  this: Parser
): PropertyAccessorNode {
  const start = current(this.state).span.start;
  const keyword = current(this.state);
  if (
    keyword.type !== TOKEN_TYPES.IDENTIFIER ||
    (keyword.value !== 'get' && keyword.value !== 'set')
  ) {
    throw expectedError(this.state, "Expected 'get' or 'set'");
  }
  advance(this.state);
  const kind = keyword.value;

  let param: string | null = null;
  if (kind === 'set' && check(this.state, TOKEN_TYPES.LPAREN)) {
    const open = advance(this.state);
    param = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected parameter name').value;
    expectClose(this.state, TOKEN_TYPES.RPAREN, open);
  }

  const body = match(this.state, TOKEN_TYPES.FAT_ARROW)
    ? this.parseExpression()
    : this.parseBlock(null, current(this.state).span.start);

  return {
    type: 'PropertyAccessor',
    kind,
    param,
    body,
    span: spanFrom(this.state, start),
  };
};

/** `operator+(self, other: T) -> T { }`, `operator[](self, i) { }` */
Parser.prototype.parseOperatorOverload = function (
  this: Parser,
  start: SourceLocation
): OperatorOverloadNode {
  advance(this.state); // consume operator

  let operator: string;
  const token = current(this.state);
  if (
    token.type === TOKEN_TYPES.LBRACKET &&
    checkAt(this.state, 1, TOKEN_TYPES.RBRACKET)
  ) {
    advance(this.state);
    advance(this.state);
    operator = '[]';
  } else if (OVERLOADABLE.has(token.type)) {
    advance(this.state);
    operator = token.value;
  } else {
    throw expectedError(this.state, "Expected operator after 'operator'");
  }

  const open = expect(this.state, TOKEN_TYPES.LPAREN, "Expected '('");
  const { selfParam, params } = this.parseParamList(open);
  const returnType = match(this.state, TOKEN_TYPES.ARROW) ? this.parseType() : null;
  const body = this.parseBlock(null, current(this.state).span.start);

  return {
    type: 'OperatorOverload',
    operator,
    selfParam,
    params,
    returnType,
    body,
    span: spanFrom(this.state, start),
  };
};
