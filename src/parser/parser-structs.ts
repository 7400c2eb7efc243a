/**
 * Parser Extension: Structs and Enums
 */

import { Parser } from './parser.js';
import type {
  AttributeNode,
  EnumNode,
  EnumVariantNode,
  StructFieldNode,
  StructNode,
  Visibility,
  WherePredicateNode,
} from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import {
  advance,
  check,
  current,
  expect,
  expectClose,
  match,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseStruct(
      start: SourceLocation,
      attributes: AttributeNode[],
      visibility: Visibility
    ): StructNode;
    parseNamedFields(): StructFieldNode[];
    parseTupleFields(): StructFieldNode[];
    parseNamedField(): StructFieldNode;
    parseTupleField(): StructFieldNode;
    parseEnum(
      start: SourceLocation,
      attributes: AttributeNode[],
      visibility: Visibility
    ): EnumNode;
    parseEnumVariant(): EnumVariantNode;
  }
}

/** Tokens a field may start with, besides its name */
const FIELD_STARTS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.PUB,
  TOKEN_TYPES.PRIVATE,
  TOKEN_TYPES.PROTECTED,
  TOKEN_TYPES.HASH,
  TOKEN_TYPES.AT,
]);

const VARIANT_STARTS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.HASH,
  TOKEN_TYPES.AT,
]);

// ============================================================
// STRUCTS
// ============================================================

/**
 * `struct Name<T> where ... { a: T, b: U = default }`,
 * `struct Name(T, U);` or `struct Name;`
 */
Parser.prototype.parseStruct = function (
  this: Parser,
  start: SourceLocation,
  attributes: AttributeNode[],
  visibility: Visibility
): StructNode {
  advance(this.state); // consume struct
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected struct name');
  const generics = check(this.state, TOKEN_TYPES.LT)
    ? this.parseGenericParams()
    : [];

  let whereClause: WherePredicateNode[] = [];
  let form: StructNode['form'] = 'unit';
  let fields: StructFieldNode[] = [];

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    form = 'tuple';
    fields = this.parseTupleFields();
    if (check(this.state, TOKEN_TYPES.WHERE)) whereClause = this.parseWhereClause();
    match(this.state, TOKEN_TYPES.SEMICOLON);
  } else {
    if (check(this.state, TOKEN_TYPES.WHERE)) whereClause = this.parseWhereClause();
    if (check(this.state, TOKEN_TYPES.LBRACE)) {
      form = 'named';
      fields = this.parseNamedFields();
    } else {
      match(this.state, TOKEN_TYPES.SEMICOLON);
    }
  }

  return {
    type: 'Struct',
    name: name.value,
    visibility,
    attributes,
    generics,
    whereClause,
    form,
    fields,
    span: spanFrom(this.state, start),
  };
};

/** `{ field, ... }` including the braces */
Parser.prototype.parseNamedFields = function (this: Parser): StructFieldNode[] {
  const open = advance(this.state); // consume {
  const fields = this.parseDelimitedList(
    TOKEN_TYPES.RBRACE,
    FIELD_STARTS,
    () => this.parseNamedField(),
    true
  );
  expectClose(this.state, TOKEN_TYPES.RBRACE, open);
  return fields;
};

/** `(Type, ...)` including the parentheses */
Parser.prototype.parseTupleFields = function (this: Parser): StructFieldNode[] {
  const open = advance(this.state); // consume (
  const fields = this.parseDelimitedList(
    TOKEN_TYPES.RPAREN,
    FIELD_STARTS,
    () => this.parseTupleField(),
    true
  );
  expectClose(this.state, TOKEN_TYPES.RPAREN, open);
  return fields;
};

/** `#[attr] pub mut name: Type = default` */
Parser.prototype.parseNamedField = function (this: Parser): StructFieldNode {
  const start = current(this.state).span.start;
  const attributes = this.parseAttributes();
  const visibility = this.parseVisibility();
  const mutable = match(this.state, TOKEN_TYPES.MUT) !== null;

  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected field name');
  expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after field name");
  const fieldType = this.parseType();
  const defaultValue = match(this.state, TOKEN_TYPES.ASSIGN)
    ? this.parseExpression()
    : null;

  return {
    type: 'StructField',
    name: name.value,
    visibility,
    mutable,
    attributes,
    fieldType,
    defaultValue,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseTupleField = function (this: Parser): StructFieldNode {
  const start = current(this.state).span.start;
  const attributes = this.parseAttributes();
  const visibility = this.parseVisibility();
  const fieldType = this.parseType();

  return {
    type: 'StructField',
    name: null,
    visibility,
    mutable: false,
    attributes,
    fieldType,
    defaultValue: null,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// ENUMS
// ============================================================

/** `enum Name<T> { A, B(T), C { x: T }, D = 4 }` */
Parser.prototype.parseEnum = function (
  this: Parser,
  start: SourceLocation,
  attributes: AttributeNode[],
  visibility: Visibility
): EnumNode {
  advance(this.state); // consume enum
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected enum name');
  const generics = check(this.state, TOKEN_TYPES.LT)
    ? this.parseGenericParams()
    : [];
  const whereClause = check(this.state, TOKEN_TYPES.WHERE)
    ? this.parseWhereClause()
    : [];

  const open = expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' after enum name");
  const variants = this.parseDelimitedList(
    TOKEN_TYPES.RBRACE,
    VARIANT_STARTS,
    () => this.parseEnumVariant(),
    true
  );
  expectClose(this.state, TOKEN_TYPES.RBRACE, open);

  return {
    type: 'Enum',
    name: name.value,
    visibility,
    attributes,
    generics,
    whereClause,
    variants,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseEnumVariant = function (this: Parser): EnumVariantNode {
  const start = current(this.state).span.start;
  const attributes = this.parseAttributes();
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected variant name');

  let form: EnumVariantNode['form'] = 'unit';
  let fields: StructFieldNode[] = [];
  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    form = 'tuple';
    fields = this.parseTupleFields();
  } else if (check(this.state, TOKEN_TYPES.LBRACE)) {
    form = 'struct';
    fields = this.parseNamedFields();
  }

  const discriminant = match(this.state, TOKEN_TYPES.ASSIGN)
    ? this.parseExpression()
    : null;

  return {
    type: 'EnumVariant',
    name: name.value,
    attributes,
    form,
    fields,
    discriminant,
    span: spanFrom(this.state, start),
  };
};
