/**
 * Parser Extension: Traits and Impls
 */

import { Parser } from './parser.js';
import type {
  AssociatedTypeNode,
  AttributeNode,
  ImplNode,
  TraitMemberNode,
  TraitNode,
  TypeNode,
  Visibility,
} from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import {
  advance,
  check,
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
    parseTrait(
      start: SourceLocation,
      attributes: AttributeNode[],
      visibility: Visibility
    ): TraitNode;
    parseImpl(start: SourceLocation, attributes: AttributeNode[]): ImplNode;
    parseTraitBody(): TraitMemberNode[];
    parseTraitMember(): TraitMemberNode;
    parseAssociatedType(start: SourceLocation): AssociatedTypeNode;
  }
}

const TRAIT_MEMBER_STARTS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.FN,
  TOKEN_TYPES.FUN,
  TOKEN_TYPES.TYPE,
  TOKEN_TYPES.CONST,
  TOKEN_TYPES.PUB,
  TOKEN_TYPES.ASYNC,
  TOKEN_TYPES.HASH,
  TOKEN_TYPES.AT,
]);

/** `trait Name<T>: Super + Other where ... { members }` (or `interface`) */
Parser.prototype.parseTrait = function (
  this: Parser,
  start: SourceLocation,
  attributes: AttributeNode[],
  visibility: Visibility
): TraitNode {
  const keyword = advance(this.state);
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected trait name');
  const generics = check(this.state, TOKEN_TYPES.LT)
    ? this.parseGenericParams()
    : [];
  const supertraits = match(this.state, TOKEN_TYPES.COLON)
    ? this.parseTypeBounds()
    : [];
  const whereClause = check(this.state, TOKEN_TYPES.WHERE)
    ? this.parseWhereClause()
    : [];
  const members = this.parseTraitBody();

  return {
    type: 'Trait',
    name: name.value,
    keyword: keyword.type === TOKEN_TYPES.INTERFACE ? 'interface' : 'trait',
    visibility,
    attributes,
    generics,
    supertraits,
    whereClause,
    members,
    span: spanFrom(this.state, start),
  };
};

/** `impl<T> Trait for Type where ... { members }` or `impl Type { members }` */
Parser.prototype.parseImpl = function (
  this: Parser,
  start: SourceLocation,
  attributes: AttributeNode[]
): ImplNode {
  advance(this.state); // consume impl
  const generics = check(this.state, TOKEN_TYPES.LT)
    ? this.parseGenericParams()
    : [];

  let trait: TypeNode | null = null;
  let target = this.parseType();
  if (match(this.state, TOKEN_TYPES.FOR)) {
    trait = target;
    target = this.parseType();
  }

  const whereClause = check(this.state, TOKEN_TYPES.WHERE)
    ? this.parseWhereClause()
    : [];
  const members = this.parseTraitBody();

  return {
    type: 'Impl',
    attributes,
    generics,
    trait,
    target,
    whereClause,
    members,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseTraitBody = function (this: Parser): TraitMemberNode[] {
  const open = expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{'");
  const members = this.parseDelimitedList(
    TOKEN_TYPES.RBRACE,
    TRAIT_MEMBER_STARTS,
    () => this.parseTraitMember(),
    false
  );
  expectClose(this.state, TOKEN_TYPES.RBRACE, open);
  return members;
};

Parser.prototype.parseTraitMember = function (this: Parser): TraitMemberNode {
  const start = current(this.state).span.start;
  const attributes = this.parseAttributes();
  const visibility = this.parseVisibility();
  const isAsync = match(this.state, TOKEN_TYPES.ASYNC) !== null;

  switch (current(this.state).type) {
    case TOKEN_TYPES.FN:
    case TOKEN_TYPES.FUN:
      return this.parseFunction({
        start,
        attributes,
        visibility,
        isAsync,
        requireBody: false,
      });
    case TOKEN_TYPES.TYPE:
      return this.parseAssociatedType(start);
    case TOKEN_TYPES.CONST:
      return this.parseConstant(start, visibility);
    default:
      throw expectedError(this.state, "Expected 'fn', 'type' or 'const'");
  }
};

/** `type Item: Bound = Default;` */
Parser.prototype.parseAssociatedType = function (
  this: Parser,
  start: SourceLocation
): AssociatedTypeNode {
  advance(this.state); // consume type
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected type name');
  const bounds = match(this.state, TOKEN_TYPES.COLON)
    ? this.parseTypeBounds()
    : [];
  const defaultType = match(this.state, TOKEN_TYPES.ASSIGN)
    ? this.parseType()
    : null;
  match(this.state, TOKEN_TYPES.SEMICOLON);

  return {
    type: 'AssociatedType',
    name: name.value,
    bounds,
    defaultType,
    span: spanFrom(this.state, start),
  };
};
