/**
 * Parser Extension: Actors
 * `actor` declarations with state fields and `on` message handlers
 */

import { Parser } from './parser.js';
import type {
  ActorHandlerNode,
  ActorNode,
  AttributeNode,
  ParamNode,
  StructFieldNode,
  Visibility,
} from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import {
  type ParserState,
  advance,
  check,
  checkAt,
  current,
  expect,
  expectClose,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseActor(
      start: SourceLocation,
      attributes: AttributeNode[],
      visibility: Visibility
    ): ActorNode;
    parseActorHandler(): ActorHandlerNode;
  }
}

const MEMBER_STARTS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.PUB,
  TOKEN_TYPES.HASH,
  TOKEN_TYPES.AT,
]);

/** `on Name`; `on: Type` is still a field */
function isHandlerStart(state: ParserState): boolean {
  const token = current(state);
  return (
    token.type === TOKEN_TYPES.IDENTIFIER &&
    token.value === 'on' &&
    checkAt(state, 1, TOKEN_TYPES.IDENTIFIER)
  );
}

/**
 * `actor Name { field: Type, on Message(params) { ... } }`
 *
 * Fields and handlers may interleave; `,` and `;` between them are optional.
 */
Parser.prototype.parseActor = function (
  this: Parser,
  start: SourceLocation,
  attributes: AttributeNode[],
  visibility: Visibility
): ActorNode {
  advance(this.state); // consume actor
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected actor name');
  const open = expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{' after actor name");

  const members = this.parseDelimitedList<StructFieldNode | ActorHandlerNode>(
    TOKEN_TYPES.RBRACE,
    MEMBER_STARTS,
    () =>
      isHandlerStart(this.state) ? this.parseActorHandler() : this.parseNamedField(),
    false
  );
  expectClose(this.state, TOKEN_TYPES.RBRACE, open);

  const state: StructFieldNode[] = [];
  const handlers: ActorHandlerNode[] = [];
  for (const member of members) {
    if (member.type === 'ActorHandler') handlers.push(member);
    else state.push(member);
  }

  return {
    type: 'Actor',
    name: name.value,
    visibility,
    attributes,
    state,
    handlers,
    span: spanFrom(this.state, start),
  };
};

Parser.prototype.parseActorHandler = function (this: Parser): ActorHandlerNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume on
  const message = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    "Expected message type after 'on'"
  );

  let params: ParamNode[] = [];
  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    params = this.parseParamList(advance(this.state)).params;
  }
  const body = this.parseBlock(null, current(this.state).span.start);

  return {
    type: 'ActorHandler',
    message: message.value,
    params,
    body,
    span: spanFrom(this.state, start),
  };
};
