/**
 * Parser Extension: Declaration Fragments
 * Attributes, decorators, visibility, generic parameters, where clauses
 * and recoverable member lists
 */

import { Parser } from './parser.js';
import type {
  AttributeNode,
  ExpressionNode,
  GenericParamNode,
  Visibility,
  WherePredicateNode,
} from '../ast-nodes.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import {
  advance,
  canRecover,
  check,
  checkAt,
  current,
  expect,
  expectClose,
  expectedError,
  isClosingDelimiter,
  match,
  peek,
  report,
  spanFrom,
  splitCompoundGt,
} from './state.js';
import { canStartType } from './helpers.js';
import { synchronizeMember } from './recovery.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseAttributes(): AttributeNode[];
    parseAttributeName(): string;
    parseVisibility(): Visibility;
    parseGenericParams(): GenericParamNode[];
    parseWhereClause(): WherePredicateNode[];
    parseDelimitedList<T>(
      close: TokenType,
      memberStarts: ReadonlySet<TokenType>,
      parseMember: () => T,
      separated: boolean
    ): T[];
  }
}

const SCOPED_VISIBILITY: Readonly<Partial<Record<TokenType, Visibility>>> =
  Object.freeze({
    [TOKEN_TYPES.CRATE]: 'crate',
    [TOKEN_TYPES.SUPER]: 'super',
    [TOKEN_TYPES.SELF]: 'self',
  });

// ============================================================
// ATTRIBUTES AND VISIBILITY
// ============================================================

/** Any mix of `#[name(args)]` and `@Name(args)` */
Parser.prototype.parseAttributes = function (this: Parser): AttributeNode[] {
  const attributes: AttributeNode[] = [];

  for (;;) {
    const start = current(this.state).span.start;

    if (check(this.state, TOKEN_TYPES.HASH)) {
      advance(this.state); // consume #
      const open = expect(
        this.state,
        TOKEN_TYPES.LBRACKET,
        "Expected '[' after '#'"
      );
      const name = this.parseAttributeName();
      let args: ExpressionNode[] = [];
      if (check(this.state, TOKEN_TYPES.LPAREN)) {
        args = this.parseArguments(TOKEN_TYPES.RPAREN, advance(this.state));
      }
      expectClose(this.state, TOKEN_TYPES.RBRACKET, open);
      attributes.push({
        type: 'Attribute',
        style: 'hash',
        name,
        args,
        span: spanFrom(this.state, start),
      });
      continue;
    }

    if (check(this.state, TOKEN_TYPES.AT)) {
      advance(this.state); // consume @
      const name = this.parseAttributeName();
      let args: ExpressionNode[] = [];
      if (check(this.state, TOKEN_TYPES.LPAREN)) {
        args = this.parseArguments(TOKEN_TYPES.RPAREN, advance(this.state));
      }
      attributes.push({
        type: 'Attribute',
        style: 'decorator',
        name,
        args,
        span: spanFrom(this.state, start),
      });
      continue;
    }

    return attributes;
  }
};

/** `name` or `a::b` */
Parser.prototype.parseAttributeName = function (this: Parser): string {
  const parts = [
    expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected attribute name').value,
  ];
  while (
    check(this.state, TOKEN_TYPES.DOUBLE_COLON) &&
    checkAt(this.state, 1, TOKEN_TYPES.IDENTIFIER)
  ) {
    advance(this.state); // consume ::
    parts.push(advance(this.state).value);
  }
  return parts.join('::');
};

/** `pub`, `pub(crate)`, `pub(super)`, `pub(self)`, `private`, `protected` */
Parser.prototype.parseVisibility = function (this: Parser): Visibility {
  if (match(this.state, TOKEN_TYPES.PRIVATE)) return 'private';
  if (match(this.state, TOKEN_TYPES.PROTECTED)) return 'protected';
  if (!match(this.state, TOKEN_TYPES.PUB)) return null;

  if (
    check(this.state, TOKEN_TYPES.LPAREN) &&
    checkAt(this.state, 2, TOKEN_TYPES.RPAREN)
  ) {
    const scoped = SCOPED_VISIBILITY[peek(this.state, 1).type];
    if (scoped !== undefined) {
      advance(this.state);
      advance(this.state);
      advance(this.state);
      return scoped;
    }
  }
  return 'public';
};

// ============================================================
// GENERICS
// ============================================================

/** `<T, U: Bound + Other = Default, 'a>` */
Parser.prototype.parseGenericParams = function (
  this: Parser
): GenericParamNode[] {
  expect(this.state, TOKEN_TYPES.LT, "Expected '<'");
  const params: GenericParamNode[] = [];

  while (!splitCompoundGt(this.state)) {
    const start = current(this.state).span.start;
    let name: string;
    if (check(this.state, TOKEN_TYPES.LABEL)) {
      name = `'${advance(this.state).value}`;
    } else {
      name = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        'Expected generic parameter name'
      ).value;
    }

    const bounds = match(this.state, TOKEN_TYPES.COLON)
      ? this.parseTypeBounds()
      : [];
    const defaultType = match(this.state, TOKEN_TYPES.ASSIGN)
      ? this.parseType()
      : null;

    params.push({
      type: 'GenericParam',
      name,
      bounds,
      defaultType,
      span: spanFrom(this.state, start),
    });
    if (!match(this.state, TOKEN_TYPES.COMMA)) break;
  }

  this.expectGenericClose();
  return params;
};

/** `where T: A + B, U: C` */
Parser.prototype.parseWhereClause = function (
  this: Parser
): WherePredicateNode[] {
  advance(this.state); // consume where
  const predicates: WherePredicateNode[] = [];

  while (canStartType(current(this.state).type)) {
    const start = current(this.state).span.start;
    const target = this.parseType();
    expect(this.state, TOKEN_TYPES.COLON, "Expected ':' in where clause");
    const bounds = this.parseTypeBounds();
    predicates.push({
      type: 'WherePredicate',
      target,
      bounds,
      span: spanFrom(this.state, start),
    });
    if (!match(this.state, TOKEN_TYPES.COMMA)) break;
  }

  if (predicates.length === 0) {
    throw expectedError(this.state, 'Expected where predicate');
  }
  return predicates;
};

// ============================================================
// MEMBER LISTS
// ============================================================

/**
 * Members up to `close` (not consumed). A member that fails to parse is
 * reported and skipped up to the next `,`, `;`, member-start token or
 * `close`, so its siblings survive. With `separated`, members must be
 * divided by commas; otherwise stray `;` and `,` are ignored.
 */
Parser.prototype.parseDelimitedList = function <T>(
  this: Parser,
  close: TokenType,
  memberStarts: ReadonlySet<TokenType>,
  parseMember: () => T,
  separated: boolean
): T[] {
  const members: T[] = [];

  while (!check(this.state, close, TOKEN_TYPES.EOF)) {
    // Another list's closer: leave it for expectClose
    if (isClosingDelimiter(current(this.state))) break;
    if (
      !separated &&
      (match(this.state, TOKEN_TYPES.SEMICOLON) ||
        match(this.state, TOKEN_TYPES.COMMA))
    ) {
      continue;
    }

    const startPos = this.state.pos;
    try {
      members.push(parseMember());
    } catch (err) {
      if (!canRecover(this.state, err)) throw err;
      err.recovery = 'synchronized';
      report(this.state, err);
      synchronizeMember(this.state, startPos, memberStarts);
      continue;
    }

    if (separated && !match(this.state, TOKEN_TYPES.COMMA)) {
      if (
        check(this.state, close, TOKEN_TYPES.EOF) ||
        isClosingDelimiter(current(this.state))
      ) {
        break;
      }
      // Missing separator: report and resynchronize at the next member
      const error = expectedError(this.state, "Expected ',' or closing delimiter");
      error.recovery = 'synchronized';
      report(this.state, error);
      synchronizeMember(this.state, this.state.pos, memberStarts);
    }
  }

  return members;
};
