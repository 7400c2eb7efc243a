/**
 * Parser Extension: Patterns
 * Bindings, wildcards, literals, ranges, tuples, lists, structs,
 * variants and `|` alternatives
 */

import { Parser } from './parser.js';
import type {
  IdentifierPatternNode,
  LiteralPatternNode,
  PatternNode,
  StructPatternFieldNode,
  StructPatternNode,
} from '../ast-nodes.js';
import { createError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type Token, type TokenType } from '../token-types.js';
import {
  advance,
  check,
  checkAt,
  current,
  describeToken,
  expect,
  expectClose,
  match,
  nested,
  spanFrom,
  unrestricted,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePattern(): PatternNode;
    parsePatternNoOr(): PatternNode;
    parseLiteralPattern(): LiteralPatternNode;
    parseRangeRest(
      start: SourceLocation,
      low: LiteralPatternNode | null
    ): PatternNode;
    parseBindingPattern(): IdentifierPatternNode;
    parsePathPattern(): PatternNode;
    parsePatternList(close: TokenType, open: Token): PatternNode[];
    parseStructPatternBody(
      path: string[],
      start: SourceLocation
    ): StructPatternNode;
  }
}

const LITERAL_PATTERN_TOKENS: readonly TokenType[] = [
  TOKEN_TYPES.INTEGER,
  TOKEN_TYPES.FLOAT,
  TOKEN_TYPES.STRING,
  TOKEN_TYPES.RAW_STRING,
  TOKEN_TYPES.BYTE_STRING,
  TOKEN_TYPES.CHAR,
  TOKEN_TYPES.BYTE,
  TOKEN_TYPES.TRUE,
  TOKEN_TYPES.FALSE,
  TOKEN_TYPES.NULL,
];

const PATH_TOKENS: readonly TokenType[] = [
  TOKEN_TYPES.IDENTIFIER,
  TOKEN_TYPES.SELF,
  TOKEN_TYPES.SUPER,
  TOKEN_TYPES.CRATE,
];

function startsLiteralPattern(parser: Parser): boolean {
  const { type } = current(parser.state);
  if (LITERAL_PATTERN_TOKENS.includes(type)) return true;
  return (
    type === TOKEN_TYPES.MINUS &&
    checkAt(parser.state, 1, TOKEN_TYPES.INTEGER, TOKEN_TYPES.FLOAT)
  );
}

/** `p | q | r`, with an optional leading `|` */
Parser.prototype.parsePattern = function (this: Parser): PatternNode {
  const start = current(this.state).span.start;
  match(this.state, TOKEN_TYPES.PIPE);

  const first = this.parsePatternNoOr();
  if (!check(this.state, TOKEN_TYPES.PIPE)) return first;

  const alternatives: PatternNode[] = [first];
  while (match(this.state, TOKEN_TYPES.PIPE)) {
    alternatives.push(this.parsePatternNoOr());
  }
  return {
    type: 'OrPattern',
    alternatives,
    span: spanFrom(this.state, start),
  };
};

/** A single pattern; `|` is left for the caller (closure parameters) */
Parser.prototype.parsePatternNoOr = function (this: Parser): PatternNode {
  return nested<PatternNode>(this.state, () => {
    const token = current(this.state);
    const start = token.span.start;

    if (startsLiteralPattern(this)) {
      const literal = this.parseLiteralPattern();
      if (check(this.state, TOKEN_TYPES.DOT_DOT, TOKEN_TYPES.DOT_DOT_EQ)) {
        return this.parseRangeRest(start, literal);
      }
      return literal;
    }

    switch (token.type) {
      case TOKEN_TYPES.UNDERSCORE:
        advance(this.state);
        return { type: 'WildcardPattern', span: token.span };

      case TOKEN_TYPES.DOT_DOT: {
        advance(this.state);
        const name = match(this.state, TOKEN_TYPES.IDENTIFIER);
        return {
          type: 'RestPattern',
          name: name ? name.value : null,
          span: spanFrom(this.state, start),
        };
      }

      case TOKEN_TYPES.DOT_DOT_EQ:
        return this.parseRangeRest(start, null);

      case TOKEN_TYPES.MUT:
      case TOKEN_TYPES.REF:
        return this.parseBindingPattern();

      case TOKEN_TYPES.LPAREN: {
        const open = advance(this.state);
        if (match(this.state, TOKEN_TYPES.RPAREN)) {
          return { type: 'TuplePattern', elements: [], span: spanFrom(this.state, start) };
        }
        const first = this.parsePattern();
        if (!check(this.state, TOKEN_TYPES.COMMA)) {
          // `(p)` groups
          expectClose(this.state, TOKEN_TYPES.RPAREN, open);
          return first;
        }
        advance(this.state); // consume ,
        const rest = this.parsePatternList(TOKEN_TYPES.RPAREN, open);
        return {
          type: 'TuplePattern',
          elements: [first, ...rest],
          span: spanFrom(this.state, start),
        };
      }

      case TOKEN_TYPES.LBRACKET: {
        const open = advance(this.state);
        const elements = this.parsePatternList(TOKEN_TYPES.RBRACKET, open);
        return { type: 'ListPattern', elements, span: spanFrom(this.state, start) };
      }

      case TOKEN_TYPES.IDENTIFIER:
      case TOKEN_TYPES.SELF:
      case TOKEN_TYPES.SUPER:
      case TOKEN_TYPES.CRATE:
        return this.parsePathPattern();

      default:
        throw createError('TERN-P004', { found: describeToken(token) }, token.span);
    }
  });
};

/** Literal with an optional leading minus */
Parser.prototype.parseLiteralPattern = function (
  this: Parser
): LiteralPatternNode {
  const start = current(this.state).span.start;
  const negative = match(this.state, TOKEN_TYPES.MINUS) !== null;
  const literal = this.parseLiteral();
  return {
    type: 'LiteralPattern',
    literal,
    negative,
    span: spanFrom(this.state, start),
  };
};

/** `lo..hi`, `lo..=hi`, `lo..` or `..=hi`; the cursor is on the range operator */
Parser.prototype.parseRangeRest = function (
  this: Parser,
  start: SourceLocation,
  low: LiteralPatternNode | null
): PatternNode {
  const operator = advance(this.state);
  const inclusive = operator.type === TOKEN_TYPES.DOT_DOT_EQ;

  let high: LiteralPatternNode | null = null;
  if (startsLiteralPattern(this)) {
    high = this.parseLiteralPattern();
  } else if (inclusive) {
    const found = current(this.state);
    throw createError('TERN-P004', { found: describeToken(found) }, found.span);
  }

  return {
    type: 'RangePattern',
    start: low,
    end: high,
    inclusive,
    span: spanFrom(this.state, start),
  };
};

/** `mut x`, `ref x`, `ref mut x`, optionally `@ subpattern` */
Parser.prototype.parseBindingPattern = function (
  this: Parser
): IdentifierPatternNode {
  const start = current(this.state).span.start;
  const byRef = match(this.state, TOKEN_TYPES.REF) !== null;
  const mutable = match(this.state, TOKEN_TYPES.MUT) !== null;
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected binding name');
  const subpattern = match(this.state, TOKEN_TYPES.AT)
    ? this.parsePatternNoOr()
    : null;

  return {
    type: 'IdentifierPattern',
    name: name.value,
    mutable,
    byRef,
    subpattern,
    span: spanFrom(this.state, start),
  };
};

/**
 * Binding, `name @ p`, unit path, `Variant(p, ..)` or `Struct { f, .. }`.
 * A `{` after the path is a struct pattern unless struct literals are
 * restricted (an unparenthesized `catch e {`).
 */
Parser.prototype.parsePathPattern = function (this: Parser): PatternNode {
  const start = current(this.state).span.start;
  const path: string[] = [advance(this.state).value];

  while (
    check(this.state, TOKEN_TYPES.DOUBLE_COLON) &&
    checkAt(this.state, 1, ...PATH_TOKENS)
  ) {
    advance(this.state); // consume ::
    path.push(advance(this.state).value);
  }

  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    const open = advance(this.state);
    const elements = this.parsePatternList(TOKEN_TYPES.RPAREN, open);
    return {
      type: 'TupleStructPattern',
      path,
      elements,
      span: spanFrom(this.state, start),
    };
  }

  if (
    check(this.state, TOKEN_TYPES.LBRACE) &&
    !this.state.restrictions.noStructLiteral
  ) {
    return this.parseStructPatternBody(path, start);
  }

  const [name] = path;
  if (path.length === 1 && name !== undefined) {
    const subpattern = match(this.state, TOKEN_TYPES.AT)
      ? this.parsePatternNoOr()
      : null;
    return {
      type: 'IdentifierPattern',
      name,
      mutable: false,
      byRef: false,
      subpattern,
      span: spanFrom(this.state, start),
    };
  }

  return { type: 'PathPattern', path, span: spanFrom(this.state, start) };
};

/** Comma-separated patterns up to `close`; consumes the close */
Parser.prototype.parsePatternList = function (
  this: Parser,
  close: TokenType,
  open: Token
): PatternNode[] {
  return unrestricted(this.state, () => {
    const elements: PatternNode[] = [];
    while (!check(this.state, close, TOKEN_TYPES.EOF)) {
      elements.push(this.parsePattern());
      if (!match(this.state, TOKEN_TYPES.COMMA)) break;
    }
    expectClose(this.state, close, open);
    return elements;
  });
};

/** `{ x, y: p, ref mut z, .. }` */
Parser.prototype.parseStructPatternBody = function (
  this: Parser,
  path: string[],
  start: SourceLocation
): StructPatternNode {
  const open = advance(this.state); // consume {
  const fields: StructPatternFieldNode[] = [];
  let hasRest = false;

  unrestricted(this.state, () => {
    while (!check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) {
      if (match(this.state, TOKEN_TYPES.DOT_DOT)) {
        hasRest = true;
        match(this.state, TOKEN_TYPES.COMMA);
        break;
      }

      const fieldStart = current(this.state).span.start;
      if (check(this.state, TOKEN_TYPES.REF, TOKEN_TYPES.MUT)) {
        // Shorthand binding with modifiers binds the field's own name
        const binding = this.parseBindingPattern();
        fields.push({
          type: 'StructPatternField',
          name: binding.name,
          pattern: binding,
          span: spanFrom(this.state, fieldStart),
        });
      } else {
        const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected field name');
        const pattern = match(this.state, TOKEN_TYPES.COLON)
          ? this.parsePattern()
          : null;
        fields.push({
          type: 'StructPatternField',
          name: name.value,
          pattern,
          span: spanFrom(this.state, fieldStart),
        });
      }

      if (!match(this.state, TOKEN_TYPES.COMMA)) break;
    }
    expectClose(this.state, TOKEN_TYPES.RBRACE, open);
  });

  return {
    type: 'StructPattern',
    path,
    fields,
    hasRest,
    span: spanFrom(this.state, start),
  };
};
