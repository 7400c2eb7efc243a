/**
 * Parser Extension: Type Expressions
 * Named and generic types, tuples, lists, arrays, references, function
 * types, `impl Trait`, `_` and optional `T?`
 */

import { Parser } from './parser.js';
import type { TypeNode } from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  check,
  checkAt,
  current,
  expect,
  expectClose,
  expectedError,
  makeSpan,
  match,
  nested,
  spanFrom,
  splitCompoundGt,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseType(): TypeNode;
    parseTypeNoOptional(): TypeNode;
    parseNamedType(): TypeNode;
    parseTypeBounds(): TypeNode[];
    parseGenericArgs(): TypeNode[];
    expectGenericClose(): void;
  }
}

Parser.prototype.parseType = function (this: Parser): TypeNode {
  const start = current(this.state).span.start;
  let type = this.parseTypeNoOptional();

  while (match(this.state, TOKEN_TYPES.QUESTION)) {
    type = { type: 'OptionalType', inner: type, span: spanFrom(this.state, start) };
  }
  return type;
};

Parser.prototype.parseTypeNoOptional = function (this: Parser): TypeNode {
  return nested<TypeNode>(this.state, () => {
    const token = current(this.state);
    const start = token.span.start;

    switch (token.type) {
      case TOKEN_TYPES.IDENTIFIER:
      case TOKEN_TYPES.SELF:
      case TOKEN_TYPES.SUPER:
      case TOKEN_TYPES.CRATE:
        return this.parseNamedType();

      case TOKEN_TYPES.UNDERSCORE:
        advance(this.state);
        return { type: 'InferType', span: token.span };

      case TOKEN_TYPES.LPAREN: {
        const open = advance(this.state);
        const elements: TypeNode[] = [];
        let trailingComma = false;
        while (!check(this.state, TOKEN_TYPES.RPAREN, TOKEN_TYPES.EOF)) {
          elements.push(this.parseType());
          trailingComma = match(this.state, TOKEN_TYPES.COMMA) !== null;
          if (!trailingComma) break;
        }
        expectClose(this.state, TOKEN_TYPES.RPAREN, open);

        // `(T)` is just T
        const [only] = elements;
        if (elements.length === 1 && only !== undefined && !trailingComma) {
          return only;
        }
        return { type: 'TupleType', elements, span: spanFrom(this.state, start) };
      }

      case TOKEN_TYPES.LBRACKET: {
        const open = advance(this.state);
        const element = this.parseType();
        if (match(this.state, TOKEN_TYPES.SEMICOLON)) {
          const size = this.parseExpression();
          expectClose(this.state, TOKEN_TYPES.RBRACKET, open);
          return {
            type: 'ArrayType',
            element,
            size,
            span: spanFrom(this.state, start),
          };
        }
        expectClose(this.state, TOKEN_TYPES.RBRACKET, open);
        return { type: 'ListType', element, span: spanFrom(this.state, start) };
      }

      case TOKEN_TYPES.AMPERSAND: {
        advance(this.state);
        const mutable = match(this.state, TOKEN_TYPES.MUT) !== null;
        const inner = this.parseTypeNoOptional();
        return {
          type: 'ReferenceType',
          mutable,
          inner,
          span: spanFrom(this.state, start),
        };
      }

      // `&&T`
      case TOKEN_TYPES.AND: {
        advance(this.state);
        const innerStart: SourceLocation = {
          line: start.line,
          column: start.column + 1,
          offset: start.offset + 1,
        };
        const mutable = match(this.state, TOKEN_TYPES.MUT) !== null;
        const inner = this.parseTypeNoOptional();
        const end = this.state.previousEnd;
        return {
          type: 'ReferenceType',
          mutable: false,
          inner: {
            type: 'ReferenceType',
            mutable,
            inner,
            span: makeSpan(innerStart, end),
          },
          span: makeSpan(start, end),
        };
      }

      case TOKEN_TYPES.FN: {
        advance(this.state);
        const open = expect(this.state, TOKEN_TYPES.LPAREN, "Expected '(' after 'fn'");
        const params: TypeNode[] = [];
        while (!check(this.state, TOKEN_TYPES.RPAREN, TOKEN_TYPES.EOF)) {
          params.push(this.parseType());
          if (!match(this.state, TOKEN_TYPES.COMMA)) break;
        }
        expectClose(this.state, TOKEN_TYPES.RPAREN, open);
        const returnType = match(this.state, TOKEN_TYPES.ARROW)
          ? this.parseType()
          : null;
        return {
          type: 'FunctionType',
          params,
          returnType,
          span: spanFrom(this.state, start),
        };
      }

      case TOKEN_TYPES.IMPL:
        advance(this.state);
        return {
          type: 'ImplTraitType',
          bounds: this.parseTypeBounds(),
          span: spanFrom(this.state, start),
        };

      default:
        throw expectedError(this.state, 'Expected type');
    }
  });
};

/** `a::b::Name<Args>` */
Parser.prototype.parseNamedType = function (this: Parser): TypeNode {
  const start = current(this.state).span.start;
  const path: string[] = [advance(this.state).value];

  while (
    check(this.state, TOKEN_TYPES.DOUBLE_COLON) &&
    checkAt(this.state, 1, TOKEN_TYPES.IDENTIFIER)
  ) {
    advance(this.state); // consume ::
    path.push(advance(this.state).value);
  }

  const args = check(this.state, TOKEN_TYPES.LT) ? this.parseGenericArgs() : [];
  return { type: 'NamedType', path, args, span: spanFrom(this.state, start) };
};

/** `A + B + C` */
Parser.prototype.parseTypeBounds = function (this: Parser): TypeNode[] {
  const bounds: TypeNode[] = [this.parseType()];
  while (match(this.state, TOKEN_TYPES.PLUS)) {
    bounds.push(this.parseType());
  }
  return bounds;
};

/** `<A, B>`; a trailing `>>` or `>=` is split so nested lists close */
Parser.prototype.parseGenericArgs = function (this: Parser): TypeNode[] {
  expect(this.state, TOKEN_TYPES.LT, "Expected '<'");
  const args: TypeNode[] = [];

  while (!splitCompoundGt(this.state)) {
    args.push(this.parseType());
    if (!match(this.state, TOKEN_TYPES.COMMA)) break;
  }

  this.expectGenericClose();
  return args;
};

Parser.prototype.expectGenericClose = function (this: Parser): void {
  if (!splitCompoundGt(this.state)) {
    throw expectedError(this.state, "Expected '>'", TOKEN_TYPES.GT);
  }
  advance(this.state);
};
