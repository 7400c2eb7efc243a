/**
 * Parser Extension: Literal Parsing
 * Numbers, strings, characters, booleans, null and interpolated strings
 */

import { Parser } from './parser.js';
import type {
  InterpolationNode,
  InterpolationPart,
  LiteralNode,
} from '../ast-nodes.js';
import { numericValue } from '../lexer/tokenizer.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  current,
  expectClose,
  expectedError,
  match,
  spanFrom,
  unrestricted,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseLiteral(): LiteralNode;
    parseInterpolation(): InterpolationNode;
  }
}

Parser.prototype.parseLiteral = function (this: Parser): LiteralNode {
  const token = current(this.state);
  const { span } = token;

  switch (token.type) {
    case TOKEN_TYPES.INTEGER:
    case TOKEN_TYPES.FLOAT: {
      advance(this.state);
      const raw = this.state.source.slice(span.start.offset, span.end.offset);
      const suffix = token.suffix ?? null;
      const numeric = numericValue(token);
      return numeric.kind === 'integer'
        ? { type: 'IntegerLiteral', value: numeric.value, suffix, raw, span }
        : { type: 'FloatLiteral', value: numeric.value, suffix, raw, span };
    }

    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, kind: 'plain', span };
    case TOKEN_TYPES.RAW_STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, kind: 'raw', span };
    case TOKEN_TYPES.BYTE_STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, kind: 'byte', span };

    case TOKEN_TYPES.CHAR:
      advance(this.state);
      return { type: 'CharLiteral', value: token.value, byte: false, span };
    case TOKEN_TYPES.BYTE:
      advance(this.state);
      return { type: 'CharLiteral', value: token.value, byte: true, span };

    case TOKEN_TYPES.TRUE:
      advance(this.state);
      return { type: 'BoolLiteral', value: true, span };
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return { type: 'BoolLiteral', value: false, span };

    case TOKEN_TYPES.NULL:
      advance(this.state);
      return { type: 'NullLiteral', span };

    default:
      throw expectedError(this.state, 'Expected literal');
  }
};

/**
 * f"text {expr} text {expr:spec}"
 *
 * The lexer has already split the literal into fragments and expression
 * tokens. An unterminated literal was reported by the lexer, so running
 * out of tokens here ends the node without a second diagnostic.
 */
Parser.prototype.parseInterpolation = function (
  this: Parser
): InterpolationNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume opening f"

  const parts: InterpolationPart[] = [];

  for (;;) {
    const token = current(this.state);

    if (token.type === TOKEN_TYPES.STRING_FRAGMENT) {
      advance(this.state);
      parts.push({ type: 'StringFragment', value: token.value, span: token.span });
      continue;
    }

    if (token.type === TOKEN_TYPES.INTERP_OPEN) {
      const open = advance(this.state);
      const expression = unrestricted(this.state, () => this.parseExpression());
      const spec = match(this.state, TOKEN_TYPES.FORMAT_SPEC);
      expectClose(this.state, TOKEN_TYPES.INTERP_CLOSE, open);
      parts.push(
        spec
          ? {
              type: 'FormattedValue',
              expression,
              spec: spec.value,
              span: spanFrom(this.state, expression.span.start),
            }
          : expression
      );
      continue;
    }

    if (token.type === TOKEN_TYPES.STRING_END) advance(this.state);
    break;
  }

  return {
    type: 'Interpolation',
    parts,
    span: spanFrom(this.state, start),
  };
};
