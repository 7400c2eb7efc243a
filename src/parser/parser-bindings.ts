/**
 * Parser Extension: Bindings
 * let / var / const
 */

import { Parser } from './parser.js';
import type { BindingKind, LetNode } from '../ast-nodes.js';
import { TOKEN_TYPES } from '../token-types.js';
import { advance, current, match, spanFrom } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseLet(): LetNode;
  }
}

/** `let pattern: Type = value;` (type, initializer and `;` are optional) */
Parser.prototype.parseLet = function (this: Parser): LetNode {
  const start = current(this.state).span.start;
  const keyword = advance(this.state);

  let kind: BindingKind = 'let';
  if (keyword.type === TOKEN_TYPES.VAR) kind = 'var';
  else if (keyword.type === TOKEN_TYPES.CONST) kind = 'const';

  const pattern = this.parsePattern();
  const typeAnnotation = match(this.state, TOKEN_TYPES.COLON)
    ? this.parseType()
    : null;
  const initializer = match(this.state, TOKEN_TYPES.ASSIGN)
    ? this.parseExpression()
    : null;
  match(this.state, TOKEN_TYPES.SEMICOLON);

  return {
    type: 'Let',
    kind,
    pattern,
    typeAnnotation,
    initializer,
    span: spanFrom(this.state, start),
  };
};
