/**
 * Parser Extension: Paths
 * Names, qualified paths, generic arguments, struct literals and macros
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  IdentifierNode,
  MacroCallNode,
  PathNode,
  PathSegmentNode,
  StructLiteralFieldNode,
  StructLiteralNode,
  TypeNode,
} from '../ast-nodes.js';
import { createError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import { TOKEN_TYPES, type Token, type TokenType } from '../token-types.js';
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
  peek,
  report,
  spanFrom,
  unrestricted,
  withTrial,
} from './state.js';
import {
  canStartType,
  isArrowLambda,
  isMacroCall,
  looksLikeStructLiteral,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseNameExpression(): ExpressionNode;
    tryGenericArgs(name: Token): TypeNode[] | null;
    parseStructLiteral(
      path: PathNode | IdentifierNode,
      start: SourceLocation
    ): StructLiteralNode;
    parseMacroCall(): MacroCallNode;
  }
}

const PATH_SEGMENT_TOKENS: readonly TokenType[] = [
  TOKEN_TYPES.IDENTIFIER,
  TOKEN_TYPES.SELF,
  TOKEN_TYPES.SUPER,
  TOKEN_TYPES.CRATE,
];

const MACRO_CLOSERS = {
  [TOKEN_TYPES.LPAREN]: { close: TOKEN_TYPES.RPAREN, delimiter: 'paren' },
  [TOKEN_TYPES.LBRACKET]: { close: TOKEN_TYPES.RBRACKET, delimiter: 'bracket' },
  [TOKEN_TYPES.LBRACE]: { close: TOKEN_TYPES.RBRACE, delimiter: 'brace' },
} as const;

/**
 * Identifier, path, generic path, struct literal, macro call or
 * single-parameter arrow lambda.
 */
Parser.prototype.parseNameExpression = function (this: Parser): ExpressionNode {
  if (isMacroCall(this.state)) return this.parseMacroCall();
  if (isArrowLambda(this.state)) {
    return this.parseArrowLambda(current(this.state).span.start, false);
  }

  const start = current(this.state).span.start;
  const segments: PathSegmentNode[] = [];

  for (;;) {
    const name = advance(this.state);
    let typeArgs = check(this.state, TOKEN_TYPES.LT)
      ? this.tryGenericArgs(name)
      : null;

    // Turbofish: always type arguments
    if (
      check(this.state, TOKEN_TYPES.DOUBLE_COLON) &&
      checkAt(this.state, 1, TOKEN_TYPES.LT)
    ) {
      advance(this.state); // consume ::
      typeArgs = this.parseGenericArgs();
    }

    segments.push({
      type: 'PathSegment',
      name: name.value,
      typeArgs,
      span: spanFrom(this.state, name.span.start),
    });

    if (
      check(this.state, TOKEN_TYPES.DOUBLE_COLON) &&
      PATH_SEGMENT_TOKENS.includes(peek(this.state, 1).type)
    ) {
      advance(this.state); // consume ::
      continue;
    }
    break;
  }

  const [first] = segments;
  const last = segments[segments.length - 1];
  if (first === undefined || last === undefined) {
    throw expectedError(this.state, 'Expected name');
  }

  const path: PathNode | IdentifierNode =
    segments.length === 1 && first.typeArgs === null
      ? { type: 'Identifier', name: first.name, span: first.span }
      : { type: 'Path', segments, span: spanFrom(this.state, start) };

  if (looksLikeStructLiteral(this.state, last.name)) {
    return this.parseStructLiteral(path, start);
  }
  return path;
};

/**
 * Speculatively read `<T, U>` after a name. Succeeds only if the list
 * closes and is followed by `::`, `(` or a struct-literal `{`; otherwise
 * the `<` is a comparison. A trial that runs out of token budget falls
 * back to comparison with a warning.
 */
Parser.prototype.tryGenericArgs = function (
  this: Parser,
  name: Token
): TypeNode[] | null {
  if (!canStartType(peek(this.state, 1).type)) return null;

  const lt = current(this.state);
  const result = withTrial(this.state, 'generic-args', () => {
    const args = this.parseGenericArgs();
    const follow = current(this.state).type;
    if (follow === TOKEN_TYPES.DOUBLE_COLON || follow === TOKEN_TYPES.LPAREN) {
      return args;
    }
    if (
      follow === TOKEN_TYPES.LBRACE &&
      !this.state.restrictions.noStructLiteral
    ) {
      return args;
    }
    return null;
  });

  if (result.ok) return result.value;

  if (result.exhausted) {
    const warning = createError(
      'TERN-P006',
      { name: name.value, limit: this.state.options.maxTrialTokens },
      lt.span
    );
    warning.recovery = 'fallback';
    report(this.state, warning);
  }
  return null;
};

/** `Name { field: value, short, ..base }` */
Parser.prototype.parseStructLiteral = function (
  this: Parser,
  path: PathNode | IdentifierNode,
  start: SourceLocation
): StructLiteralNode {
  const open = advance(this.state); // consume {

  return unrestricted(this.state, () => {
    const fields: StructLiteralFieldNode[] = [];
    let base: ExpressionNode | null = null;

    while (!check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) {
      if (match(this.state, TOKEN_TYPES.DOT_DOT)) {
        base = this.parseExpression();
        match(this.state, TOKEN_TYPES.COMMA);
        break;
      }

      const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'Expected field name');
      const value = match(this.state, TOKEN_TYPES.COLON)
        ? this.parseExpression()
        : null;
      fields.push({
        type: 'StructLiteralField',
        name: name.value,
        value,
        span: spanFrom(this.state, name.span.start),
      });

      if (!match(this.state, TOKEN_TYPES.COMMA)) break;
    }

    expectClose(this.state, TOKEN_TYPES.RBRACE, open);
    return {
      type: 'StructLiteral',
      path,
      fields,
      base,
      span: spanFrom(this.state, start),
    };
  });
};

/** `name!(...)`, `name![...]`, `name!{...}` */
Parser.prototype.parseMacroCall = function (this: Parser): MacroCallNode {
  const name = advance(this.state);
  advance(this.state); // consume !

  const open = current(this.state);
  if (
    open.type !== TOKEN_TYPES.LPAREN &&
    open.type !== TOKEN_TYPES.LBRACKET &&
    open.type !== TOKEN_TYPES.LBRACE
  ) {
    throw expectedError(this.state, "Expected '(', '[' or '{' after macro name");
  }
  advance(this.state);

  const { close, delimiter } = MACRO_CLOSERS[open.type];
  const args = this.parseArguments(close, open);

  return {
    type: 'MacroCall',
    name: name.value,
    delimiter,
    args,
    span: makeSpan(name.span.start, this.state.previousEnd),
  };
};
