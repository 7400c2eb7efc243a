/**
 * Parser Helpers
 * Leading-token classification and lookahead predicates
 * @internal This module contains internal parser utilities
 */

import { TOKEN_TYPES, type TokenType } from '../token-types.js';
import { type ParserState, check, peek } from './state.js';

// ============================================================
// LEADING TOKEN CLASSIFICATION
// ============================================================

/** Production selected by the first token of a primary expression */
export type LeadingKind =
  | 'literal'
  | 'interpolation'
  | 'name'
  | 'paren'
  | 'bracket'
  | 'brace'
  | 'if'
  | 'match'
  | 'for'
  | 'while'
  | 'loop'
  | 'label'
  | 'function'
  | 'closure'
  | 'async'
  | 'try'
  | 'throw'
  | 'return'
  | 'break'
  | 'continue'
  | 'range'
  | 'spread'
  | 'unary'
  | 'error'
  | 'none';

/** @internal */
export function assertNever(value: never): never {
  throw new Error(`Unhandled case: ${String(value)}`);
}

/**
 * Classify a token by the expression it can begin. The switch lists
 * every token type so a new one fails to compile until it is placed.
 * @internal
 */
export function classifyLeadingToken(type: TokenType): LeadingKind {
  switch (type) {
    case TOKEN_TYPES.INTEGER:
    case TOKEN_TYPES.FLOAT:
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.RAW_STRING:
    case TOKEN_TYPES.BYTE_STRING:
    case TOKEN_TYPES.CHAR:
    case TOKEN_TYPES.BYTE:
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
    case TOKEN_TYPES.NULL:
      return 'literal';

    case TOKEN_TYPES.STRING_BEGIN:
      return 'interpolation';

    case TOKEN_TYPES.IDENTIFIER:
    case TOKEN_TYPES.SELF:
    case TOKEN_TYPES.SUPER:
    case TOKEN_TYPES.CRATE:
      return 'name';

    case TOKEN_TYPES.LPAREN:
      return 'paren';
    case TOKEN_TYPES.LBRACKET:
      return 'bracket';
    case TOKEN_TYPES.LBRACE:
      return 'brace';

    case TOKEN_TYPES.IF:
      return 'if';
    case TOKEN_TYPES.MATCH:
      return 'match';
    case TOKEN_TYPES.FOR:
      return 'for';
    case TOKEN_TYPES.WHILE:
      return 'while';
    case TOKEN_TYPES.LOOP:
      return 'loop';
    case TOKEN_TYPES.LABEL:
      return 'label';

    case TOKEN_TYPES.FN:
    case TOKEN_TYPES.FUN:
      return 'function';
    case TOKEN_TYPES.PIPE:
    case TOKEN_TYPES.OR:
      return 'closure';
    case TOKEN_TYPES.ASYNC:
      return 'async';

    case TOKEN_TYPES.TRY:
      return 'try';
    case TOKEN_TYPES.THROW:
      return 'throw';
    case TOKEN_TYPES.RETURN:
      return 'return';
    case TOKEN_TYPES.BREAK:
      return 'break';
    case TOKEN_TYPES.CONTINUE:
      return 'continue';

    case TOKEN_TYPES.DOT_DOT:
    case TOKEN_TYPES.DOT_DOT_EQ:
      return 'range';
    case TOKEN_TYPES.ELLIPSIS:
      return 'spread';

    case TOKEN_TYPES.MINUS:
    case TOKEN_TYPES.BANG:
    case TOKEN_TYPES.TILDE:
    case TOKEN_TYPES.AMPERSAND:
    case TOKEN_TYPES.AND:
    case TOKEN_TYPES.STAR:
    case TOKEN_TYPES.SPAWN:
    case TOKEN_TYPES.AWAIT:
      return 'unary';

    case TOKEN_TYPES.ERROR:
      return 'error';

    case TOKEN_TYPES.STRING_FRAGMENT:
    case TOKEN_TYPES.INTERP_OPEN:
    case TOKEN_TYPES.FORMAT_SPEC:
    case TOKEN_TYPES.INTERP_CLOSE:
    case TOKEN_TYPES.STRING_END:
    case TOKEN_TYPES.UNDERSCORE:
    case TOKEN_TYPES.LET:
    case TOKEN_TYPES.VAR:
    case TOKEN_TYPES.CONST:
    case TOKEN_TYPES.MUT:
    case TOKEN_TYPES.REF:
    case TOKEN_TYPES.ELSE:
    case TOKEN_TYPES.IN:
    case TOKEN_TYPES.CATCH:
    case TOKEN_TYPES.FINALLY:
    case TOKEN_TYPES.STRUCT:
    case TOKEN_TYPES.CLASS:
    case TOKEN_TYPES.ENUM:
    case TOKEN_TYPES.ACTOR:
    case TOKEN_TYPES.TRAIT:
    case TOKEN_TYPES.INTERFACE:
    case TOKEN_TYPES.IMPL:
    case TOKEN_TYPES.TYPE:
    case TOKEN_TYPES.MOD:
    case TOKEN_TYPES.MODULE:
    case TOKEN_TYPES.USE:
    case TOKEN_TYPES.IMPORT:
    case TOKEN_TYPES.FROM:
    case TOKEN_TYPES.EXPORT:
    case TOKEN_TYPES.WHERE:
    case TOKEN_TYPES.PUB:
    case TOKEN_TYPES.PRIVATE:
    case TOKEN_TYPES.PROTECTED:
    case TOKEN_TYPES.STATIC:
    case TOKEN_TYPES.OVERRIDE:
    case TOKEN_TYPES.FINAL:
    case TOKEN_TYPES.ABSTRACT:
    case TOKEN_TYPES.AS:
    case TOKEN_TYPES.IS:
    case TOKEN_TYPES.PLUS:
    case TOKEN_TYPES.SLASH:
    case TOKEN_TYPES.PERCENT:
    case TOKEN_TYPES.POWER:
    case TOKEN_TYPES.EQ:
    case TOKEN_TYPES.NE:
    case TOKEN_TYPES.LT:
    case TOKEN_TYPES.GT:
    case TOKEN_TYPES.LE:
    case TOKEN_TYPES.GE:
    case TOKEN_TYPES.CARET:
    case TOKEN_TYPES.SHL:
    case TOKEN_TYPES.SHR:
    case TOKEN_TYPES.ASSIGN:
    case TOKEN_TYPES.PLUS_ASSIGN:
    case TOKEN_TYPES.MINUS_ASSIGN:
    case TOKEN_TYPES.STAR_ASSIGN:
    case TOKEN_TYPES.SLASH_ASSIGN:
    case TOKEN_TYPES.PERCENT_ASSIGN:
    case TOKEN_TYPES.POWER_ASSIGN:
    case TOKEN_TYPES.AMP_ASSIGN:
    case TOKEN_TYPES.PIPE_ASSIGN:
    case TOKEN_TYPES.CARET_ASSIGN:
    case TOKEN_TYPES.SHL_ASSIGN:
    case TOKEN_TYPES.SHR_ASSIGN:
    case TOKEN_TYPES.PIPELINE:
    case TOKEN_TYPES.NULL_COALESCE:
    case TOKEN_TYPES.QUESTION:
    case TOKEN_TYPES.SAFE_NAV:
    case TOKEN_TYPES.DOT:
    case TOKEN_TYPES.ARROW:
    case TOKEN_TYPES.FAT_ARROW:
    case TOKEN_TYPES.COLON:
    case TOKEN_TYPES.DOUBLE_COLON:
    case TOKEN_TYPES.COMMA:
    case TOKEN_TYPES.SEMICOLON:
    case TOKEN_TYPES.AT:
    case TOKEN_TYPES.HASH:
    case TOKEN_TYPES.RPAREN:
    case TOKEN_TYPES.RBRACE:
    case TOKEN_TYPES.RBRACKET:
    case TOKEN_TYPES.LINE_COMMENT:
    case TOKEN_TYPES.DOC_COMMENT:
    case TOKEN_TYPES.HASH_COMMENT:
    case TOKEN_TYPES.BLOCK_COMMENT:
    case TOKEN_TYPES.EOF:
      return 'none';

    default:
      return assertNever(type);
  }
}

/** @internal */
export function canStartExpression(type: TokenType): boolean {
  return classifyLeadingToken(type) !== 'none';
}

/** Tokens that can begin a type expression @internal */
export function canStartType(type: TokenType): boolean {
  switch (type) {
    case TOKEN_TYPES.IDENTIFIER:
    case TOKEN_TYPES.SELF:
    case TOKEN_TYPES.SUPER:
    case TOKEN_TYPES.CRATE:
    case TOKEN_TYPES.LPAREN:
    case TOKEN_TYPES.LBRACKET:
    case TOKEN_TYPES.AMPERSAND:
    case TOKEN_TYPES.AND:
    case TOKEN_TYPES.FN:
    case TOKEN_TYPES.UNDERSCORE:
    case TOKEN_TYPES.IMPL:
      return true;
    default:
      return false;
  }
}

/** Tokens that can begin a pattern @internal */
export function canStartPattern(type: TokenType): boolean {
  switch (type) {
    case TOKEN_TYPES.UNDERSCORE:
    case TOKEN_TYPES.DOT_DOT:
    case TOKEN_TYPES.IDENTIFIER:
    case TOKEN_TYPES.SELF:
    case TOKEN_TYPES.SUPER:
    case TOKEN_TYPES.CRATE:
    case TOKEN_TYPES.MUT:
    case TOKEN_TYPES.REF:
    case TOKEN_TYPES.INTEGER:
    case TOKEN_TYPES.FLOAT:
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.RAW_STRING:
    case TOKEN_TYPES.BYTE_STRING:
    case TOKEN_TYPES.CHAR:
    case TOKEN_TYPES.BYTE:
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
    case TOKEN_TYPES.NULL:
    case TOKEN_TYPES.MINUS:
    case TOKEN_TYPES.LPAREN:
    case TOKEN_TYPES.LBRACKET:
    case TOKEN_TYPES.PIPE:
      return true;
    default:
      return false;
  }
}

// ============================================================
// LOOKAHEAD PREDICATES
// ============================================================

/**
 * Check for macro call: name!( name![ name!{
 * The `!` must touch the name; `a !(b)` is a send.
 * @internal
 */
export function isMacroCall(state: ParserState): boolean {
  const name = peek(state, 0);
  const bang = peek(state, 1);
  return (
    name.type === TOKEN_TYPES.IDENTIFIER &&
    bang.type === TOKEN_TYPES.BANG &&
    bang.span.start.offset === name.span.end.offset &&
    [TOKEN_TYPES.LPAREN, TOKEN_TYPES.LBRACKET, TOKEN_TYPES.LBRACE].some(
      (t) => peek(state, 2).type === t
    )
  );
}

/**
 * Check for single-parameter arrow lambda: x => body
 * @internal
 */
export function isArrowLambda(state: ParserState): boolean {
  return (
    !state.restrictions.noArrowLambda &&
    check(state, TOKEN_TYPES.IDENTIFIER) &&
    peek(state, 1).type === TOKEN_TYPES.FAT_ARROW
  );
}

/**
 * Check for struct literal body after a path: Name { field: ... }
 * Shorthand (`P { x, y }`) and empty (`P {}`) bodies only count for
 * capitalized names, so `x {}` after an expression stays a block.
 * @internal
 */
export function looksLikeStructLiteral(
  state: ParserState,
  typeName: string
): boolean {
  if (state.restrictions.noStructLiteral) return false;
  if (!check(state, TOKEN_TYPES.LBRACE)) return false;

  const first = peek(state, 1).type;
  const second = peek(state, 2).type;
  if (first === TOKEN_TYPES.DOT_DOT) return true;
  if (first === TOKEN_TYPES.IDENTIFIER && second === TOKEN_TYPES.COLON) {
    return true;
  }

  const capitalized = /^\p{Lu}/u.test(typeName);
  if (!capitalized) return false;
  if (first === TOKEN_TYPES.RBRACE) return true;
  return (
    first === TOKEN_TYPES.IDENTIFIER &&
    (second === TOKEN_TYPES.COMMA || second === TOKEN_TYPES.RBRACE)
  );
}

/**
 * Expressions that end in a block and terminate a statement without `;`
 * @internal
 */
export function isBlockLikeStart(type: TokenType): boolean {
  switch (type) {
    case TOKEN_TYPES.IF:
    case TOKEN_TYPES.MATCH:
    case TOKEN_TYPES.FOR:
    case TOKEN_TYPES.WHILE:
    case TOKEN_TYPES.LOOP:
    case TOKEN_TYPES.LBRACE:
    case TOKEN_TYPES.TRY:
    case TOKEN_TYPES.LABEL:
      return true;
    default:
      return false;
  }
}

/** Closing delimiters and terminators after which no operand follows @internal */
export function isExpressionTerminator(type: TokenType): boolean {
  switch (type) {
    case TOKEN_TYPES.RPAREN:
    case TOKEN_TYPES.RBRACKET:
    case TOKEN_TYPES.RBRACE:
    case TOKEN_TYPES.INTERP_CLOSE:
    case TOKEN_TYPES.COMMA:
    case TOKEN_TYPES.SEMICOLON:
    case TOKEN_TYPES.EOF:
      return true;
    default:
      return false;
  }
}
