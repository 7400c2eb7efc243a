/**
 * Operator Lookup Tables
 */

import { TOKEN_TYPES, type TokenType } from '../token-types.js';

/** Three-character operator lookup table */
export const THREE_CHAR_OPERATORS: Readonly<Record<string, TokenType>> =
  Object.freeze({
    '**=': TOKEN_TYPES.POWER_ASSIGN,
    '<<=': TOKEN_TYPES.SHL_ASSIGN,
    '>>=': TOKEN_TYPES.SHR_ASSIGN,
    '...': TOKEN_TYPES.ELLIPSIS,
    '..=': TOKEN_TYPES.DOT_DOT_EQ,
  });

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Readonly<Record<string, TokenType>> =
  Object.freeze({
    '**': TOKEN_TYPES.POWER,
    '==': TOKEN_TYPES.EQ,
    '!=': TOKEN_TYPES.NE,
    '<=': TOKEN_TYPES.LE,
    '>=': TOKEN_TYPES.GE,
    '&&': TOKEN_TYPES.AND,
    '||': TOKEN_TYPES.OR,
    '<<': TOKEN_TYPES.SHL,
    '>>': TOKEN_TYPES.SHR,
    '+=': TOKEN_TYPES.PLUS_ASSIGN,
    '-=': TOKEN_TYPES.MINUS_ASSIGN,
    '*=': TOKEN_TYPES.STAR_ASSIGN,
    '/=': TOKEN_TYPES.SLASH_ASSIGN,
    '%=': TOKEN_TYPES.PERCENT_ASSIGN,
    '&=': TOKEN_TYPES.AMP_ASSIGN,
    '|=': TOKEN_TYPES.PIPE_ASSIGN,
    '^=': TOKEN_TYPES.CARET_ASSIGN,
    '|>': TOKEN_TYPES.PIPELINE,
    '??': TOKEN_TYPES.NULL_COALESCE,
    '?.': TOKEN_TYPES.SAFE_NAV,
    '..': TOKEN_TYPES.DOT_DOT,
    '->': TOKEN_TYPES.ARROW,
    '=>': TOKEN_TYPES.FAT_ARROW,
    '::': TOKEN_TYPES.DOUBLE_COLON,
  });

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, TokenType>> =
  Object.freeze({
    '+': TOKEN_TYPES.PLUS,
    '-': TOKEN_TYPES.MINUS,
    '*': TOKEN_TYPES.STAR,
    '/': TOKEN_TYPES.SLASH,
    '%': TOKEN_TYPES.PERCENT,
    '=': TOKEN_TYPES.ASSIGN,
    '<': TOKEN_TYPES.LT,
    '>': TOKEN_TYPES.GT,
    '!': TOKEN_TYPES.BANG,
    '~': TOKEN_TYPES.TILDE,
    '&': TOKEN_TYPES.AMPERSAND,
    '|': TOKEN_TYPES.PIPE,
    '^': TOKEN_TYPES.CARET,
    '?': TOKEN_TYPES.QUESTION,
    '.': TOKEN_TYPES.DOT,
    ':': TOKEN_TYPES.COLON,
    ',': TOKEN_TYPES.COMMA,
    ';': TOKEN_TYPES.SEMICOLON,
    '@': TOKEN_TYPES.AT,
    '(': TOKEN_TYPES.LPAREN,
    ')': TOKEN_TYPES.RPAREN,
    '{': TOKEN_TYPES.LBRACE,
    '}': TOKEN_TYPES.RBRACE,
    '[': TOKEN_TYPES.LBRACKET,
    ']': TOKEN_TYPES.RBRACKET,
  });

/** Keyword lookup table. `new`, `get`, `set`, `property` and `operator` stay identifiers. */
export const KEYWORDS: Readonly<Record<string, TokenType>> = Object.freeze({
  true: TOKEN_TYPES.TRUE,
  false: TOKEN_TYPES.FALSE,
  null: TOKEN_TYPES.NULL,
  let: TOKEN_TYPES.LET,
  var: TOKEN_TYPES.VAR,
  const: TOKEN_TYPES.CONST,
  mut: TOKEN_TYPES.MUT,
  ref: TOKEN_TYPES.REF,
  fn: TOKEN_TYPES.FN,
  fun: TOKEN_TYPES.FUN,
  async: TOKEN_TYPES.ASYNC,
  await: TOKEN_TYPES.AWAIT,
  spawn: TOKEN_TYPES.SPAWN,
  return: TOKEN_TYPES.RETURN,
  if: TOKEN_TYPES.IF,
  else: TOKEN_TYPES.ELSE,
  match: TOKEN_TYPES.MATCH,
  for: TOKEN_TYPES.FOR,
  in: TOKEN_TYPES.IN,
  while: TOKEN_TYPES.WHILE,
  loop: TOKEN_TYPES.LOOP,
  break: TOKEN_TYPES.BREAK,
  continue: TOKEN_TYPES.CONTINUE,
  try: TOKEN_TYPES.TRY,
  catch: TOKEN_TYPES.CATCH,
  finally: TOKEN_TYPES.FINALLY,
  throw: TOKEN_TYPES.THROW,
  struct: TOKEN_TYPES.STRUCT,
  class: TOKEN_TYPES.CLASS,
  enum: TOKEN_TYPES.ENUM,
  actor: TOKEN_TYPES.ACTOR,
  trait: TOKEN_TYPES.TRAIT,
  interface: TOKEN_TYPES.INTERFACE,
  impl: TOKEN_TYPES.IMPL,
  type: TOKEN_TYPES.TYPE,
  mod: TOKEN_TYPES.MOD,
  module: TOKEN_TYPES.MODULE,
  use: TOKEN_TYPES.USE,
  import: TOKEN_TYPES.IMPORT,
  from: TOKEN_TYPES.FROM,
  export: TOKEN_TYPES.EXPORT,
  where: TOKEN_TYPES.WHERE,
  pub: TOKEN_TYPES.PUB,
  private: TOKEN_TYPES.PRIVATE,
  protected: TOKEN_TYPES.PROTECTED,
  static: TOKEN_TYPES.STATIC,
  override: TOKEN_TYPES.OVERRIDE,
  final: TOKEN_TYPES.FINAL,
  abstract: TOKEN_TYPES.ABSTRACT,
  self: TOKEN_TYPES.SELF,
  super: TOKEN_TYPES.SUPER,
  crate: TOKEN_TYPES.CRATE,
  as: TOKEN_TYPES.AS,
  is: TOKEN_TYPES.IS,
});

export function lookupKeyword(word: string): TokenType | undefined {
  return Object.hasOwn(KEYWORDS, word) ? KEYWORDS[word] : undefined;
}
