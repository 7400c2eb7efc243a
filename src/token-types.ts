import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INTEGER: 'INTEGER',
  FLOAT: 'FLOAT',
  STRING: 'STRING',
  RAW_STRING: 'RAW_STRING',
  BYTE_STRING: 'BYTE_STRING',
  CHAR: 'CHAR',
  BYTE: 'BYTE',

  // Interpolated strings: f"a {b} c {d:.2}"
  STRING_BEGIN: 'STRING_BEGIN', // f"
  STRING_FRAGMENT: 'STRING_FRAGMENT',
  INTERP_OPEN: 'INTERP_OPEN', // {
  FORMAT_SPEC: 'FORMAT_SPEC', // :.2
  INTERP_CLOSE: 'INTERP_CLOSE', // }
  STRING_END: 'STRING_END', // closing "

  // Names
  IDENTIFIER: 'IDENTIFIER',
  LABEL: 'LABEL', // 'outer
  UNDERSCORE: 'UNDERSCORE', // _

  // Keywords: literals
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  NULL: 'NULL',

  // Keywords: bindings
  LET: 'LET',
  VAR: 'VAR',
  CONST: 'CONST',
  MUT: 'MUT',
  REF: 'REF',

  // Keywords: functions
  FN: 'FN',
  FUN: 'FUN',
  ASYNC: 'ASYNC',
  AWAIT: 'AWAIT',
  SPAWN: 'SPAWN',
  RETURN: 'RETURN',

  // Keywords: control flow
  IF: 'IF',
  ELSE: 'ELSE',
  MATCH: 'MATCH',
  FOR: 'FOR',
  IN: 'IN',
  WHILE: 'WHILE',
  LOOP: 'LOOP',
  BREAK: 'BREAK',
  CONTINUE: 'CONTINUE',

  // Keywords: error handling
  TRY: 'TRY',
  CATCH: 'CATCH',
  FINALLY: 'FINALLY',
  THROW: 'THROW',

  // Keywords: declarations
  STRUCT: 'STRUCT',
  CLASS: 'CLASS',
  ENUM: 'ENUM',
  ACTOR: 'ACTOR',
  TRAIT: 'TRAIT',
  INTERFACE: 'INTERFACE',
  IMPL: 'IMPL',
  TYPE: 'TYPE',
  MOD: 'MOD',
  MODULE: 'MODULE',
  USE: 'USE',
  IMPORT: 'IMPORT',
  FROM: 'FROM',
  EXPORT: 'EXPORT',
  WHERE: 'WHERE',

  // Keywords: modifiers
  PUB: 'PUB',
  PRIVATE: 'PRIVATE',
  PROTECTED: 'PROTECTED',
  STATIC: 'STATIC',
  OVERRIDE: 'OVERRIDE',
  FINAL: 'FINAL',
  ABSTRACT: 'ABSTRACT',

  // Keywords: paths and operators
  SELF: 'SELF',
  SUPER: 'SUPER',
  CRATE: 'CRATE',
  AS: 'AS',
  IS: 'IS',

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %
  POWER: 'POWER', // **

  // Comparison operators
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  LT: 'LT', // <
  GT: 'GT', // >
  LE: 'LE', // <=
  GE: 'GE', // >=

  // Logical and bitwise operators
  AND: 'AND', // &&
  OR: 'OR', // ||
  BANG: 'BANG', // !
  TILDE: 'TILDE', // ~
  AMPERSAND: 'AMPERSAND', // &
  PIPE: 'PIPE', // |
  CARET: 'CARET', // ^
  SHL: 'SHL', // <<
  SHR: 'SHR', // >>

  // Assignment
  ASSIGN: 'ASSIGN', // =
  PLUS_ASSIGN: 'PLUS_ASSIGN', // +=
  MINUS_ASSIGN: 'MINUS_ASSIGN', // -=
  STAR_ASSIGN: 'STAR_ASSIGN', // *=
  SLASH_ASSIGN: 'SLASH_ASSIGN', // /=
  PERCENT_ASSIGN: 'PERCENT_ASSIGN', // %=
  POWER_ASSIGN: 'POWER_ASSIGN', // **=
  AMP_ASSIGN: 'AMP_ASSIGN', // &=
  PIPE_ASSIGN: 'PIPE_ASSIGN', // |=
  CARET_ASSIGN: 'CARET_ASSIGN', // ^=
  SHL_ASSIGN: 'SHL_ASSIGN', // <<=
  SHR_ASSIGN: 'SHR_ASSIGN', // >>=

  // Flow operators
  PIPELINE: 'PIPELINE', // |>
  NULL_COALESCE: 'NULL_COALESCE', // ??
  QUESTION: 'QUESTION', // ?
  SAFE_NAV: 'SAFE_NAV', // ?.

  // Punctuation
  DOT: 'DOT', // .
  DOT_DOT: 'DOT_DOT', // ..
  DOT_DOT_EQ: 'DOT_DOT_EQ', // ..=
  ELLIPSIS: 'ELLIPSIS', // ...
  ARROW: 'ARROW', // ->
  FAT_ARROW: 'FAT_ARROW', // =>
  COLON: 'COLON', // :
  DOUBLE_COLON: 'DOUBLE_COLON', // ::
  COMMA: 'COMMA', // ,
  SEMICOLON: 'SEMICOLON', // ;
  AT: 'AT', // @ (decorators, bindings)
  HASH: 'HASH', // # (attribute prefix)

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]

  // Comments (kept in the token stream, skipped by the parser)
  LINE_COMMENT: 'LINE_COMMENT', // //
  DOC_COMMENT: 'DOC_COMMENT', // ///
  HASH_COMMENT: 'HASH_COMMENT', // #
  BLOCK_COMMENT: 'BLOCK_COMMENT', // /* */

  // Special
  EOF: 'EOF',
  ERROR: 'ERROR', // text the lexer rejected; the value is its diagnostic
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
  /** Numeric type suffix (`i32`, `f64`, ...) captured with the literal */
  readonly suffix?: string | undefined;
}

const COMMENT_TYPES: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.LINE_COMMENT,
  TOKEN_TYPES.DOC_COMMENT,
  TOKEN_TYPES.HASH_COMMENT,
  TOKEN_TYPES.BLOCK_COMMENT,
]);

export function isCommentToken(token: Token): boolean {
  return COMMENT_TYPES.has(token.type);
}
