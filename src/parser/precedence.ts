/**
 * Operator Precedence Table
 * Binding powers for the precedence-climbing expression parser.
 */

import type { AssignOp, BinaryOp } from '../ast-nodes.js';
import { TOKEN_TYPES, type TokenType } from '../token-types.js';

export type Associativity = 'left' | 'right';

/** What an infix token builds */
export type InfixOp =
  | { readonly kind: 'binary'; readonly op: BinaryOp }
  | { readonly kind: 'assign'; readonly op: AssignOp }
  | { readonly kind: 'range'; readonly inclusive: boolean }
  | { readonly kind: 'cast' };

export interface InfixInfo {
  readonly operator: InfixOp;
  /** Left binding power: the operator applies when lbp >= minBp */
  readonly lbp: number;
  /** Binding power the right operand is parsed with */
  readonly rbp: number;
  readonly assoc: Associativity;
}

/** Lowest to highest. Unary prefix and postfix operators bind tighter than all of these. */
export const BP = Object.freeze({
  ASSIGN: 1,
  PIPELINE: 2,
  SEND: 3,
  NULL_COALESCE: 4,
  RANGE: 5,
  OR: 6,
  AND: 7,
  MEMBERSHIP: 8,
  EQUALITY: 9,
  RELATIONAL: 10,
  BIT_OR: 11,
  BIT_XOR: 12,
  BIT_AND: 13,
  SHIFT: 14,
  ADDITIVE: 15,
  MULTIPLICATIVE: 16,
  CAST: 17,
  POWER: 18,
});

function entry(
  operator: InfixOp,
  lbp: number,
  assoc: Associativity = 'left'
): InfixInfo {
  return Object.freeze({
    operator,
    lbp,
    rbp: assoc === 'left' ? lbp + 1 : lbp,
    assoc,
  });
}

const binary = (op: BinaryOp): InfixOp => ({ kind: 'binary', op });
const assign = (op: AssignOp): InfixOp => ({ kind: 'assign', op });

export const INFIX_TABLE: Readonly<Partial<Record<TokenType, InfixInfo>>> =
  Object.freeze({
    [TOKEN_TYPES.ASSIGN]: entry(assign('='), BP.ASSIGN, 'right'),
    [TOKEN_TYPES.PLUS_ASSIGN]: entry(assign('+='), BP.ASSIGN, 'right'),
    [TOKEN_TYPES.MINUS_ASSIGN]: entry(assign('-='), BP.ASSIGN, 'right'),
    [TOKEN_TYPES.STAR_ASSIGN]: entry(assign('*='), BP.ASSIGN, 'right'),
    [TOKEN_TYPES.SLASH_ASSIGN]: entry(assign('/='), BP.ASSIGN, 'right'),
    [TOKEN_TYPES.PERCENT_ASSIGN]: entry(assign('%='), BP.ASSIGN, 'right'),
    [TOKEN_TYPES.POWER_ASSIGN]: entry(assign('**='), BP.ASSIGN, 'right'),
    [TOKEN_TYPES.AMP_ASSIGN]: entry(assign('&='), BP.ASSIGN, 'right'),
    [TOKEN_TYPES.PIPE_ASSIGN]: entry(assign('|='), BP.ASSIGN, 'right'),
    [TOKEN_TYPES.CARET_ASSIGN]: entry(assign('^='), BP.ASSIGN, 'right'),
    [TOKEN_TYPES.SHL_ASSIGN]: entry(assign('<<='), BP.ASSIGN, 'right'),
    [TOKEN_TYPES.SHR_ASSIGN]: entry(assign('>>='), BP.ASSIGN, 'right'),

    [TOKEN_TYPES.PIPELINE]: entry(binary('|>'), BP.PIPELINE),
    [TOKEN_TYPES.BANG]: entry(binary('!'), BP.SEND),
    [TOKEN_TYPES.NULL_COALESCE]: entry(binary('??'), BP.NULL_COALESCE, 'right'),

    [TOKEN_TYPES.DOT_DOT]: entry({ kind: 'range', inclusive: false }, BP.RANGE),
    [TOKEN_TYPES.DOT_DOT_EQ]: entry({ kind: 'range', inclusive: true }, BP.RANGE),

    [TOKEN_TYPES.OR]: entry(binary('||'), BP.OR),
    [TOKEN_TYPES.AND]: entry(binary('&&'), BP.AND),

    [TOKEN_TYPES.IN]: entry(binary('in'), BP.MEMBERSHIP),
    [TOKEN_TYPES.IS]: entry(binary('is'), BP.MEMBERSHIP),

    [TOKEN_TYPES.EQ]: entry(binary('=='), BP.EQUALITY),
    [TOKEN_TYPES.NE]: entry(binary('!='), BP.EQUALITY),

    [TOKEN_TYPES.LT]: entry(binary('<'), BP.RELATIONAL),
    [TOKEN_TYPES.GT]: entry(binary('>'), BP.RELATIONAL),
    [TOKEN_TYPES.LE]: entry(binary('<='), BP.RELATIONAL),
    [TOKEN_TYPES.GE]: entry(binary('>='), BP.RELATIONAL),

    [TOKEN_TYPES.PIPE]: entry(binary('|'), BP.BIT_OR),
    [TOKEN_TYPES.CARET]: entry(binary('^'), BP.BIT_XOR),
    [TOKEN_TYPES.AMPERSAND]: entry(binary('&'), BP.BIT_AND),

    [TOKEN_TYPES.SHL]: entry(binary('<<'), BP.SHIFT),
    [TOKEN_TYPES.SHR]: entry(binary('>>'), BP.SHIFT),

    [TOKEN_TYPES.PLUS]: entry(binary('+'), BP.ADDITIVE),
    [TOKEN_TYPES.MINUS]: entry(binary('-'), BP.ADDITIVE),

    [TOKEN_TYPES.STAR]: entry(binary('*'), BP.MULTIPLICATIVE),
    [TOKEN_TYPES.SLASH]: entry(binary('/'), BP.MULTIPLICATIVE),
    [TOKEN_TYPES.PERCENT]: entry(binary('%'), BP.MULTIPLICATIVE),

    [TOKEN_TYPES.AS]: entry({ kind: 'cast' }, BP.CAST),

    [TOKEN_TYPES.POWER]: entry(binary('**'), BP.POWER, 'right'),
  });

export function infixInfo(type: TokenType): InfixInfo | undefined {
  return INFIX_TABLE[type];
}
