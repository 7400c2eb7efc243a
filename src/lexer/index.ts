/**
 * Tern Lexer
 * Converts source text into tokens, one at a time
 */

export {
  nextToken,
  numericValue,
  tokenize,
  tokenizeWithRecovery,
  type NumericValue,
  type TokenizeResult,
} from './tokenizer.js';
export { createLexerState, type LexerMode, type LexerState } from './state.js';
export { KEYWORDS } from './operators.js';
