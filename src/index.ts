/**
 * Tern Syntax
 * Exports lexer, parser, AST types and diagnostics
 */

// ============================================================
// LEXER
// ============================================================
export {
  createLexerState,
  KEYWORDS,
  nextToken,
  numericValue,
  tokenize,
  tokenizeWithRecovery,
  type LexerMode,
  type LexerState,
  type NumericValue,
  type TokenizeResult,
} from './lexer/index.js';

// ============================================================
// PARSER
// ============================================================
export {
  BP,
  DEFAULT_MAX_ERRORS,
  DEFAULT_MAX_TRIAL_TOKENS,
  MAX_NESTING_DEPTH,
  infixInfo,
  INFIX_TABLE,
  parse,
  parseWithRecovery,
  resolveParseOptions,
  type DiagnosticEvent,
  type InfixInfo,
  type InfixOp,
  type ParseCallbacks,
  type ParseContext,
  type ParseOptions,
  type ResolvedParseOptions,
  type SynchronizeEvent,
  type TrialEvent,
  type TrialKind,
} from './parser/index.js';

// ============================================================
// AST
// ============================================================
export type * from './ast-nodes.js';
export { childNodes, visitNode, type NodeVisitor } from './ast/visitor.js';
export { buildNodeIndex, type NodeIndex } from './ast/node-index.js';

// ============================================================
// TOKENS AND LOCATIONS
// ============================================================
export { isCommentToken, TOKEN_TYPES, type Token, type TokenType } from './token-types.js';
export {
  spanContains,
  type SourceLocation,
  type SourceSpan,
} from './source-location.js';

// ============================================================
// ERRORS
// ============================================================
export {
  createError,
  createLexerError,
  LexerError,
  ParseError,
  TernError,
  type RecoveryMarker,
  type TernErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  type ErrorSeverity,
  type ParseErrorKind,
} from './error-registry.js';
export {
  extractSnippet,
  formatDiagnostic,
  suggestSimilarNames,
  type FormatOptions,
  type SnippetLine,
  type SourceSnippet,
} from './diagnostics.js';
