/**
 * Tern Parser
 * Main entry point and re-exports
 */

import type { ParseError } from '../error-classes.js';
import type { ParseResult, RootNode } from '../ast-nodes.js';
import { Parser } from './parser.js';
import { resolveParseOptions, type ParseOptions } from './options.js';
import { drainTokens } from './state.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-expr.js';
import './parser-postfix.js';
import './parser-literals.js';
import './parser-paths.js';
import './parser-collections.js';
import './parser-patterns.js';
import './parser-types.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-errors.js';
import './parser-bindings.js';
import './parser-declarations.js';
import './parser-structs.js';
import './parser-actors.js';
import './parser-classes.js';
import './parser-traits.js';
import './parser-modules.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse Tern source code into an AST.
 *
 * Throws the first ParseError or LexerError. Warnings do not throw.
 *
 * @example
 * ```typescript
 * const ast = parse('let x = 1 + 2');
 * const expr = parse('a * b', { context: 'expression' });
 * ```
 */
export function parse(source: string, options?: ParseOptions): RootNode {
  const parser = new Parser(source, resolveParseOptions(options, false));
  const ast = parser.parse();

  const first = parser.errors.find((e) => e.severity === 'error');
  if (first) throw first;
  return ast;
}

/**
 * Parse Tern source code with error recovery for IDE/tooling scenarios.
 *
 * Instead of throwing on the first error, collects diagnostics and returns
 * a partial AST with Error nodes where parsing failed.
 *
 * @example
 * ```typescript
 * const result = parseWithRecovery(source);
 * if (!result.success) {
 *   for (const error of result.errors) console.log(error.message);
 * }
 * ```
 */
export function parseWithRecovery(
  source: string,
  options?: ParseOptions
): ParseResult {
  const parser = new Parser(source, resolveParseOptions(options, true));
  const ast = parser.parse();
  const { state } = parser;
  const errors = [...state.errors];

  return {
    ast,
    errors,
    tokens: [...drainTokens(state)],
    success: errors.every((e) => e.severity !== 'error'),
    incomplete: isIncomplete(errors, source.trimEnd().length),
    syncCount: state.syncCount,
  };
}

/**
 * Errors that more input could fix: unclosed delimiters, unterminated
 * strings and comments, diagnostics at end of input, and an operator
 * left dangling as the last token.
 */
function isIncomplete(errors: readonly ParseError[], end: number): boolean {
  const fatal = errors.filter((e) => e.severity === 'error');
  if (fatal.length === 0) return false;
  return fatal.every(
    (e) =>
      e.kind === 'UnclosedDelimiter' ||
      e.errorId === 'TERN-L001' ||
      e.errorId === 'TERN-L004' ||
      e.span.start.offset >= end ||
      (e.kind === 'ExpectedExpressionAfterOperator' && e.span.end.offset >= end)
  );
}

// ============================================================
// RE-EXPORTS
// ============================================================

export {
  DEFAULT_MAX_ERRORS,
  DEFAULT_MAX_TRIAL_TOKENS,
  MAX_NESTING_DEPTH,
  resolveParseOptions,
  type DiagnosticEvent,
  type ParseCallbacks,
  type ParseContext,
  type ParseOptions,
  type ResolvedParseOptions,
  type SynchronizeEvent,
  type TrialEvent,
  type TrialKind,
} from './options.js';
export { BP, INFIX_TABLE, infixInfo, type InfixInfo, type InfixOp } from './precedence.js';
export { Parser } from './parser.js';
