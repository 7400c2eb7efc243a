/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ParseError } from '../error-classes.js';
import type { RootNode } from '../ast-nodes.js';
import type { ResolvedParseOptions } from './options.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser that pulls tokens from the lexer on demand and builds an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, statements, recovery
 * - parser-expr.ts: Precedence climbing, unary operators, primary dispatch
 * - parser-postfix.ts: Calls, field access, indexing, `?`, `.await`
 * - parser-literals.ts: Literals and interpolated strings
 * - parser-paths.ts: Paths, generic arguments, struct literals, macros
 * - parser-collections.ts: Groups, tuples, lists, comprehensions
 * - parser-patterns.ts: Patterns
 * - parser-types.ts: Type expressions
 * - parser-control.ts: Blocks, if, match, loops, jumps
 * - parser-functions.ts: Functions, parameters, closures, async
 * - parser-errors.ts: try/catch/finally, throw
 * - parser-bindings.ts: let/var/const
 * - parser-declarations.ts: Shared declaration fragments
 * - parser-structs.ts: Structs and enums
 * - parser-actors.ts: Actors and message handlers
 * - parser-classes.ts: Classes
 * - parser-traits.ts: Traits and impls
 * - parser-modules.ts: Modules, use/import, export, type aliases
 *
 * @example
 * ```typescript
 * const parser = new Parser('let x = 1', resolveParseOptions());
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Cursor, diagnostics and restrictions for this parse */
  state: ParserState;

  constructor(source: string, options: ResolvedParseOptions) {
    this.state = createParserState(source, options);
  }

  /**
   * Parse the source with the configured start context.
   */
  parse(): RootNode {
    return this.parseRoot();
  }

  /**
   * Get collected errors (for recovery mode).
   */
  get errors(): ParseError[] {
    return this.state.errors;
  }
}
