/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse';

/** Error severity level */
export type ErrorSeverity = 'error' | 'warning';

/** Diagnostic kinds reported by the lexer and parser */
export type ParseErrorKind =
  | 'LexError'
  | 'UnexpectedToken'
  | 'UnclosedDelimiter'
  | 'ExpectedExpressionAfterOperator'
  | 'InvalidPatternToken'
  | 'AmbiguityResolutionFailure'
  | 'DanglingTry'
  | 'NestingTooDeep';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TERN-{category}{3-digit} (e.g., TERN-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly kind: ParseErrorKind;
  /** Severity level (defaults to 'error' when omitted) */
  readonly severity?: ErrorSeverity | undefined;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, Object.freeze(def));
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (TERN-L0xx)
  {
    errorId: 'TERN-L001',
    category: 'lexer',
    kind: 'LexError',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a quote but never closed before end of input.',
    resolution: 'Add the closing quote.',
    examples: [{ description: 'Missing closing quote', code: '"hello' }],
  },
  {
    errorId: 'TERN-L002',
    category: 'lexer',
    kind: 'LexError',
    description: 'Invalid character',
    messageTemplate: 'Unexpected character: {char}',
    cause: 'Character is not part of Tern syntax.',
    resolution:
      'Remove or replace the character. Backticks and stray unicode symbols are common causes.',
    examples: [{ description: 'Backtick string', code: '`hello`' }],
  },
  {
    errorId: 'TERN-L003',
    category: 'lexer',
    kind: 'LexError',
    description: 'Malformed numeric literal',
    messageTemplate: 'Malformed numeric literal: {value}',
    cause:
      'Number has an empty radix body, an exponent without digits, a digit outside its radix, or an unknown type suffix.',
    resolution:
      'Use forms like 42, 1_000, 0xff, 0b1010, 1.5e-3, 42i64 or 2.0f32.',
    examples: [
      { description: 'Exponent without digits', code: '1e' },
      { description: 'Unknown suffix', code: '12abc' },
    ],
  },
  {
    errorId: 'TERN-L004',
    category: 'lexer',
    kind: 'LexError',
    description: 'Unterminated block comment',
    messageTemplate: 'Unterminated block comment',
    cause: 'Block comment opened with /* but never closed.',
    resolution: 'Add */ to close the comment. Block comments do not nest.',
    examples: [{ description: 'Missing close', code: '/* note' }],
  },
  {
    errorId: 'TERN-L005',
    category: 'lexer',
    kind: 'LexError',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence: \\{sequence}',
    cause: 'Backslash followed by an unsupported character.',
    resolution:
      'Use \\n, \\r, \\t, \\0, \\\\, \\", \\\', \\{, \\} or \\u{XXXX}. Raw strings (r"...") take no escapes.',
    examples: [{ description: 'Unknown escape', code: '"a\\qb"' }],
  },
  {
    errorId: 'TERN-L006',
    category: 'lexer',
    kind: 'LexError',
    description: 'Malformed character literal',
    messageTemplate: 'Malformed character literal',
    cause: 'Character literal not closed right after one character.',
    resolution: "Write a single character between quotes, e.g. 'a'. Use a string for more.",
    examples: [
      { description: 'Missing quote', code: "'1" },
      { description: 'Two characters', code: "'ab'" },
    ],
  },

  // Parse Errors (TERN-P0xx)
  {
    errorId: 'TERN-P001',
    category: 'parse',
    kind: 'UnexpectedToken',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected token: {found}',
    cause: 'No grammar rule accepts the token at this position.',
    resolution: 'Check for a missing operator, separator or keyword.',
    examples: [{ description: 'Stray operator', code: 'let x = * 2' }],
  },
  {
    errorId: 'TERN-P002',
    category: 'parse',
    kind: 'UnclosedDelimiter',
    description: 'Unclosed delimiter',
    messageTemplate: "Unclosed delimiter '{open}': expected '{close}'",
    cause: 'A bracket, parenthesis or brace was never matched.',
    resolution: 'Add the matching closing delimiter.',
    examples: [{ description: 'Missing brace', code: 'fn f() { 1' }],
  },
  {
    errorId: 'TERN-P003',
    category: 'parse',
    kind: 'ExpectedExpressionAfterOperator',
    description: 'Missing right-hand operand',
    messageTemplate: "Expected expression after '{operator}'",
    cause: 'A binary operator is not followed by an operand.',
    resolution: 'Add the right-hand operand or remove the operator.',
    examples: [{ description: 'Dangling plus', code: '1 +' }],
  },
  {
    errorId: 'TERN-P004',
    category: 'parse',
    kind: 'InvalidPatternToken',
    description: 'Invalid pattern',
    messageTemplate: 'Expected pattern, found {found}',
    cause: 'The token cannot begin any pattern.',
    resolution:
      'Patterns are bindings, _, literals, ranges, tuples, lists, structs, variants or | alternatives.',
    examples: [{ description: 'Operator as pattern', code: 'let + = 1' }],
  },
  {
    errorId: 'TERN-P005',
    category: 'parse',
    kind: 'DanglingTry',
    description: 'Try without catch or finally',
    messageTemplate: "'try' block requires at least one 'catch' or 'finally'",
    cause: 'A try block was not followed by any handler.',
    resolution: 'Add a catch clause, a finally block, or remove the try.',
    examples: [{ description: 'Bare try', code: 'try { risky() }' }],
  },
  {
    errorId: 'TERN-P006',
    category: 'parse',
    kind: 'AmbiguityResolutionFailure',
    severity: 'warning',
    description: 'Generic arguments could not be resolved',
    messageTemplate:
      "Could not resolve '<' after '{name}' within {limit} tokens; treated as comparison",
    cause:
      'A type-argument trial exceeded its token budget before closing with >.',
    resolution: 'Use turbofish syntax (name::<T>) or parenthesize the comparison.',
    examples: [{ description: 'Long ambiguous run', code: 'a < b < c' }],
  },
  {
    errorId: 'TERN-P007',
    category: 'parse',
    kind: 'UnexpectedToken',
    description: 'Expected token',
    messageTemplate: '{expected}, found {found}',
    cause: 'A specific token was required here.',
    resolution: 'Insert the expected token.',
    examples: [{ description: 'Missing =>', code: 'match x { 1 2 }' }],
  },
  {
    errorId: 'TERN-P008',
    category: 'parse',
    kind: 'NestingTooDeep',
    description: 'Nesting too deep',
    messageTemplate: 'Nesting exceeds {limit} levels',
    cause: 'Expressions, patterns or types nested past the parser depth limit.',
    resolution: 'Split the construct with intermediate bindings.',
    examples: [{ description: 'Deep parentheses', code: '((((((1))))))' }],
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// MESSAGE RENDERING
// ============================================================

/**
 * Replace {placeholder} segments with context values.
 * Missing values render as empty strings; an unclosed brace returns the
 * template unchanged.
 *
 * @example
 * renderMessage('Unexpected token: {found}', { found: "'}'" })
 * // "Unexpected token: '}'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
