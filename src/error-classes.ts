/**
 * Tern Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation, SourceSpan } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorSeverity,
  type ParseErrorKind,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TernErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/** How the parser continued after reporting a diagnostic */
export type RecoveryMarker =
  | 'synchronized'
  | 'synthesized'
  | 'fallback'
  | 'skipped'
  | 'none';

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Tern errors.
 * Provides structured data for host applications to format as needed.
 */
export class TernError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TernErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }

    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'TernError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TernErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TernErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/**
 * Lexical error. The lexer has always consumed at least one code point
 * before throwing, so tokenization can resume at the next call.
 */
export class LexerError extends TernError {
  override readonly location: SourceLocation;
  readonly span: SourceSpan;

  constructor(
    errorId: string,
    message: string,
    span: SourceSpan,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({ errorId, message, location: span.start, context });
    this.name = 'LexerError';
    this.location = span.start;
    this.span = span;
  }
}

/** A diagnostic produced while parsing (lexer errors are converted to this) */
export class ParseError extends TernError {
  override readonly location: SourceLocation;
  readonly span: SourceSpan;
  readonly kind: ParseErrorKind;
  readonly severity: ErrorSeverity;
  recovery: RecoveryMarker;

  constructor(
    errorId: string,
    message: string,
    span: SourceSpan,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    super({ errorId, message, location: span.start, context });
    this.name = 'ParseError';
    this.location = span.start;
    this.span = span;
    this.kind = definition.kind;
    this.severity = definition.severity ?? 'error';
    this.recovery = 'none';
  }

  /** Message without the trailing location suffix */
  get text(): string {
    return this.toData().message;
  }

  static fromLexerError(err: LexerError): ParseError {
    const converted = new ParseError(
      err.errorId,
      err.toData().message,
      err.span,
      err.context
    );
    converted.recovery = 'skipped';
    return converted;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create a ParseError from the registry, rendering its message template.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * createError('TERN-P003', { operator: '+' }, span)
 * // ParseError: "Expected expression after '+' at 1:3"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  span: SourceSpan
): ParseError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  const message = renderMessage(definition.messageTemplate, context);
  return new ParseError(errorId, message, span, context);
}

/** Create a LexerError from the registry */
export function createLexerError(
  errorId: string,
  context: Record<string, unknown>,
  span: SourceSpan
): LexerError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  const message = renderMessage(definition.messageTemplate, context);
  return new LexerError(errorId, message, span, context);
}
