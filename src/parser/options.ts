/**
 * Parse Options
 * Public configuration for parse calls, with validation and defaults.
 */

import type { ParseError } from '../error-classes.js';
import type { Token } from '../token-types.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Emitted for every recorded diagnostic */
export interface DiagnosticEvent {
  error: ParseError;
  /** Diagnostics recorded so far, including this one */
  count: number;
}

/** Emitted after each resynchronization */
export interface SynchronizeEvent {
  /** Tokens discarded to reach the sync point */
  skipped: number;
  /** Token the parser resumed at */
  resumeAt: Token;
  /** `statement` or `member` recovery */
  level: 'statement' | 'member';
}

/** Ambiguity trials run by the parser */
export type TrialKind = 'generic-args' | 'arrow-lambda';

/** Emitted after each disambiguation trial */
export interface TrialEvent {
  kind: TrialKind;
  success: boolean;
  /** Tokens consumed by the trial before it succeeded or gave up */
  tokens: number;
  /** The trial ran out of budget (see maxTrialTokens) */
  exhausted: boolean;
}

/** Observability callbacks for monitoring a parse */
export interface ParseCallbacks {
  /** Called when a diagnostic is recorded */
  onDiagnostic?: (event: DiagnosticEvent) => void;
  /** Called when the parser resynchronizes after an error */
  onSynchronize?: (event: SynchronizeEvent) => void;
  /** Called when a disambiguation trial finishes */
  onTrial?: (event: TrialEvent) => void;
}

// ============================================================
// OPTIONS
// ============================================================

/**
 * Entry production:
 * - module: a sequence of items (Program)
 * - repl: exactly one statement (Program with one item)
 * - expression: a single expression (ExpressionRoot)
 */
export type ParseContext = 'module' | 'repl' | 'expression';

export interface ParseOptions {
  context?: ParseContext | undefined;
  /** Collect diagnostics instead of throwing the first one */
  recoveryMode?: boolean | undefined;
  /** Stop after this many diagnostics */
  maxErrors?: number | undefined;
  /** Token budget for one generic-argument or lambda trial */
  maxTrialTokens?: number | undefined;
  observability?: ParseCallbacks | undefined;
}

export interface ResolvedParseOptions {
  readonly context: ParseContext;
  readonly recoveryMode: boolean;
  readonly maxErrors: number;
  readonly maxTrialTokens: number;
  readonly observability: ParseCallbacks;
}

export const DEFAULT_MAX_ERRORS = 100;
export const DEFAULT_MAX_TRIAL_TOKENS = 64;
/** Expression, pattern and type nesting beyond this reports TERN-P008 */
export const MAX_NESTING_DEPTH = 256;

const CONTEXTS: readonly ParseContext[] = ['module', 'repl', 'expression'];
const CALLBACK_NAMES = ['onDiagnostic', 'onSynchronize', 'onTrial'] as const;

function isParseContext(value: unknown): value is ParseContext {
  return CONTEXTS.some((c) => c === value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Fill in defaults and validate.
 * Throws TypeError if an option has the wrong shape.
 */
export function resolveParseOptions(
  options: ParseOptions = {},
  defaultRecovery = false
): ResolvedParseOptions {
  const context = options.context ?? 'module';
  if (!isParseContext(context)) {
    throw new TypeError(
      `Invalid parse options: context "${String(context)}" must be one of ${CONTEXTS.join(', ')}`
    );
  }

  const recoveryMode = options.recoveryMode ?? defaultRecovery;
  if (typeof recoveryMode !== 'boolean') {
    throw new TypeError('Invalid parse options: recoveryMode must be a boolean');
  }

  const maxErrors = options.maxErrors ?? DEFAULT_MAX_ERRORS;
  if (!isPositiveInteger(maxErrors)) {
    throw new TypeError(
      `Invalid parse options: maxErrors must be a positive integer, got ${String(maxErrors)}`
    );
  }

  const maxTrialTokens = options.maxTrialTokens ?? DEFAULT_MAX_TRIAL_TOKENS;
  if (!isPositiveInteger(maxTrialTokens)) {
    throw new TypeError(
      `Invalid parse options: maxTrialTokens must be a positive integer, got ${String(maxTrialTokens)}`
    );
  }

  const observability = options.observability ?? {};
  if (typeof observability !== 'object' || observability === null) {
    throw new TypeError('Invalid parse options: observability must be an object');
  }
  for (const name of CALLBACK_NAMES) {
    const callback: unknown = observability[name];
    if (callback !== undefined && typeof callback !== 'function') {
      throw new TypeError(
        `Invalid parse options: observability.${name} must be a function`
      );
    }
  }

  return { context, recoveryMode, maxErrors, maxTrialTokens, observability };
}
