/**
 * Diagnostic Enrichment
 * Source snippets, rendered diagnostics and name suggestions
 */

import type { LexerError, ParseError } from './error-classes.js';
import type { SourceSpan } from './source-location.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface SourceSnippet {
  readonly lines: SnippetLine[];
  readonly highlightSpan: SourceSpan;
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface FormatOptions {
  /** Lines shown before and after the error line (default: 0) */
  contextLines?: number | undefined;
}

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

/**
 * Extract source lines around an error span.
 *
 * @param contextLines - Lines of context before and after (default: 2)
 * @throws {RangeError} When span exceeds source bounds
 */
export function extractSnippet(
  source: string,
  span: SourceSpan,
  contextLines: number = 2
): SourceSnippet {
  if (source === '') {
    return { lines: [], highlightSpan: span };
  }

  const lines = source.split('\n');
  const totalLines = lines.length;

  if (span.start.line < 1 || span.start.line > totalLines) {
    throw new RangeError('Span exceeds source bounds');
  }
  if (span.end.line < 1 || span.end.line > totalLines) {
    throw new RangeError('Span exceeds source bounds');
  }

  const errorStartLine = span.start.line;
  const errorEndLine = span.end.line;
  const firstLine = Math.max(1, errorStartLine - contextLines);
  const lastLine = Math.min(totalLines, errorEndLine + contextLines);

  const snippetLines: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    snippetLines.push({
      lineNumber: lineNum,
      content: (lines[lineNum - 1] ?? '').replace(/\r$/, ''),
      isErrorLine: lineNum >= errorStartLine && lineNum <= errorEndLine,
    });
  }

  return { lines: snippetLines, highlightSpan: span };
}

// ============================================================
// DIAGNOSTIC RENDERING
// ============================================================

/**
 * Render a diagnostic with its source line and a caret underline:
 *
 * ```text
 * error[TERN-P002]: Unclosed delimiter '{': expected '}'
 *  --> 1:14
 * 1 | fn add(x, y) { x + y
 *   |              ^
 * ```
 */
export function formatDiagnostic(
  source: string,
  error: ParseError | LexerError,
  options: FormatOptions = {}
): string {
  const severity = 'severity' in error ? error.severity : 'error';
  const { span } = error;
  const header = `${severity}[${error.errorId}]: ${error.toData().message}`;
  const location = ` --> ${span.start.line}:${span.start.column}`;

  let snippet: SourceSnippet;
  try {
    snippet = extractSnippet(source, span, options.contextLines ?? 0);
  } catch (err) {
    if (err instanceof RangeError) return `${header}\n${location}`;
    throw err;
  }

  const last = snippet.lines[snippet.lines.length - 1];
  const width = String(last?.lineNumber ?? 1).length;
  const gutter = ' '.repeat(width);
  const out = [header, location];

  for (const line of snippet.lines) {
    out.push(`${String(line.lineNumber).padStart(width)} | ${line.content}`);
    if (line.lineNumber !== span.start.line) continue;

    const chars = [...line.content];
    const startCol = span.start.column;
    const endCol =
      span.end.line === span.start.line ? span.end.column : chars.length + 1;
    const length = Math.max(1, endCol - startCol);
    out.push(`${gutter} | ${' '.repeat(startCol - 1)}${'^'.repeat(length)}`);
  }

  return out.join('\n');
}

// ============================================================
// NAME SUGGESTION
// ============================================================

/**
 * Find similar names using fuzzy matching.
 * Edit distance <= 2, at most 3 results, sorted by distance then name.
 */
export function suggestSimilarNames(
  target: string,
  candidates: readonly string[]
): string[] {
  if (target === '' || candidates.length === 0) {
    return [];
  }

  const candidatesWithDistance = candidates
    .map((candidate) => ({
      name: candidate,
      distance: levenshteinDistance(target, candidate),
    }))
    .filter((item) => item.distance <= 2 && item.name !== target);

  candidatesWithDistance.sort((a, b) => {
    if (a.distance !== b.distance) {
      return a.distance - b.distance;
    }
    return a.name.localeCompare(b.name);
  });

  return candidatesWithDistance.slice(0, 3).map((item) => item.name);
}

/** Levenshtein distance with a single rolling row */
function levenshteinDistance(a: string, b: string): number {
  if (a.length > b.length) {
    [a, b] = [b, a];
  }

  const m = a.length;
  const n = b.length;
  if (m === 0) return n;

  let prevRow = Array.from({ length: m + 1 }, (_, i) => i);
  let currRow = new Array<number>(m + 1).fill(0);

  for (let j = 1; j <= n; j++) {
    currRow[0] = j;
    for (let i = 1; i <= m; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        (prevRow[i] ?? 0) + 1,
        (currRow[i - 1] ?? 0) + 1,
        (prevRow[i - 1] ?? 0) + cost
      );
    }
    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[m] ?? 0;
}
