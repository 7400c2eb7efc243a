// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  /** UTF-16 index into the source string */
  readonly offset: number;
}

/** Half-open range: `end` points just past the last character */
export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Zero-width span, used for synthesized tokens */
export function emptySpanAt(location: SourceLocation): SourceSpan {
  return { start: location, end: location };
}

/** True when `inner` lies within `outer` */
export function spanContains(outer: SourceSpan, inner: SourceSpan): boolean {
  return (
    inner.start.offset >= outer.start.offset &&
    inner.end.offset <= outer.end.offset
  );
}
