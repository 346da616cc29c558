// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * A position in the input text.
 * `line` and `column` are 1-based; `column` counts characters (code points).
 * `offset` is the 0-based UTF-8 byte offset.
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}
