// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Location of a token's first character plus the indentation of its line */
export interface Position extends SourceLocation {
  /** Leading spaces on the token's line */
  readonly indentNum: number;
  /** Depth of indentNum among the indentations currently open */
  readonly indentLevel: number;
}

export function formatLocation(location: SourceLocation): string {
  return `[${location.line}:${location.column}]`;
}
