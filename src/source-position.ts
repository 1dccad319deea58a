/** Location of a token in the text it was read from. Lines and columns start at 1. */
export interface SourcePosition {
  readonly line: number;
  readonly col: number;
  /** Zero-based offset in UTF-16 code units. */
  readonly offset: number;
}

export function formatPosition(position: SourcePosition): string {
  return `${position.line}:${position.col}`;
}
