/**
 * Position of one UTF-16 code unit in a source text.
 */
export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number, counted in UTF-16 code units. */
  column: number;
  /** 0-based offset in the source text. */
  offset: number;
}

/**
 * Half-open range `[start, end)` of a named source text.
 *
 * Positions come straight from the tokenizer, which counts lines as it scans; nothing maps
 * offsets back to lines afterwards.
 */
export interface SourceSpan {
  /** Source name as given by the caller; used only for diagnostics. */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

export const START_OF_INPUT: Readonly<SourcePosition> = { line: 1, column: 1, offset: 0 };

/** Span from the start of one token to the end of another. */
export function spanBetween(
  file: string,
  start: SourcePosition,
  end: SourcePosition,
): SourceSpan {
  return { file, start: { ...start }, end: { ...end } };
}

