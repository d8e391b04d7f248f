/**
 * Location in source text.
 *
 * Offsets count Unicode code points (not UTF-16 units, not bytes);
 * lines and columns are 0-based.
 */
export interface Position {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export const START_POSITION: Position = { offset: 0, line: 0, column: 0 };

/**
 * Position reached after consuming `text` from `position`.
 * A newline moves to column 0 of the next line; anything else moves one column right.
 */
export function advancePosition(position: Position, text: string): Position {
  let { offset, line, column } = position;
  for (const char of text) {
    offset++;
    if (char === '\n') {
      line++;
      column = 0;
    } else {
      column++;
    }
  }
  return { offset, line, column };
}

/**
 * Format a position for messages (1-based line and column, as editors show them)
 */
export function formatPosition(position: Position): string {
  return `line ${position.line + 1}, column ${position.column + 1}`;
}
