/**
 * Token types for the LaTeX lexer
 *
 * Construct delimiters open and close nestable regions; atoms are leaves.
 */

export const TokenType = {
  // Constructs
  ENV_BEGIN: 'ENV_BEGIN', // \begin{NAME}
  ENV_END: 'ENV_END', // \end{NAME}
  DMATH_BEGIN: 'DMATH_BEGIN', // \[
  DMATH_END: 'DMATH_END', // \]
  TMATH_BEGIN: 'TMATH_BEGIN', // \(
  TMATH_END: 'TMATH_END', // \)
  GROUP_BEGIN: 'GROUP_BEGIN', // {
  GROUP_END: 'GROUP_END', // }
  DOLLAR_DOLLAR: 'DOLLAR_DOLLAR', // $$ (opens and closes)
  DOLLAR: 'DOLLAR', // $ (opens and closes)

  // Atoms
  COMMAND: 'COMMAND', // \name or \ followed by one character
  COMMENT: 'COMMENT', // % up to and including the newline
  TEXT: 'TEXT', // run of characters other than \ { } $ %
  VERBATIM: 'VERBATIM', // captured body of a verbatim environment

  // End of input
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

export type OpeningTokenType =
  | typeof TokenType.ENV_BEGIN
  | typeof TokenType.DMATH_BEGIN
  | typeof TokenType.TMATH_BEGIN
  | typeof TokenType.GROUP_BEGIN
  | typeof TokenType.DOLLAR_DOLLAR
  | typeof TokenType.DOLLAR;

export type ClosingTokenType =
  | typeof TokenType.ENV_END
  | typeof TokenType.DMATH_END
  | typeof TokenType.TMATH_END
  | typeof TokenType.GROUP_END
  | typeof TokenType.DOLLAR_DOLLAR
  | typeof TokenType.DOLLAR;

export type AtomTokenType =
  | typeof TokenType.COMMAND
  | typeof TokenType.COMMENT
  | typeof TokenType.TEXT
  | typeof TokenType.VERBATIM;

export function isOpeningTokenType(type: TokenType): type is OpeningTokenType {
  return (
    type === TokenType.ENV_BEGIN ||
    type === TokenType.DMATH_BEGIN ||
    type === TokenType.TMATH_BEGIN ||
    type === TokenType.GROUP_BEGIN ||
    type === TokenType.DOLLAR_DOLLAR ||
    type === TokenType.DOLLAR
  );
}

export function isAtomTokenType(type: TokenType): type is AtomTokenType {
  return (
    type === TokenType.COMMAND ||
    type === TokenType.COMMENT ||
    type === TokenType.TEXT ||
    type === TokenType.VERBATIM
  );
}
