import type { Position } from '../position.js';
import type { TokenType } from './token-types.js';

/**
 * Source location with start and end positions
 */
export interface SourceLocation {
  start: Position;
  end: Position;
}

/**
 * Token produced by lexer
 *
 * `value` is the environment name for ENV_BEGIN / ENV_END, the captured body for
 * VERBATIM, and the literal matched text otherwise.
 */
export interface Token {
  type: TokenType;
  value: string;
  loc: SourceLocation;
}
