/**
 * Error types for LaTeX parsing, selection and chunking
 *
 * Every failure is fatal to the current operation. Each variant carries a
 * `code` discriminant plus the positions and tokens needed to reproduce a
 * precise diagnostic.
 */

import type { Token } from './lexer/token.js';
import type { ConstructNode } from './parser/ast-nodes.js';
import { formatPosition, type Position } from './position.js';
import { quoteText } from './text.js';

export type TexChunkErrorCode =
  | 'TOKENIZER_STUCK'
  | 'UNCLOSED_VERBATIM'
  | 'DOCUMENT_MARKER_MISSING'
  | 'MISMATCHED_CLOSING_CONSTRUCT'
  | 'TRAILING_CONTENT_AFTER_DOCUMENT_BEGIN'
  | 'ANCHOR_NOT_AT_LINE_START'
  | 'INVALID_SELECTOR_SYNTAX';

/**
 * Base class for all texchunk errors
 */
export abstract class TexChunkError extends Error {
  abstract readonly code: TexChunkErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when no lexical rule matches at the current position
 */
export class TokenizerStuckError extends TexChunkError {
  readonly code = 'TOKENIZER_STUCK';
  /** Up to 16 characters following the position */
  readonly context: string;

  constructor(
    readonly position: Position,
    context: string,
  ) {
    super(
      `lexer jammed at offset ${position.offset} (${formatPosition(position)}), looking at ${quoteText(context)}`,
    );
    this.context = context;
  }
}

/**
 * Thrown when a verbatim environment has no literal closing marker
 */
export class UnclosedVerbatimError extends TexChunkError {
  readonly code = 'UNCLOSED_VERBATIM';

  constructor(
    readonly environment: string,
    readonly position: Position,
  ) {
    super(`unclosed '${environment}' environment at offset ${position.offset} (${formatPosition(position)})`);
  }
}

/**
 * Thrown when the source has no document-begin marker
 */
export class DocumentMarkerMissingError extends TexChunkError {
  readonly code = 'DOCUMENT_MARKER_MISSING';

  constructor(readonly marker: string) {
    super(`${marker} not found`);
  }
}

/**
 * Thrown when a token cannot continue the innermost open construct
 */
export class MismatchedClosingConstructError extends TexChunkError {
  readonly code = 'MISMATCHED_CLOSING_CONSTRUCT';

  constructor(
    readonly open: Pick<ConstructNode, 'type' | 'opener' | 'text' | 'start'>,
    readonly token: Token,
  ) {
    super(
      `wrong closing construct: ${token.type} ${quoteText(token.value)} at ${formatPosition(token.loc.start)} ` +
        `does not close ${open.type} ${quoteText(open.text)} opened at ${formatPosition(open.start)}`,
    );
  }
}

/**
 * Thrown when the document body does not start with a line break
 */
export class TrailingContentError extends TexChunkError {
  readonly code = 'TRAILING_CONTENT_AFTER_DOCUMENT_BEGIN';

  constructor(readonly position: Position) {
    super(`trailing content right after \\begin{document} (${formatPosition(position)})`);
  }
}

/**
 * Thrown when a chunk boundary does not start a line
 */
export class AnchorNotAtLineStartError extends TexChunkError {
  readonly code = 'ANCHOR_NOT_AT_LINE_START';
  readonly line: number;
  readonly column: number;
  readonly offset: number;

  constructor(position: Position) {
    super(`anchor not at start of line (${formatPosition(position)})`);
    this.line = position.line;
    this.column = position.column;
    this.offset = position.offset;
  }
}

/**
 * Thrown when a selector string matches none of the selector forms
 */
export class InvalidSelectorError extends TexChunkError {
  readonly code = 'INVALID_SELECTOR_SYNTAX';

  constructor(readonly selector: string) {
    super(`invalid selector ${quoteText(selector)}`);
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: TexChunkError };

/**
 * Run `operation`, turning a TexChunkError into a failed result.
 * Any other exception propagates.
 */
export function capture<T>(operation: () => T): Result<T> {
  try {
    return { ok: true, value: operation() };
  } catch (error) {
    if (error instanceof TexChunkError) {
      return { ok: false, error };
    }
    throw error;
  }
}
