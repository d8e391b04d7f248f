/**
 * @texchunk/core - Main API
 *
 * Purely syntactic LaTeX parsing: a lossless syntax tree, top-level anchors
 * and the chunks between them. No macro is expanded or interpreted.
 *
 * The functions in this module return a `Result` instead of throwing; the
 * building blocks they wrap (`parseFile`, `parseSelector`, `computeChunks`,
 * `Lexer`, `Parser`) throw `TexChunkError` subclasses.
 */

import { DEFAULT_CONFIG, type TexChunkConfig } from './config.js';
import { capture, type Result } from './errors.js';
import { Lexer } from './lexer/lexer.js';
import type { Token } from './lexer/token.js';
import type { FileNode } from './parser/ast-nodes.js';
import { parseFile } from './parser/document.js';
import { findAnchors, type Anchor } from './selection/anchors.js';
import { computeChunks, type Chunk } from './selection/chunks.js';
import { parseSelector } from './selection/selector.js';

/**
 * Tokenize a whole source string, up to and including the EOF token
 */
export function tokenize(source: string, config: TexChunkConfig = DEFAULT_CONFIG): Result<Token[]> {
  return capture(() => new Lexer(config).tokenize(source));
}

/**
 * Parse a LaTeX file into a FILE node holding preamble, document body and postamble
 *
 * @example
 * ```typescript
 * const result = parse('\\begin{document}\nHello\n\\end{document}\n');
 * if (result.ok) {
 *   toSource(result.value); // the original text
 * }
 * ```
 */
export function parse(source: string, config: TexChunkConfig = DEFAULT_CONFIG): Result<FileNode> {
  return capture(() => parseFile(source, config));
}

/**
 * Select top-level anchors with selector strings such as `\section` or `e:figure`
 */
export function selectAnchors(file: FileNode, selectors: readonly string[]): Result<Anchor[]> {
  return capture(() => findAnchors(file, selectors.map(parseSelector)));
}

/**
 * Compute the chunks delimited by the anchors the selector strings pick out
 */
export function chunk(file: FileNode, selectors: readonly string[]): Result<Chunk[]> {
  return capture(() => computeChunks(file, selectors.map(parseSelector)));
}

export { DEFAULT_CONFIG, DEFAULT_VERBATIM_ENVIRONMENTS, resolveConfig } from './config.js';
export type { TexChunkConfig } from './config.js';
export {
  AnchorNotAtLineStartError,
  capture,
  DocumentMarkerMissingError,
  InvalidSelectorError,
  MismatchedClosingConstructError,
  TexChunkError,
  TokenizerStuckError,
  TrailingContentError,
  UnclosedVerbatimError,
} from './errors.js';
export type { Result, TexChunkErrorCode } from './errors.js';
export { Lexer } from './lexer/lexer.js';
export type { SourceLocation, Token } from './lexer/token.js';
export {
  isAtomTokenType,
  isOpeningTokenType,
  TokenType,
} from './lexer/token-types.js';
export type { AtomTokenType, ClosingTokenType, OpeningTokenType } from './lexer/token-types.js';
export { NodeType } from './parser/ast-nodes.js';
export type {
  AtomNode,
  BodyNode,
  ConstructNode,
  EndNode,
  FileNode,
  RawNode,
  SyntaxNode,
} from './parser/ast-nodes.js';
export { DOCUMENT_BEGIN, getBody, parseFile } from './parser/document.js';
export { closes, Parser } from './parser/parser.js';
export { spell, toSource, walk } from './parser/walk.js';
export type { NodeVisitor } from './parser/walk.js';
export { advancePosition, formatPosition, START_POSITION } from './position.js';
export type { Position } from './position.js';
export { findAnchors } from './selection/anchors.js';
export type { Anchor } from './selection/anchors.js';
export { computeChunks } from './selection/chunks.js';
export type { Chunk } from './selection/chunks.js';
export { commentKeyword, matchesSelector, parseSelector, selectIndices } from './selection/selector.js';
export type { Selector } from './selection/selector.js';
export { codePointLength, headOf, quoteText, tailOf } from './text.js';
