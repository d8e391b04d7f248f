/**
 * Syntax tree node types
 *
 * The tree is lossless: re-spelling every node in tree order reproduces the
 * source exactly. Constructs always end with an END sentinel holding the
 * closing delimiter.
 */

import type { ClosingTokenType, OpeningTokenType } from '../lexer/token-types.js';
import type { Position } from '../position.js';

export const NodeType = {
  // Document level
  FILE: 'FILE',
  PREAMBLE: 'PREAMBLE',
  POSTAMBLE: 'POSTAMBLE',
  END: 'END',

  // Constructs
  ENVIRONMENT: 'ENV',
  DISPLAY_MATH: 'DMATH',
  INLINE_MATH: 'TMATH',
  GROUP: 'GROUP',

  // Atoms
  COMMAND: 'CNAME',
  COMMENT: 'COMMENT',
  TEXT: 'TEXT',
  VERBATIM: 'VERB',
} as const;

export type NodeType = (typeof NodeType)[keyof typeof NodeType];

export type ConstructNodeType =
  | typeof NodeType.ENVIRONMENT
  | typeof NodeType.DISPLAY_MATH
  | typeof NodeType.INLINE_MATH
  | typeof NodeType.GROUP;

export type AtomNodeType =
  | typeof NodeType.COMMAND
  | typeof NodeType.COMMENT
  | typeof NodeType.TEXT
  | typeof NodeType.VERBATIM;

/**
 * Base interface for all nodes
 */
interface BaseNode {
  type: NodeType;
  text: string; // Literal text, or the name for environments
  start: Position;
}

/**
 * Command name, comment, plain text run or verbatim body
 */
export interface AtomNode extends BaseNode {
  type: AtomNodeType;
  children: null;
}

/**
 * Sentinel closing a construct; `text` and `start` come from the closing token
 */
export interface EndNode extends BaseNode {
  type: typeof NodeType.END;
  closer: ClosingTokenType;
  children: null;
}

/**
 * Environment, math or brace group
 *
 * `opener` distinguishes `$` from `\(` (and `$$` from `\[`), which share a node type.
 * `children` is never empty: its last element is the END sentinel.
 */
export interface ConstructNode extends BaseNode {
  type: ConstructNodeType;
  opener: OpeningTokenType;
  children: BodyNode[];
}

export type BodyNode = AtomNode | ConstructNode | EndNode;

/**
 * Raw text outside the document body, never tokenized
 */
export interface RawNode extends BaseNode {
  type: typeof NodeType.PREAMBLE | typeof NodeType.POSTAMBLE;
  children: null;
}

/**
 * Root node. `start` is the position just past the last character of the input.
 */
export interface FileNode extends BaseNode {
  type: typeof NodeType.FILE;
  children: [preamble: RawNode, body: ConstructNode, postamble: RawNode];
}

export type SyntaxNode = FileNode | RawNode | BodyNode;
