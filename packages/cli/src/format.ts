/**
 * Line formats for the command outputs
 */

import {
  codePointLength,
  headOf,
  quoteText,
  tailOf,
  walk,
  type Anchor,
  type Chunk,
  type SyntaxNode,
  type Token,
} from '@texchunk/core';

const TOKEN_TEXT_LIMIT = 16;
const NODE_TEXT_LIMIT = 16;
const NODE_TEXT_EDGE = 8;
const ANCHOR_TEXT_LIMIT = 32;
const INDENT = '    ';

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * `offset line column KIND : 'text'`, 0-based line and column
 */
export function formatToken(token: Token): string {
  const { offset, line, column } = token.loc.start;
  const text =
    codePointLength(token.value) < TOKEN_TEXT_LIMIT
      ? token.value
      : `${headOf(token.value, TOKEN_TEXT_LIMIT)}...`;
  return `${offset} ${line} ${column} ${token.type} : ${quoteText(text)}`;
}

/**
 * `OOOOO:LLLL-CC: <indent>KIND: 'text'`, 1-based line and column
 */
export function formatNode(node: SyntaxNode, depth: number): string {
  const { offset, line, column } = node.start;
  const location = `${pad(offset, 5)}:${pad(line + 1, 4)}-${pad(column + 1, 2)}`;
  const text =
    codePointLength(node.text) > NODE_TEXT_LIMIT
      ? `${headOf(node.text, NODE_TEXT_EDGE)}[...]${tailOf(node.text, NODE_TEXT_EDGE)}`
      : node.text;
  return `${location}: ${INDENT.repeat(depth)}${node.type}: ${quoteText(text)}`;
}

export function formatTree(root: SyntaxNode): string[] {
  const lines: string[] = [];
  walk(root, (node, depth) => lines.push(formatNode(node, depth)));
  return lines;
}

/**
 * `line L char O kind KIND name 'text'`
 */
export function formatAnchor({ node }: Anchor): string {
  const name =
    codePointLength(node.text) <= ANCHOR_TEXT_LIMIT
      ? quoteText(node.text)
      : `${quoteText(headOf(node.text, ANCHOR_TEXT_LIMIT))}[...]`;
  return `line ${node.start.line + 1} char ${node.start.offset} kind ${node.type} name ${name}`;
}

export function formatChunk(chunk: Chunk): string {
  return `lines ${chunk.startLine} ${chunk.endLine} chars ${chunk.offset} ${chunk.length}`;
}
