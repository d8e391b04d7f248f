import { AnchorNotAtLineStartError, TrailingContentError } from '../errors.js';
import { NodeType, type FileNode } from '../parser/ast-nodes.js';
import { getBody } from '../parser/document.js';
import { advancePosition, type Position } from '../position.js';
import { findAnchors } from './anchors.js';
import type { Selector } from './selector.js';

/**
 * Source range between two consecutive boundaries
 */
export interface Chunk {
  /** 1-based line of the chunk's first character */
  startLine: number;
  /**
   * 0-based line of the next boundary, which is the 1-based number of the
   * chunk's last line
   */
  endLine: number;
  /** Code-point offset of the chunk's first character */
  offset: number;
  /** Length in code points */
  length: number;
}

/**
 * Split the document body into chunks at the selected anchors.
 *
 * Boundaries are: just after the newline that must follow `\begin{document}`,
 * every anchor, and the `\end{document}` marker. One chunk is emitted per pair
 * of consecutive boundaries, so the chunks tile the body without gaps. A chunk
 * may be empty when an anchor sits on the body's first line.
 *
 * @throws {TrailingContentError} If the body does not start with a newline
 * @throws {AnchorNotAtLineStartError} If an anchor or `\end{document}` is not in column 0
 */
export function computeChunks(file: FileNode, selectors: readonly Selector[]): Chunk[] {
  const body = getBody(file);
  const first = body.children[0];
  if (first.type !== NodeType.TEXT || !first.text.startsWith('\n')) {
    throw new TrailingContentError(first.start);
  }

  const end = body.children[body.children.length - 1];
  const anchors = findAnchors(file, selectors).map(({ node }) => node.start);
  for (const position of [...anchors, end.start]) {
    if (position.column !== 0) {
      throw new AnchorNotAtLineStartError(position);
    }
  }

  const boundaries: Position[] = [advancePosition(first.start, '\n'), ...anchors, end.start];
  const chunks: Chunk[] = [];
  for (let i = 0; i + 1 < boundaries.length; i++) {
    const current = boundaries[i];
    const next = boundaries[i + 1];
    chunks.push({
      startLine: current.line + 1,
      endLine: next.line,
      offset: current.offset,
      length: next.offset - current.offset,
    });
  }
  return chunks;
}
