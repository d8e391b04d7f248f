import type { BodyNode, FileNode } from '../parser/ast-nodes.js';
import { getBody } from '../parser/document.js';
import { selectIndices, type Selector } from './selector.js';

/**
 * A top-level node of the document body picked out by a selector
 */
export interface Anchor {
  /** Index among the body's direct children */
  index: number;
  node: BodyNode;
}

/**
 * Find the direct children of the document body matching any selector
 */
export function findAnchors(file: FileNode, selectors: readonly Selector[]): Anchor[] {
  const nodes = getBody(file).children;
  return selectIndices(nodes, selectors).map((index) => ({ index, node: nodes[index] }));
}
