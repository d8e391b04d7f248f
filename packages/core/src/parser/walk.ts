import { TokenType } from '../lexer/token-types.js';
import { NodeType, type SyntaxNode } from './ast-nodes.js';

export type NodeVisitor = (node: SyntaxNode, depth: number) => void;

/**
 * Visit every node in tree order (parent before children).
 * Uses an explicit stack, so arbitrarily deep trees are safe.
 */
export function walk(root: SyntaxNode, visit: NodeVisitor): void {
  const stack: Array<{ node: SyntaxNode; depth: number }> = [{ node: root, depth: 0 }];

  let frame = stack.pop();
  while (frame) {
    const { node, depth } = frame;
    visit(node, depth);
    if (node.children) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        stack.push({ node: node.children[i], depth: depth + 1 });
      }
    }
    frame = stack.pop();
  }
}

/**
 * The source text a single node contributes, excluding its children
 */
export function spell(node: SyntaxNode): string {
  switch (node.type) {
    case NodeType.ENVIRONMENT:
      return `\\begin{${node.text}}`;
    case NodeType.END:
      return node.closer === TokenType.ENV_END ? `\\end{${node.text}}` : node.text;
    default:
      return node.text;
  }
}

/**
 * Rebuild the exact source text covered by a node and its descendants
 */
export function toSource(root: SyntaxNode): string {
  let source = '';
  walk(root, (node) => {
    source += spell(node);
  });
  return source;
}
