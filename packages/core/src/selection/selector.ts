import { InvalidSelectorError } from '../errors.js';
import { NodeType, type BodyNode } from '../parser/ast-nodes.js';

/**
 * Compiled selector
 *
 * - `command`: a command node by its full name, backslash included
 * - `environment`: an environment node by name
 * - `comment`: a comment whose first whitespace-delimited word equals `word`
 */
export type Selector =
  | { type: 'command'; name: string }
  | { type: 'environment'; name: string }
  | { type: 'comment'; word: string };

/**
 * Compile a selector string.
 *
 * | Form | Selects |
 * |---|---|
 * | `\NAME`, `m:NAME` | command `\NAME` |
 * | `{NAME}`, `e:NAME` | environment `NAME` |
 * | `%WORD`, `c:WORD` | comment whose first word is `WORD` |
 *
 * @throws {InvalidSelectorError} For any other form, or an empty name
 */
export function parseSelector(raw: string): Selector {
  const selector = compile(raw);
  if (selector === null) {
    throw new InvalidSelectorError(raw);
  }
  return selector;
}

function compile(raw: string): Selector | null {
  if (raw.startsWith('\\')) {
    return raw.length > 1 ? { type: 'command', name: raw } : null;
  }
  if (raw.startsWith('m:')) {
    return nonEmpty(raw.slice(2), (name) => ({ type: 'command', name: `\\${name}` }));
  }
  if (raw.startsWith('{') && raw.endsWith('}')) {
    return nonEmpty(raw.slice(1, -1), (name) => ({ type: 'environment', name }));
  }
  if (raw.startsWith('e:')) {
    return nonEmpty(raw.slice(2), (name) => ({ type: 'environment', name }));
  }
  if (raw.startsWith('%')) {
    return nonEmpty(raw.slice(1), (word) => ({ type: 'comment', word }));
  }
  if (raw.startsWith('c:')) {
    return nonEmpty(raw.slice(2), (word) => ({ type: 'comment', word }));
  }
  return null;
}

function nonEmpty(value: string, build: (value: string) => Selector): Selector | null {
  return value.length > 0 ? build(value) : null;
}

/**
 * First whitespace-delimited word of a comment, after its leading `%`
 */
export function commentKeyword(text: string): string | null {
  const words = text.slice(1).trim().split(/\s+/);
  return words[0] ? words[0] : null;
}

export function matchesSelector(node: BodyNode, selector: Selector): boolean {
  switch (selector.type) {
    case 'command':
      return node.type === NodeType.COMMAND && node.text === selector.name;
    case 'environment':
      return node.type === NodeType.ENVIRONMENT && node.text === selector.name;
    case 'comment':
      return node.type === NodeType.COMMENT && commentKeyword(node.text) === selector.word;
  }
}

/**
 * Indices of the nodes matching at least one selector, in ascending order.
 * Only the given nodes are inspected, never their descendants.
 */
export function selectIndices(
  nodes: readonly BodyNode[],
  selectors: readonly Selector[],
): number[] {
  const indices: number[] = [];
  nodes.forEach((node, index) => {
    if (selectors.some((selector) => matchesSelector(node, selector))) {
      indices.push(index);
    }
  });
  return indices;
}
