import { MismatchedClosingConstructError } from '../errors.js';
import type { Lexer } from '../lexer/lexer.js';
import type { Token } from '../lexer/token.js';
import {
  isAtomTokenType,
  isOpeningTokenType,
  TokenType,
  type AtomTokenType,
  type ClosingTokenType,
  type OpeningTokenType,
} from '../lexer/token-types.js';
import { NodeType, type AtomNode, type ConstructNode, type EndNode } from './ast-nodes.js';

const CONSTRUCT_NODE_TYPES: Record<OpeningTokenType, ConstructNode['type']> = {
  [TokenType.ENV_BEGIN]: NodeType.ENVIRONMENT,
  [TokenType.DMATH_BEGIN]: NodeType.DISPLAY_MATH,
  [TokenType.DOLLAR_DOLLAR]: NodeType.DISPLAY_MATH,
  [TokenType.TMATH_BEGIN]: NodeType.INLINE_MATH,
  [TokenType.DOLLAR]: NodeType.INLINE_MATH,
  [TokenType.GROUP_BEGIN]: NodeType.GROUP,
};

const ATOM_NODE_TYPES: Record<AtomTokenType, AtomNode['type']> = {
  [TokenType.COMMAND]: NodeType.COMMAND,
  [TokenType.COMMENT]: NodeType.COMMENT,
  [TokenType.TEXT]: NodeType.TEXT,
  [TokenType.VERBATIM]: NodeType.VERBATIM,
};

type ClosingToken = Token & { type: ClosingTokenType };

/**
 * Check whether `token` closes the construct `open`.
 * Environments close only on an \end with the same name; `$` and `$$` close themselves.
 */
export function closes(
  open: Pick<ConstructNode, 'opener' | 'text'>,
  token: Token,
): token is ClosingToken {
  switch (open.opener) {
    case TokenType.ENV_BEGIN:
      return token.type === TokenType.ENV_END && token.value === open.text;
    case TokenType.DMATH_BEGIN:
      return token.type === TokenType.DMATH_END;
    case TokenType.TMATH_BEGIN:
      return token.type === TokenType.TMATH_END;
    case TokenType.GROUP_BEGIN:
      return token.type === TokenType.GROUP_END;
    case TokenType.DOLLAR_DOLLAR:
      return token.type === TokenType.DOLLAR_DOLLAR;
    case TokenType.DOLLAR:
      return token.type === TokenType.DOLLAR;
  }
}

/**
 * Tree builder for LaTeX token streams
 *
 * Descends into nested constructs with an explicit stack of open constructs
 * instead of call-stack recursion, so nesting depth is bounded only by memory.
 * The token stream is read with a single token of lookahead.
 */
export class Parser {
  private lexer: Lexer;

  /**
   * @param lexer - Lexer positioned at the first token to parse
   */
  constructor(lexer: Lexer) {
    this.lexer = lexer;
  }

  /**
   * Parse the construct opened by `opening`, an already consumed token.
   *
   * Returns once the matching closer has been consumed; the token after it is not read.
   *
   * @throws {MismatchedClosingConstructError} If a closer, or the end of input,
   *   does not match the innermost open construct
   */
  parseConstruct(opening: Token): ConstructNode {
    if (!isOpeningTokenType(opening.type)) {
      throw new Error(`Token ${opening.type} does not open a construct`);
    }
    return this.parseChildren(createConstructNode(opening, opening.type));
  }

  /**
   * Fill `root` with children until its closer, tracking nested constructs on a stack
   */
  private parseChildren(root: ConstructNode): ConstructNode {
    const parents: ConstructNode[] = [];
    let current = root;
    let token = this.lexer.lex();

    while (true) {
      if (closes(current, token)) {
        current.children.push(createEndNode(token));
        const parent = parents.pop();
        if (!parent) {
          return root;
        }
        parent.children.push(current);
        current = parent;
      } else if (isOpeningTokenType(token.type)) {
        parents.push(current);
        current = createConstructNode(token, token.type);
      } else if (isAtomTokenType(token.type)) {
        current.children.push(createAtomNode(token, token.type));
      } else {
        throw new MismatchedClosingConstructError(current, token);
      }
      token = this.lexer.lex();
    }
  }
}

function createConstructNode(token: Token, opener: OpeningTokenType): ConstructNode {
  return {
    type: CONSTRUCT_NODE_TYPES[opener],
    opener,
    text: token.value,
    start: token.loc.start,
    children: [],
  };
}

function createAtomNode(token: Token, type: AtomTokenType): AtomNode {
  return {
    type: ATOM_NODE_TYPES[type],
    text: token.value,
    start: token.loc.start,
    children: null,
  };
}

function createEndNode(token: ClosingToken): EndNode {
  return {
    type: NodeType.END,
    closer: token.type,
    text: token.value,
    start: token.loc.start,
    children: null,
  };
}
