import { DEFAULT_CONFIG, type TexChunkConfig } from '../config.js';
import { DocumentMarkerMissingError } from '../errors.js';
import { Lexer } from '../lexer/lexer.js';
import { advancePosition, START_POSITION } from '../position.js';
import { NodeType, type ConstructNode, type FileNode } from './ast-nodes.js';
import { Parser } from './parser.js';

export const DOCUMENT_BEGIN = '\\begin{document}';

/**
 * Parse a complete LaTeX file.
 *
 * Everything before the first literal `\begin{document}` becomes the preamble
 * and is never tokenized. The body is parsed up to its matching
 * `\end{document}`; whatever follows becomes the postamble, also untokenized.
 *
 * @throws {DocumentMarkerMissingError} If the source has no `\begin{document}`
 * @throws {TexChunkError} For any lexing or nesting error inside the body
 */
export function parseFile(source: string, config: TexChunkConfig = DEFAULT_CONFIG): FileNode {
  const markerIndex = source.indexOf(DOCUMENT_BEGIN);
  if (markerIndex === -1) {
    throw new DocumentMarkerMissingError(DOCUMENT_BEGIN);
  }

  const lexer = new Lexer(config);
  lexer.setInput(source, markerIndex);
  const parser = new Parser(lexer);
  const body = parser.parseConstruct(lexer.lex());

  const postambleStart = lexer.getPosition();
  const postamble = source.slice(lexer.getIndex());

  return {
    type: NodeType.FILE,
    text: '',
    start: advancePosition(postambleStart, postamble),
    children: [
      {
        type: NodeType.PREAMBLE,
        text: source.slice(0, markerIndex),
        start: START_POSITION,
        children: null,
      },
      body,
      {
        type: NodeType.POSTAMBLE,
        text: postamble,
        start: postambleStart,
        children: null,
      },
    ],
  };
}

/**
 * The `document` environment node
 */
export function getBody(file: FileNode): ConstructNode {
  return file.children[1];
}
