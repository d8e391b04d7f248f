import { describe, expect, it } from 'vitest';
import {
  capture,
  chunk,
  DocumentMarkerMissingError,
  InvalidSelectorError,
  parse,
  selectAnchors,
  tokenize,
  toSource,
  TokenType,
  UnclosedVerbatimError,
  type FileNode,
} from '../src/index.js';

const SOURCE = '\\documentclass{article}\n\\begin{document}\n\\section{A}\nText\n\\end{document}\n';

function parsed(source: string): FileNode {
  const result = parse(source);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

describe('Public API', () => {
  describe('tokenize', () => {
    it('should return every token up to EOF', () => {
      const result = tokenize('a{b}');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.map((token) => token.type)).toEqual([
          TokenType.TEXT,
          TokenType.GROUP_BEGIN,
          TokenType.TEXT,
          TokenType.GROUP_END,
          TokenType.EOF,
        ]);
      }
    });

    it('should report an unclosed verbatim environment as a failed result', () => {
      const result = tokenize('\\begin{verbatim}x');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(UnclosedVerbatimError);
      }
    });
  });

  describe('parse', () => {
    it('should return the file tree', () => {
      expect(toSource(parsed(SOURCE))).toBe(SOURCE);
    });

    it('should report a missing document marker', () => {
      const result = parse('no document here');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(DocumentMarkerMissingError);
        expect(result.error.code).toBe('DOCUMENT_MARKER_MISSING');
      }
    });
  });

  describe('selectAnchors', () => {
    it('should return anchors with their body indices', () => {
      const result = selectAnchors(parsed(SOURCE), ['\\section']);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.map(({ index, node }) => [index, node.text])).toEqual([[1, '\\section']]);
      }
    });

    it('should report an invalid selector', () => {
      const result = selectAnchors(parsed(SOURCE), ['section']);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidSelectorError);
      }
    });
  });

  describe('chunk', () => {
    it('should return the chunks between anchors', () => {
      const result = chunk(parsed(SOURCE), ['m:section']);

      expect(result).toEqual({
        ok: true,
        value: [
          { startLine: 3, endLine: 2, offset: 41, length: 0 },
          { startLine: 3, endLine: 4, offset: 41, length: 17 },
        ],
      });
    });
  });

  describe('capture', () => {
    it('should rethrow errors that are not texchunk errors', () => {
      expect(() =>
        capture(() => {
          throw new RangeError('boom');
        }),
      ).toThrow(RangeError);
    });
  });
});
