import { describe, expect, it } from 'vitest';
import { Lexer } from '../../src/lexer/lexer.js';
import { TokenType } from '../../src/lexer/token-types.js';

describe('Lexer - Position Tracking', () => {
  it('should track start and end of each token on one line', () => {
    const [command, open, text, close] = new Lexer().tokenize('\\emph{hi}');

    expect(command?.loc).toEqual({
      start: { offset: 0, line: 0, column: 0 },
      end: { offset: 5, line: 0, column: 5 },
    });
    expect(open?.loc.start).toEqual({ offset: 5, line: 0, column: 5 });
    expect(text?.loc.start).toEqual({ offset: 6, line: 0, column: 6 });
    expect(close?.loc.end).toEqual({ offset: 9, line: 0, column: 9 });
  });

  it('should move to the next line after a comment', () => {
    const [comment, text] = new Lexer().tokenize('% c\nx');

    expect(comment?.loc.end).toEqual({ offset: 4, line: 1, column: 0 });
    expect(text?.loc.start).toEqual({ offset: 4, line: 1, column: 0 });
  });

  it('should measure environment tokens by their full spelling', () => {
    const [begin, end] = new Lexer().tokenize('\\begin{a}\\end{a}');

    expect(begin?.loc.end).toEqual({ offset: 9, line: 0, column: 9 });
    expect(end?.loc.start).toEqual({ offset: 9, line: 0, column: 9 });
    expect(end?.loc.end).toEqual({ offset: 16, line: 0, column: 16 });
  });

  it('should count astral characters as one offset', () => {
    const [text, group] = new Lexer().tokenize('𝒜𝒜{');

    expect(text?.loc.end).toEqual({ offset: 2, line: 0, column: 2 });
    expect(group?.type).toBe(TokenType.GROUP_BEGIN);
    expect(group?.loc.start).toEqual({ offset: 2, line: 0, column: 2 });
  });

  it('should produce contiguous token spans over the whole input', () => {
    const source = 'Hi $x$ % c\n\\emph{y}\n\\begin{verbatim}}\\end{verbatim}\n';
    const tokens = new Lexer().tokenize(source);

    for (let i = 1; i < tokens.length; i++) {
      expect(tokens[i]?.loc.start).toEqual(tokens[i - 1]?.loc.end);
    }
    expect(tokens[tokens.length - 1]?.loc.start).toEqual({ offset: source.length, line: 3, column: 0 });
  });
});
