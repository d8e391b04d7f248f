import { DEFAULT_CONFIG, type TexChunkConfig } from '../config.js';
import { TokenizerStuckError, UnclosedVerbatimError } from '../errors.js';
import { advancePosition, START_POSITION, type Position } from '../position.js';
import { headOf } from '../text.js';
import type { Token } from './token.js';
import { TokenType } from './token-types.js';

/**
 * Fixed delimiters, tried in order after the environment markers.
 * `$$` must come before `$`.
 */
const DELIMITERS: ReadonlyArray<{ text: string; type: TokenType }> = [
  { text: '\\[', type: TokenType.DMATH_BEGIN },
  { text: '\\]', type: TokenType.DMATH_END },
  { text: '\\(', type: TokenType.TMATH_BEGIN },
  { text: '\\)', type: TokenType.TMATH_END },
  { text: '{', type: TokenType.GROUP_BEGIN },
  { text: '}', type: TokenType.GROUP_END },
  { text: '$$', type: TokenType.DOLLAR_DOLLAR },
  { text: '$', type: TokenType.DOLLAR },
];

/** Characters that end a run of plain text */
const RESERVED = new Set(['\\', '{', '}', '$', '%']);

/** Number of characters shown after a position where the lexer got stuck */
const STUCK_CONTEXT_LENGTH = 16;

/**
 * Pull-based lexer for LaTeX source
 *
 * Produces one token per `lex()` call; nothing is buffered beyond the scan
 * position. Every character is part of exactly one token, so successive
 * token spans cover the input without gaps.
 */
export class Lexer {
  private readonly config: TexChunkConfig;
  private input: string = '';
  // UTF-16 index used for slicing; `position` tracks code-point offsets
  private index: number = 0;
  private position: Position = START_POSITION;
  // Set right after an ENV_BEGIN whose body must be captured verbatim
  private pendingVerbatim: string | null = null;

  constructor(config: TexChunkConfig = DEFAULT_CONFIG) {
    this.config = config;
  }

  /**
   * Initialize lexer with source text, optionally starting mid-input
   *
   * @param source - Full source text
   * @param startIndex - UTF-16 index where scanning begins
   */
  setInput(source: string, startIndex: number = 0): void {
    this.input = source;
    this.index = startIndex;
    this.position = advancePosition(START_POSITION, source.slice(0, startIndex));
    this.pendingVerbatim = null;
  }

  /**
   * Position of the next character to scan
   */
  getPosition(): Position {
    return this.position;
  }

  /**
   * UTF-16 index of the next character to scan
   */
  getIndex(): number {
    return this.index;
  }

  /**
   * Extract next token from input
   * Returns EOF token (repeatedly) once the end is reached
   */
  lex(): Token {
    if (this.pendingVerbatim !== null) {
      const environment = this.pendingVerbatim;
      this.pendingVerbatim = null;
      return this.scanVerbatim(environment);
    }

    if (this.isEOF()) {
      return this.createToken(TokenType.EOF, '', '');
    }

    const token =
      this.tryScanEnvironment('\\begin{', TokenType.ENV_BEGIN) ??
      this.tryScanEnvironment('\\end{', TokenType.ENV_END) ??
      this.tryScanDelimiter() ??
      this.tryScanCommand() ??
      this.tryScanComment() ??
      this.tryScanText();

    if (!token) {
      throw new TokenizerStuckError(
        this.position,
        headOf(this.input.slice(this.index), STUCK_CONTEXT_LENGTH),
      );
    }

    if (token.type === TokenType.ENV_BEGIN && this.isVerbatimEnvironment(token.value)) {
      this.pendingVerbatim = token.value;
    }

    return token;
  }

  /**
   * Convenience method to tokenize an entire source string
   * @returns Array of all tokens including the EOF token
   */
  tokenize(source: string): Token[] {
    this.setInput(source);
    const tokens: Token[] = [];

    let token = this.lex();
    while (token.type !== TokenType.EOF) {
      tokens.push(token);
      token = this.lex();
    }
    tokens.push(token);

    return tokens;
  }

  private isVerbatimEnvironment(name: string): boolean {
    return this.config.captureVerbatim && this.config.verbatimEnvironments.includes(name);
  }

  /**
   * Scan \begin{NAME} or \end{NAME}, where NAME is letters with an optional trailing star.
   * Anything else starting with \begin is left to the command rule.
   */
  private tryScanEnvironment(prefix: string, type: TokenType): Token | null {
    if (!this.match(prefix)) {
      return null;
    }

    let end = this.index + prefix.length;
    const nameStart = end;
    while (end < this.input.length && isAsciiLetter(this.input[end])) {
      end++;
    }
    if (end === nameStart) {
      return null;
    }
    if (this.input[end] === '*') {
      end++;
    }
    if (this.input[end] !== '}') {
      return null;
    }

    const name = this.input.slice(nameStart, end);
    return this.createToken(type, name, this.input.slice(this.index, end + 1));
  }

  /**
   * Scan one of the fixed construct delimiters
   */
  private tryScanDelimiter(): Token | null {
    for (const { text, type } of DELIMITERS) {
      if (this.match(text)) {
        return this.createToken(type, text, text);
      }
    }
    return null;
  }

  /**
   * Scan a command: backslash followed by letters, or by exactly one other character
   */
  private tryScanCommand(): Token | null {
    if (this.peek() !== '\\' || this.index + 1 >= this.input.length) {
      return null;
    }

    let end = this.index + 1;
    while (end < this.input.length && isAsciiLetter(this.input[end])) {
      end++;
    }
    if (end === this.index + 1) {
      const codePoint = this.input.codePointAt(end) ?? 0;
      end += codePoint > 0xffff ? 2 : 1;
    }

    const text = this.input.slice(this.index, end);
    return this.createToken(TokenType.COMMAND, text, text);
  }

  /**
   * Scan a comment: % up to and including the next newline.
   * A comment with no newline after it matches nothing.
   */
  private tryScanComment(): Token | null {
    if (this.peek() !== '%') {
      return null;
    }

    const newline = this.input.indexOf('\n', this.index);
    if (newline === -1) {
      return null;
    }

    const text = this.input.slice(this.index, newline + 1);
    return this.createToken(TokenType.COMMENT, text, text);
  }

  /**
   * Scan plain text until a reserved character or the end of input
   */
  private tryScanText(): Token | null {
    let end = this.index;
    while (end < this.input.length && !RESERVED.has(this.input[end])) {
      end++;
    }
    if (end === this.index) {
      return null;
    }

    const text = this.input.slice(this.index, end);
    return this.createToken(TokenType.TEXT, text, text);
  }

  /**
   * Capture everything up to the literal \end{NAME} as a single token.
   * The closing marker itself is left for the next call.
   */
  private scanVerbatim(environment: string): Token {
    const closing = this.input.indexOf(`\\end{${environment}}`, this.index);
    if (closing === -1) {
      throw new UnclosedVerbatimError(environment, this.position);
    }

    const body = this.input.slice(this.index, closing);
    return this.createToken(TokenType.VERBATIM, body, body);
  }

  /**
   * Create a token and move past the source text it spans
   */
  private createToken(type: TokenType, value: string, span: string): Token {
    const start = this.position;
    this.index += span.length;
    this.position = advancePosition(start, span);
    return {
      type,
      value,
      loc: {
        start,
        end: this.position,
      },
    };
  }

  /**
   * Look ahead at next character without consuming it
   */
  private peek(): string {
    return this.isEOF() ? '' : this.input[this.index];
  }

  /**
   * Check if next characters match the given string
   */
  private match(str: string): boolean {
    return this.input.startsWith(str, this.index);
  }

  /**
   * Check if we've reached end of input
   */
  private isEOF(): boolean {
    return this.index >= this.input.length;
  }
}

function isAsciiLetter(char: string | undefined): boolean {
  return char !== undefined && ((char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z'));
}
