/**
 * texchunk lexer command
 */

import { Lexer, TokenType } from '@texchunk/core';
import { Command } from 'commander';
import { formatToken } from '../format.js';
import {
  execute,
  withVerbatimOptions,
  type CommandIO,
  type ProducerContext,
  type VerbatimOptions,
} from '../runner.js';

/**
 * Every token of the whole input, end of input excluded. Tokens are yielded
 * as they are scanned, so the ones before a lexing error are still listed.
 */
export function* lexerLines({ source, config }: ProducerContext): Generator<string> {
  const lexer = new Lexer(config);
  lexer.setInput(source);

  for (let token = lexer.lex(); token.type !== TokenType.EOF; token = lexer.lex()) {
    yield formatToken(token);
  }
}

export function createLexerCommand(io?: CommandIO): Command {
  return withVerbatimOptions(new Command('lexer'))
    .description('Print every token of the input')
    .argument('<input>', 'LaTeX file, or - for standard input')
    .action((input: string, options: VerbatimOptions) =>
      execute('lexer', { input, selectors: [], verbatim: options.verbatim }, lexerLines, io),
    );
}
