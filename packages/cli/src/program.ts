import { Command } from 'commander';
import { createAnchorsCommand } from './commands/anchors.js';
import { createChunksCommand } from './commands/chunks.js';
import { createLexerCommand } from './commands/lexer.js';
import { createTreeCommand } from './commands/tree.js';
import type { CommandIO } from './runner.js';

export const GRAMMAR = `
Input is split at the first \\begin{document}. The preamble before it and
everything after the matching \\end{document} are kept as raw text. The body
is read with these rules:

  environment   \\begin{NAME} ... \\end{NAME}   NAME := [A-Za-z]+\\*?
  display math  \\[ ... \\]   or   $$ ... $$
  inline math   \\( ... \\)   or   $ ... $
  group         { ... }
  command       \\ followed by letters, or by exactly one other character
  comment       % up to and including the end of the line
  text          any run of characters other than \\ { } $ %

Constructs must nest properly. The bodies of verbatim environments
(verbatim, Verbatim, semiverbatim by default) are kept as a single node.

Selectors pick direct children of the document body:

  \\NAME or m:NAME     command
  {NAME} or e:NAME    environment
  %WORD or c:WORD     comment whose first word is WORD

Selected nodes, and \\end{document}, must start a line for "chunks".

Configuration: texchunk.config.yaml (searched upward from the working
directory), TEXCHUNK_VERBATIM_ENVS, TEXCHUNK_CAPTURE_VERBATIM, then flags.
Logs: JSON lines on stderr, see TEXCHUNK_ENV and TEXCHUNK_LOG_LEVEL.
`;

/**
 * Build the texchunk program. Output goes to the process streams unless `io` is given.
 */
export function createProgram(io?: CommandIO): Command {
  const program = new Command();

  program
    .name('texchunk')
    .description('Parse LaTeX into a lossless syntax tree and split the document body into chunks')
    .version('0.1.0')
    .addHelpText('after', GRAMMAR);

  program.addCommand(createLexerCommand(io));
  program.addCommand(createTreeCommand(io));
  program.addCommand(createAnchorsCommand(io));
  program.addCommand(createChunksCommand(io));

  return program;
}
