/**
 * texchunk tree command
 */

import { parse } from '@texchunk/core';
import { Command } from 'commander';
import { formatTree } from '../format.js';
import {
  execute,
  unwrap,
  withVerbatimOptions,
  type CommandIO,
  type ProducerContext,
  type VerbatimOptions,
} from '../runner.js';

export function treeLines({ source, config, logger }: ProducerContext): string[] {
  const file = unwrap(parse(source, config));
  const lines = formatTree(file);
  logger.debug('document_parsed', { nodes: lines.length });
  return lines;
}

export function createTreeCommand(io?: CommandIO): Command {
  return withVerbatimOptions(new Command('tree'))
    .description('Print the syntax tree, one node per line')
    .argument('<input>', 'LaTeX file, or - for standard input')
    .action((input: string, options: VerbatimOptions) =>
      execute('tree', { input, selectors: [], verbatim: options.verbatim }, treeLines, io),
    );
}
