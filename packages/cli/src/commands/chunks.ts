/**
 * texchunk chunks command
 */

import { chunk, getBody, parse } from '@texchunk/core';
import { Command } from 'commander';
import { formatChunk } from '../format.js';
import {
  execute,
  unwrap,
  withVerbatimOptions,
  type CommandIO,
  type ProducerContext,
  type VerbatimOptions,
} from '../runner.js';

export function chunkLines({ source, selectors, config, logger }: ProducerContext): string[] {
  const file = unwrap(parse(source, config));
  logger.debug('document_parsed', { bodyNodes: getBody(file).children.length });

  const chunks = unwrap(chunk(file, selectors));
  logger.info('chunks_computed', { selectors, count: chunks.length });
  return chunks.map(formatChunk);
}

export function createChunksCommand(io?: CommandIO): Command {
  return withVerbatimOptions(new Command('chunks'))
    .description('List the line and character ranges between consecutive anchors')
    .argument('<input>', 'LaTeX file, or - for standard input')
    .argument('<selectors...>', 'selectors, as for the anchors command')
    .action((input: string, selectors: string[], options: VerbatimOptions) =>
      execute('chunks', { input, selectors, verbatim: options.verbatim }, chunkLines, io),
    );
}
