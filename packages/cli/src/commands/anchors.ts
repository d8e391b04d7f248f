/**
 * texchunk anchors command
 */

import { getBody, parse, selectAnchors } from '@texchunk/core';
import { Command } from 'commander';
import { formatAnchor } from '../format.js';
import {
  execute,
  unwrap,
  withVerbatimOptions,
  type CommandIO,
  type ProducerContext,
  type VerbatimOptions,
} from '../runner.js';

export function anchorLines({ source, selectors, config, logger }: ProducerContext): string[] {
  const file = unwrap(parse(source, config));
  logger.debug('document_parsed', { bodyNodes: getBody(file).children.length });

  const anchors = unwrap(selectAnchors(file, selectors));
  logger.info('anchors_selected', { selectors, count: anchors.length });
  return anchors.map(formatAnchor);
}

export function createAnchorsCommand(io?: CommandIO): Command {
  return withVerbatimOptions(new Command('anchors'))
    .description('List the top-level nodes matching any selector')
    .argument('<input>', 'LaTeX file, or - for standard input')
    .argument('<selectors...>', 'selectors such as \\section, m:section, {figure}, e:figure, %TODO, c:TODO')
    .action((input: string, selectors: string[], options: VerbatimOptions) =>
      execute('anchors', { input, selectors, verbatim: options.verbatim }, anchorLines, io),
    );
}
