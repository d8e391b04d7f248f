/**
 * Shared plumbing for the texchunk commands: configuration, input, output and
 * exit codes. Each command only supplies a function from source to output lines.
 */

import { codePointLength, type Result, type TexChunkConfig } from '@texchunk/core';
import type { Logger } from '@texchunk/logger';
import { Option, type Command } from 'commander';
import type { Readable } from 'node:stream';
import { loadConfig } from './config.js';
import { reportFailure } from './errors.js';
import { readSource } from './input.js';
import { createCliLogger } from './logger.js';

export interface CommandIO {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdin: Readable;
  writeLine: (line: string) => void;
  writeError: (line: string) => void;
  setExitCode: (code: number) => void;
  logger: Logger;
}

export interface VerbatimOptions {
  verbatim?: string[] | false;
}

export interface Invocation extends VerbatimOptions {
  input: string;
  selectors: string[];
}

export interface ProducerContext {
  source: string;
  selectors: readonly string[];
  config: TexChunkConfig;
  logger: Logger;
}

/** Output lines of a command, yielded as they become available */
export type Producer = (context: ProducerContext) => Iterable<string>;

export function createProcessIO(): CommandIO {
  return {
    cwd: process.cwd(),
    env: process.env,
    stdin: process.stdin,
    writeLine: (line) => process.stdout.write(`${line}\n`),
    writeError: (line) => process.stderr.write(`${line}\n`),
    setExitCode: (code) => {
      process.exitCode = code;
    },
    logger: createCliLogger(),
  };
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

/**
 * Add a repeatable `--verbatim <name>` and `--no-verbatim` to a command
 */
export function withVerbatimOptions(command: Command): Command {
  return command
    .addOption(
      new Option('--verbatim <name>', 'also capture this environment verbatim (repeatable)').argParser(collect),
    )
    .addOption(new Option('--no-verbatim', 'tokenize verbatim environments like any other'));
}

/**
 * Unwrap a result, rethrowing its error
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Run one command end to end. Failures are reported on stderr and turned into
 * an exit code; lines produced before a failure are still written.
 */
export async function execute(
  name: string,
  invocation: Invocation,
  produce: Producer,
  io: CommandIO = createProcessIO(),
): Promise<void> {
  const logger = io.logger.child({ command: name, input: invocation.input });

  try {
    const { config, file } = loadConfig({ cwd: io.cwd, env: io.env, verbatim: invocation.verbatim });
    logger.debug('config_loaded', {
      file,
      verbatimEnvironments: config.verbatimEnvironments,
      captureVerbatim: config.captureVerbatim,
    });

    const source = await readSource(invocation.input, io.stdin);
    logger.debug('source_read', { length: codePointLength(source) });

    for (const line of produce({ source, selectors: invocation.selectors, config, logger })) {
      io.writeLine(line);
    }
  } catch (error) {
    io.setExitCode(reportFailure(error, logger, io.writeError));
  }
}
