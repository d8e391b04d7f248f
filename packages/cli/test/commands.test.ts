import { DEFAULT_CONFIG } from '@texchunk/core';
import { createMockLogger, type MockLogger } from '@texchunk/logger/mock';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { stripVTControlCharacters } from 'node:util';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { anchorLines } from '../src/commands/anchors.js';
import { chunkLines } from '../src/commands/chunks.js';
import { lexerLines } from '../src/commands/lexer.js';
import { treeLines } from '../src/commands/tree.js';
import { createProgram, GRAMMAR } from '../src/program.js';
import { execute, type CommandIO, type Invocation, type Producer } from '../src/runner.js';

const SOURCE = '\\begin{document}\nIntro\n\\section{A}\nBody\n\\end{document}\n';

describe('command producers', () => {
  it('should list tokens', () => {
    const lines = [...lexerLines({ source: 'a%c\nb', selectors: [], config: DEFAULT_CONFIG, logger: createMockLogger() })];

    expect(lines).toEqual(["0 0 0 TEXT : 'a'", "1 0 1 COMMENT : '%c\\n'", "4 1 0 TEXT : 'b'"]);
  });

  it('should list tree nodes', () => {
    const logger = createMockLogger();
    const lines = treeLines({ source: SOURCE, selectors: [], config: DEFAULT_CONFIG, logger });

    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe("00055:0006-01: FILE: ''");
    expect(logger.debug).toHaveBeenCalledWith('document_parsed', { nodes: 11 });
  });

  it('should list anchors', () => {
    const logger = createMockLogger();
    const lines = anchorLines({ source: SOURCE, selectors: ['\\section'], config: DEFAULT_CONFIG, logger });

    expect(lines).toEqual(["line 3 char 23 kind CNAME name '\\\\section'"]);
    expect(logger.info).toHaveBeenCalledWith('anchors_selected', { selectors: ['\\section'], count: 1 });
  });

  it('should list chunks', () => {
    const logger = createMockLogger();
    const lines = chunkLines({ source: SOURCE, selectors: ['m:section'], config: DEFAULT_CONFIG, logger });

    expect(lines).toEqual(['lines 2 2 chars 17 6', 'lines 3 4 chars 23 17']);
    expect(logger.info).toHaveBeenCalledWith('chunks_computed', { selectors: ['m:section'], count: 2 });
  });
});

describe('execute', () => {
  let cwd: string;
  let out: string[];
  let err: string[];
  let exitCodes: number[];
  let logger: MockLogger;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'texchunk-cli-'));
    out = [];
    err = [];
    exitCodes = [];
    logger = createMockLogger();
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  function run(name: string, invocation: Invocation, produce: Producer, stdin: Readable = Readable.from([])) {
    const io: CommandIO = {
      cwd,
      env: {},
      stdin,
      writeLine: (line) => out.push(line),
      writeError: (line) => err.push(stripVTControlCharacters(line)),
      setExitCode: (code) => exitCodes.push(code),
      logger,
    };
    return execute(name, invocation, produce, io);
  }

  function writeSource(content: string): string {
    const file = path.join(cwd, 'main.tex');
    fs.writeFileSync(file, content);
    return file;
  }

  it('should write the lines for a file input', async () => {
    const input = writeSource(SOURCE);

    await run('chunks', { input, selectors: ['m:section'] }, chunkLines);

    expect(out).toEqual(['lines 2 2 chars 17 6', 'lines 3 4 chars 23 17']);
    expect(err).toEqual([]);
    expect(exitCodes).toEqual([]);
    expect(logger.child).toHaveBeenCalledWith({ command: 'chunks', input });
  });

  it('should read standard input for -', async () => {
    const stdin = Readable.from(['\\begin{document}\n', 'x\n\\end{document}']);

    await run('chunks', { input: '-', selectors: ['m:section'] }, chunkLines, stdin);

    expect(out).toEqual(['lines 2 2 chars 17 2']);
  });

  it('should keep the tokens scanned before a lexing error', async () => {
    const input = writeSource('a%c');

    await run('lexer', { input, selectors: [] }, lexerLines);

    expect(out).toEqual(["0 0 0 TEXT : 'a'"]);
    expect(err).toEqual(["error: lexer jammed at offset 1 (line 1, column 2), looking at '%c'"]);
    expect(exitCodes).toEqual([1]);
  });

  it('should exit with 1 on an invalid selector', async () => {
    const input = writeSource(SOURCE);

    await run('anchors', { input, selectors: ['section'] }, anchorLines);

    expect(out).toEqual([]);
    expect(err).toEqual(["error: invalid selector 'section'"]);
    expect(exitCodes).toEqual([1]);
  });

  it('should exit with 2 when the input cannot be read', async () => {
    const input = path.join(cwd, 'missing.tex');

    await run('tree', { input, selectors: [] }, treeLines);

    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^error: cannot read '.*missing\.tex': ENOENT/);
    expect(exitCodes).toEqual([2]);
  });

  it('should exit with 2 on an invalid config file', async () => {
    const input = writeSource(SOURCE);
    const file = path.join(cwd, 'texchunk.config.yaml');
    fs.writeFileSync(file, 'captureVerbatim: maybe\n');

    await run('tree', { input, selectors: [] }, treeLines);

    expect(err).toEqual([`error: ${file}: captureVerbatim: Expected boolean, received string`]);
    expect(exitCodes).toEqual([2]);
  });

  it('should apply the config file and flags', async () => {
    const input = writeSource('\\begin{verbatim}{\\end{verbatim}');
    fs.writeFileSync(path.join(cwd, 'texchunk.config.yaml'), 'verbatimEnvironments: []\n');

    await run('lexer', { input, selectors: [] }, lexerLines);
    await run('lexer', { input, selectors: [], verbatim: ['verbatim'] }, lexerLines);

    expect(out).toEqual([
      "0 0 0 ENV_BEGIN : 'verbatim'",
      "16 0 16 GROUP_BEGIN : '{'",
      "17 0 17 ENV_END : 'verbatim'",
      "0 0 0 ENV_BEGIN : 'verbatim'",
      "16 0 16 VERBATIM : '{'",
      "17 0 17 ENV_END : 'verbatim'",
    ]);
  });
});

describe('program', () => {
  let cwd: string;
  let out: string[];
  let err: string[];
  let exitCodes: number[];

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'texchunk-program-'));
    out = [];
    err = [];
    exitCodes = [];
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  function testIO(): CommandIO {
    return {
      cwd,
      env: {},
      stdin: Readable.from([]),
      writeLine: (line) => out.push(line),
      writeError: (line) => err.push(stripVTControlCharacters(line)),
      setExitCode: (code) => exitCodes.push(code),
      logger: createMockLogger(),
    };
  }

  function writeSource(content: string): string {
    const file = path.join(cwd, 'main.tex');
    fs.writeFileSync(file, content);
    return file;
  }

  it('should accept --verbatim before the input and selectors', async () => {
    const input = writeSource(
      '\\begin{document}\n\\begin{lstlisting}\n}\n\\end{lstlisting}\n\\section{A}\n\\end{document}\n',
    );

    await createProgram(testIO()).parseAsync(['chunks', '--verbatim', 'lstlisting', input, 'm:section'], {
      from: 'user',
    });

    expect(err).toEqual([]);
    expect(exitCodes).toEqual([]);
    expect(out).toEqual(['lines 2 4 chars 17 38', 'lines 5 5 chars 55 12']);
  });

  it('should collect a repeated --verbatim', async () => {
    const input = writeSource('\\begin{lstlisting}{\\end{lstlisting}\\begin{minted}}\\end{minted}');

    await createProgram(testIO()).parseAsync(
      ['lexer', '--verbatim', 'minted', '--verbatim', 'lstlisting', input],
      { from: 'user' },
    );

    expect(out).toEqual([
      "0 0 0 ENV_BEGIN : 'lstlisting'",
      "18 0 18 VERBATIM : '{'",
      "19 0 19 ENV_END : 'lstlisting'",
      "35 0 35 ENV_BEGIN : 'minted'",
      "49 0 49 VERBATIM : '}'",
      "50 0 50 ENV_END : 'minted'",
    ]);
  });

  it('should not carry options over to the next program', async () => {
    const input = writeSource('\\begin{lstlisting}{\\end{lstlisting}');

    await createProgram(testIO()).parseAsync(['lexer', '--verbatim', 'lstlisting', input], { from: 'user' });
    await createProgram(testIO()).parseAsync(['lexer', input], { from: 'user' });

    expect(out).toEqual([
      "0 0 0 ENV_BEGIN : 'lstlisting'",
      "18 0 18 VERBATIM : '{'",
      "19 0 19 ENV_END : 'lstlisting'",
      "0 0 0 ENV_BEGIN : 'lstlisting'",
      "18 0 18 GROUP_BEGIN : '{'",
      "19 0 19 ENV_END : 'lstlisting'",
    ]);
  });

  it('should turn capture off with --no-verbatim', async () => {
    const input = writeSource('\\begin{verbatim}{\\end{verbatim}');

    await createProgram(testIO()).parseAsync(['lexer', '--no-verbatim', input], { from: 'user' });

    expect(out).toEqual([
      "0 0 0 ENV_BEGIN : 'verbatim'",
      "16 0 16 GROUP_BEGIN : '{'",
      "17 0 17 ENV_END : 'verbatim'",
    ]);
  });

  it('should list the commands and the input grammar in its help', () => {
    const program = createProgram();
    let help = '';
    program.configureOutput({ writeOut: (text) => (help += text) });

    program.outputHelp();

    expect(help).toContain('Usage: texchunk [options] [command]');
    expect(help).toContain('chunks [options] <input> <selectors...>');
    expect(help).toContain(GRAMMAR);
  });
});
