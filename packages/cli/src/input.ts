import { readFile } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { InputError } from './errors.js';

/** Input argument that selects standard input */
export const STDIN_INPUT = '-';

/**
 * Read the whole LaTeX source, from a UTF-8 file or from `stdin` when the input is `-`
 */
export async function readSource(input: string, stdin: Readable): Promise<string> {
  if (input === STDIN_INPUT) {
    const chunks: Buffer[] = [];
    for await (const chunk of stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
    }
    return Buffer.concat(chunks).toString('utf8');
  }

  try {
    return await readFile(input, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(`cannot read '${input}': ${reason}`);
  }
}
