/**
 * CLI configuration loading
 *
 * Priority (highest to lowest):
 * 1. Command-line flags
 * 2. Environment variables
 * 3. texchunk.config.yaml (searched from cwd upward)
 * 4. Built-in defaults
 */

import { DEFAULT_CONFIG, type TexChunkConfig } from '@texchunk/core';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const CONFIG_FILE_NAMES = ['texchunk.config.yaml', 'texchunk.config.yml'] as const;

const environmentName = z.string().regex(/^[A-Za-z]+\*?$/, 'must be letters with an optional trailing *');

const fileConfigSchema = z
  .object({
    verbatimEnvironments: z.array(environmentName).optional(),
    captureVerbatim: z.boolean().optional(),
    extraVerbatimEnvironments: z.array(environmentName).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

const captureFlag = z.enum(['true', 'false', '1', '0']);

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Value of repeated `--verbatim <name>` / `--no-verbatim` */
  verbatim?: string[] | false;
}

export interface LoadedConfig {
  config: TexChunkConfig;
  /** Config file that was applied, if any */
  file: string | null;
}

/**
 * Find the nearest config file, searching from startDir up to root
 */
export function findConfigFile(startDir: string): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(currentDir, name);
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Read and validate a config file
 *
 * @throws {ConfigError} If the file cannot be read, is not YAML or has invalid fields
 */
export function readConfigFile(file: string): FileConfig {
  let data: unknown;
  try {
    data = parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${file}: ${reason}`);
  }

  const result = fileConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(`${file}: ${field}: ${issue.message}`);
  }
  return result.data;
}

/**
 * @throws {ConfigError} If a name is not a valid environment name
 */
function parseEnvironmentNames(names: readonly string[], origin: string): string[] {
  return names.map((name) => {
    const result = environmentName.safeParse(name);
    if (!result.success) {
      throw new ConfigError(`${origin}: '${name}' ${result.error.issues[0].message}`);
    }
    return result.data;
  });
}

function parseCaptureFlag(value: string): boolean {
  const result = captureFlag.safeParse(value.trim().toLowerCase());
  if (!result.success) {
    throw new ConfigError(`TEXCHUNK_CAPTURE_VERBATIM must be true, false, 1 or 0, got '${value}'`);
  }
  return result.data === 'true' || result.data === '1';
}

/**
 * Resolve the tokenizer configuration from every source
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  let verbatimEnvironments = [...DEFAULT_CONFIG.verbatimEnvironments];
  let captureVerbatim = DEFAULT_CONFIG.captureVerbatim;

  const file = findConfigFile(options.cwd ?? process.cwd());
  if (file) {
    const fileConfig = readConfigFile(file);
    if (fileConfig.verbatimEnvironments) {
      verbatimEnvironments = [...fileConfig.verbatimEnvironments];
    }
    if (fileConfig.extraVerbatimEnvironments) {
      verbatimEnvironments.push(...fileConfig.extraVerbatimEnvironments);
    }
    if (fileConfig.captureVerbatim !== undefined) {
      captureVerbatim = fileConfig.captureVerbatim;
    }
  }

  if (env.TEXCHUNK_VERBATIM_ENVS !== undefined) {
    const names = env.TEXCHUNK_VERBATIM_ENVS.split(',')
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
    verbatimEnvironments = parseEnvironmentNames(names, 'TEXCHUNK_VERBATIM_ENVS');
  }
  if (env.TEXCHUNK_CAPTURE_VERBATIM !== undefined) {
    captureVerbatim = parseCaptureFlag(env.TEXCHUNK_CAPTURE_VERBATIM);
  }

  if (options.verbatim === false) {
    captureVerbatim = false;
  } else if (options.verbatim) {
    verbatimEnvironments.push(...parseEnvironmentNames(options.verbatim, '--verbatim'));
  }

  return { config: { verbatimEnvironments, captureVerbatim }, file };
}
