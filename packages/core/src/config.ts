/**
 * Tokenizer configuration.
 *
 * Passed explicitly to every Lexer; nothing here is read from process state.
 */
export interface TexChunkConfig {
  /** Environments whose bodies are captured verbatim instead of tokenized */
  verbatimEnvironments: readonly string[];
  /** When false, verbatim environments are tokenized like any other */
  captureVerbatim: boolean;
}

export const DEFAULT_VERBATIM_ENVIRONMENTS: readonly string[] = [
  'verbatim',
  'Verbatim',
  'semiverbatim',
];

export const DEFAULT_CONFIG: TexChunkConfig = {
  verbatimEnvironments: DEFAULT_VERBATIM_ENVIRONMENTS,
  captureVerbatim: true,
};

export function resolveConfig(overrides: Partial<TexChunkConfig> = {}): TexChunkConfig {
  return {
    verbatimEnvironments: overrides.verbatimEnvironments ?? DEFAULT_CONFIG.verbatimEnvironments,
    captureVerbatim: overrides.captureVerbatim ?? DEFAULT_CONFIG.captureVerbatim,
  };
}
