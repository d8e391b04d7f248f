import { createLogger, isEnvironment, isLogLevel, type Logger } from '@texchunk/logger';

/**
 * Logger writing JSON lines to stderr. TEXCHUNK_ENV picks the preset
 * (production by default), TEXCHUNK_LOG_LEVEL overrides its level.
 */
export function createCliLogger(env: NodeJS.ProcessEnv = process.env): Logger {
  const environment = env.TEXCHUNK_ENV ?? 'production';
  const level = env.TEXCHUNK_LOG_LEVEL;

  return createLogger({
    environment: isEnvironment(environment) ? environment : 'production',
    minLevel: level !== undefined && isLogLevel(level) ? level : undefined,
  });
}
