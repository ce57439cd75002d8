import * as path from 'path';
import { ConfigurationError, getErrorMessage } from './shared/error-handler.js';
import { normalizeLogLevel, type LogLevel } from './shared/logger.js';

export const DEFAULT_CATALOG_FILE = 'uidocs.catalog.json';

export type CliOptions = {
  catalog?: string;
  logLevel?: string;
  logJson?: boolean;
};

export interface ResolvedConfig {
  catalogPath: string;
  logLevel: LogLevel;
  logJson: boolean;
}

/**
 * Merge command-line options over environment variables over defaults.
 *
 * - catalog: `--catalog`, `UIDOCS_CATALOG`, `./uidocs.catalog.json`
 * - log level: `--log-level`, `UIDOCS_LOG_LEVEL`, `info`
 * - JSON logs: `--log-json`, `UIDOCS_LOG_JSON=true`
 */
export function resolveConfig(
  options: CliOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ResolvedConfig {
  const catalog = options.catalog || env.UIDOCS_CATALOG || DEFAULT_CATALOG_FILE;

  let logLevel: LogLevel;
  try {
    logLevel = normalizeLogLevel(options.logLevel ?? env.UIDOCS_LOG_LEVEL);
  } catch (error) {
    throw new ConfigurationError(
      getErrorMessage(error),
      { logLevel: options.logLevel ?? env.UIDOCS_LOG_LEVEL },
      'Set --log-level or UIDOCS_LOG_LEVEL to error, warn, info or debug'
    );
  }

  return {
    catalogPath: path.resolve(cwd, catalog),
    logLevel,
    logJson: options.logJson ?? env.UIDOCS_LOG_JSON === 'true',
  };
}
