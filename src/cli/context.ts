import type { Command } from 'commander';
import { resolveConfig, type CliOptions, type ResolvedConfig } from '../config.js';
import { TypeCatalog } from '../docs/catalog.js';
import { createLogger, type Logger } from '../shared/logger.js';

export interface CommandContext {
  config: ResolvedConfig;
  logger: Logger;
}

/**
 * Resolve configuration from the root program's global options
 */
export function createCommandContext(command: Command): CommandContext {
  const config = resolveConfig(command.optsWithGlobals<CliOptions>());
  const logger = createLogger({ level: config.logLevel, json: config.logJson });
  return { config, logger };
}

export async function loadCatalog(context: CommandContext): Promise<TypeCatalog> {
  return TypeCatalog.load(context.config.catalogPath, {
    logger: context.logger.child({ scope: 'catalog' }),
  });
}
