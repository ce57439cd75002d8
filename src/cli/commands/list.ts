/**
 * List CLI Command
 *
 * Show every type in the descriptor manifest with its section count
 */

import type { Command } from 'commander';
import { renderTable, printInfo } from '../../cli-formatter.js';
import { assembleSections } from '../../docs/assembler.js';
import { handleError } from '../../shared/error-handler.js';
import { createCommandContext, loadCatalog } from '../context.js';

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List documented types')
    .action(async (_options: unknown, command: Command) => {
      const context = createCommandContext(command);
      try {
        const catalog = await loadCatalog(context);
        if (catalog.size === 0) {
          printInfo(`No types in ${context.config.catalogPath}`);
          return;
        }
        renderTable(
          catalog.descriptors().map((descriptor) => ({
            type: descriptor.typeName,
            sections: assembleSections(descriptor).length,
            summary: descriptor.summary,
          }))
        );
      } catch (error) {
        handleError(error, { logger: context.logger, exitOnError: true });
      }
    });
}
