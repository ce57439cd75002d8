/**
 * Show CLI Command
 *
 * Render the documentation page of one type in the terminal
 */

import type { Command } from 'commander';
import { printError, printInfo, renderJson } from '../../cli-formatter.js';
import { pageToData, resolveDocumentationPage } from '../../docs/page.js';
import { renderPageTerminal } from '../../docs/terminal.js';
import { handleError } from '../../shared/error-handler.js';
import { createCommandContext, loadCatalog } from '../context.js';

interface ShowOptions {
  json?: boolean;
}

export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .argument('<type>', 'Type name as listed in the manifest')
    .option('--json', 'Print the assembled sections as JSON')
    .description('Show the documentation page of a type')
    .action(async (typeName: string, options: ShowOptions, command: Command) => {
      const context = createCommandContext(command);
      try {
        const catalog = await loadCatalog(context);
        const page = resolveDocumentationPage(catalog, typeName);

        if (!page) {
          printError(`Type not found: ${typeName}`);
          printInfo('Run `uidocs list` to see documented types');
          process.exitCode = 1;
          return;
        }

        if (options.json) {
          renderJson(pageToData(page));
        } else {
          console.log(renderPageTerminal(page));
        }
      } catch (error) {
        handleError(error, { logger: context.logger, exitOnError: true });
      }
    });
}
