/**
 * Export CLI Command
 *
 * Write one Markdown page per documented type
 */

import type { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import { printSuccess, printWarning } from '../../cli-formatter.js';
import { pageFileName, renderPageMarkdown } from '../../docs/markdown.js';
import { resolveDocumentationPage } from '../../docs/page.js';
import { handleError, tryAsync } from '../../shared/error-handler.js';
import { createCommandContext, loadCatalog } from '../context.js';

interface ExportOptions {
  type?: string[];
  toc?: boolean;
}

export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .argument('<outDir>', 'Directory to write Markdown pages to')
    .option('-t, --type <name...>', 'Only export these types')
    .option('--no-toc', 'Omit the contents list at the top of each page')
    .description('Export documentation pages as Markdown')
    .action(async (outDir: string, options: ExportOptions, command: Command) => {
      const context = createCommandContext(command);
      const log = context.logger.child({ scope: 'export' });
      try {
        const catalog = await loadCatalog(context);
        const target = path.resolve(outDir);
        await tryAsync(() => fs.mkdir(target, { recursive: true }), 'Creating output directory');

        let written = 0;
        for (const typeName of options.type ?? catalog.typeNames()) {
          const page = resolveDocumentationPage(catalog, typeName);
          if (!page) {
            printWarning(`Skipping unknown type: ${typeName}`);
            continue;
          }
          const file = path.join(target, pageFileName(typeName));
          await tryAsync(
            () => fs.writeFile(file, renderPageMarkdown(page, { includeToc: options.toc }), 'utf-8'),
            `Writing ${file}`
          );
          log.debug('Wrote page', { typeName, file });
          written++;
        }

        printSuccess(`Exported ${written} page${written === 1 ? '' : 's'} to ${target}`);
      } catch (error) {
        handleError(error, { logger: context.logger, exitOnError: true });
      }
    });
}
