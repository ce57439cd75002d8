#!/usr/bin/env node

/**
 * uidocs CLI
 *
 * Browse and export API reference pages assembled from a component descriptor
 * manifest, and preview component class strings
 */

import { Command } from 'commander';
import { registerButtonClassesCommand } from './cli/commands/button-classes.js';
import { registerExportCommand } from './cli/commands/export.js';
import { registerListCommand } from './cli/commands/list.js';
import { registerShowCommand } from './cli/commands/show.js';
import { handleError } from './shared/error-handler.js';
import { UIDOCS_VERSION } from './version.js';

const program = new Command();

program
  .name('uidocs')
  .description('API reference pages and class composition for UI components')
  .version(UIDOCS_VERSION)
  .option('-c, --catalog <file>', 'Descriptor manifest (default: $UIDOCS_CATALOG or ./uidocs.catalog.json)')
  .option('--log-level <level>', 'error | warn | info | debug (default: $UIDOCS_LOG_LEVEL or info)')
  .option('--log-json', 'Write logs as JSON lines');

registerListCommand(program);
registerShowCommand(program);
registerExportCommand(program);
registerButtonClassesCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  handleError(error, { exitOnError: true });
});
