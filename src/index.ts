#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { createTagCommand, createUntagCommand, createRetagCommand, createShowCommand } from './commands/tag.js';
import { createExistingCommand, createFindCommand } from './commands/search.js';
import { createPruneCommand } from './commands/prune.js';
import { createConfigCommand } from './commands/config.js';
import { closeDb } from './db/index.js';
import { logger } from './utils/logger.js';

const program = new Command();

program
  .name('tagging')
  .description('Tag arbitrary subjects and query them by tag')
  .version('1.0.0')
  .option('--debug', 'Print debug output')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ debug?: boolean }>().debug) {
      logger.setDebug(true);
    }
  });

// Tagging
program.addCommand(createTagCommand());
program.addCommand(createUntagCommand());
program.addCommand(createRetagCommand());
program.addCommand(createShowCommand());

// Queries
program.addCommand(createExistingCommand());
program.addCommand(createFindCommand());

// Maintenance
program.addCommand(createPruneCommand());
program.addCommand(createConfigCommand());

// Handle errors
program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (!(error instanceof Error) || error.name !== 'CommanderError') {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
} finally {
  closeDb();
}
