#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { LogLevel } from './types/index.js';
import { getVersion } from './utils/package.js';

import { setupBuildCommand } from './commands/build.js';
import { setupCheckCommand } from './commands/check.js';

/**
 * prereq - resolves, downloads and builds the external prerequisites of a
 * project before the project itself is built.
 */

const program = new Command();

program
  .name('prereq')
  .description('Resolve, fetch and build external prerequisite components')
  .version(getVersion())
  .option('--verbose', 'print diagnostic logging to stderr')
  .configureHelp({ sortSubcommands: true })
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
  });

setupBuildCommand(program);
setupCheckCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Rerun with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Rerun with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  try {
    if (argv.length <= 2) {
      program.outputHelp();
      return;
    }
    await program.parseAsync(argv);
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('prereq')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
