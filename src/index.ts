#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { LogLevel } from './types/index.js';
import { getVersion } from './utils/package.js';

// Import command setup functions
import { setupInstallCommand } from './commands/install.js';
import { setupUpgradeCommand } from './commands/upgrade.js';
import { setupCleanCommand } from './commands/clean.js';
import { setupListCommand } from './commands/list.js';
import { setupStatusCommand } from './commands/status.js';

/**
 * tendril CLI - Main entry point
 *
 * Installs, upgrades and prunes editor plugins declared in tendril.yml.
 */

// Create the main program
const program = new Command();

program
  .name('tendril')
  .description('tendril - declarative editor plugin manager')
  .version(getVersion())
  .option('--verbose', 'print debug logs to stderr')
  .configureHelp({ sortSubcommands: true });

setupInstallCommand(program);
setupUpgradeCommand(program);
setupCleanCommand(program);
setupListCommand(program);
setupStatusCommand(program);

program.hook('preAction', (_thisCommand, actionCommand) => {
  if (program.opts<{ verbose?: boolean }>().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Running ${actionCommand.name()}`, { cwd: process.cwd() });
});

program.on('command:*', (operands: string[]) => {
  console.error(`❌ Invalid subcommand: ${operands[0]}`);
  process.exitCode = 1;
});

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions gracefully
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
async function run(argv: readonly string[] = process.argv): Promise<void> {
  // No subcommand: show help and exit successfully
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync([...argv]);
}

run().catch((error: unknown) => {
  logger.error('Fatal error in main execution', { error });
  console.error('❌ Command execution failed. Use --help for usage information.');
  process.exit(1);
});
