#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupPresetsCommand } from './commands/presets.js';
import { setupResolveCommand } from './commands/resolve.js';

/**
 * refasm CLI - Main entry point
 *
 * Resolves the reference assemblies a compiler needs for a target framework.
 */

const program = new Command();

program
  .name('refasm')
  .description('Resolve compiler reference assemblies for a target framework')
  .version(getVersion())
  .configureHelp({ sortSubcommands: true });

setupPresetsCommand(program);
setupResolveCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Run with REFASM_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with REFASM_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync();
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('refasm')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
