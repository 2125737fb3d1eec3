#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

// Import command setup functions
import { setupListCommand } from './commands/list.js';
import { setupPlanCommand } from './commands/plan.js';
import { setupManifestCommand } from './commands/manifest.js';
import { setupInstallCommand } from './commands/install.js';
import { setupBuildCommand } from './commands/build.js';
import { setupRunCommand } from './commands/run.js';
import { setupUninstallCommand } from './commands/uninstall.js';

/**
 * monoforge CLI - Main entry point
 *
 * Orders, installs, builds and uninstalls the projects of a monorepo.
 */

const program = new Command();

program
  .name('mforge')
  .description('monoforge - dependency-ordered install and build for monorepos')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .configureHelp({ sortSubcommands: true });

// === INSPECTION ===
setupListCommand(program);
setupPlanCommand(program);
setupManifestCommand(program);

// === EXECUTION ===
setupInstallCommand(program);
setupBuildCommand(program);
setupRunCommand(program);
setupUninstallCommand(program);

program.hook('preAction', () => {
  const opts = program.opts<{ cwd?: string }>();
  logger.debug(`Working directory: ${opts.cwd ?? process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with MONOFORGE_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with MONOFORGE_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('mforge')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
