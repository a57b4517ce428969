#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { ensureMmpkgDirectories, getMmpkgPaths } from './core/directory.js';

import { setupDbCommand } from './commands/db.js';
import { setupSearchCommand } from './commands/search.js';
import { setupShowCommand } from './commands/show.js';
import { setupListCommand } from './commands/list.js';
import { setupInstallCommand } from './commands/install.js';
import { setupRemoveCommand } from './commands/remove.js';
import { setupUpdateCommand } from './commands/update.js';
import { setupUpgradeCommand } from './commands/upgrade.js';
import { setupMmCtlCommand } from './commands/mm-ctl.js';
import { setupExtPkgCommand } from './commands/ext-pkg.js';
import { setupEnvCommand } from './commands/env.js';
import { setupMigrateCommand } from './commands/migrate.js';

/**
 * mmpkg CLI - Main entry point
 *
 * Package manager for MagicMirror third-party modules.
 */

const program = new Command();

program
  .name('mmpkg')
  .description('mmpkg - The package manager for MagicMirror modules')
  .version(getVersion())
  .option('-y, --yes', 'answer yes to every confirmation')
  .option('--root <dir>', 'operate on the MagicMirror installation in <dir>')
  .configureHelp({ sortSubcommands: true });

// === CATALOG ===
setupDbCommand(program);
setupSearchCommand(program);
setupShowCommand(program);
setupListCommand(program);

// === PACKAGES ===
setupInstallCommand(program);
setupRemoveCommand(program);
setupUpdateCommand(program);
setupUpgradeCommand(program);
setupExtPkgCommand(program);
setupMigrateCommand(program);

// === MAGICMIRROR ===
setupMmCtlCommand(program);
setupEnvCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('An unexpected error occurred. Run with MMPKG_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Run with MMPKG_VERBOSE=1 for details.');
  process.exit(1);
});

export async function run(): Promise<void> {
  try {
    await ensureMmpkgDirectories(getMmpkgPaths());

    if (process.argv.length <= 2) {
      program.outputHelp();
      return;
    }

    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('mmpkg')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
