import { Command } from 'commander';

import { ValidationError, withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { openCatalogStore } from '../core/catalog/catalog-store.js';
import { InstallPipeline, resolveInstallTargets } from '../core/reconcile/install-pipeline.js';
import { installDashboard } from '../core/dashboard/dashboard-installer.js';

interface InstallOptions {
  magicmirror?: boolean;
}

export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .alias('i')
    .argument('[titles...]', 'exact titles of the packages to install')
    .description('Install packages into the MagicMirror modules directory')
    .option('--magicmirror', 'install MagicMirror itself')
    .action(withErrorHandling(async (titles: string[], options: InstallOptions, command: Command) => {
      const ctx = await createCommandContext(command);

      if (options.magicmirror) {
        if (!(await installDashboard(ctx))) {
          process.exitCode = 1;
        }
        return;
      }

      if (titles.length === 0) {
        throw new ValidationError('at least one package title is required');
      }

      const catalog = await openCatalogStore(ctx).load();
      const candidates = resolveInstallTargets(catalog, titles, resolveOutput(ctx));
      if (!(await new InstallPipeline(ctx).install(candidates))) {
        process.exitCode = 1;
      }
    }));
}
