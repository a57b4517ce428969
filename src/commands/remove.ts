import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { openCatalogStore } from '../core/catalog/catalog-store.js';
import { InstalledResolver } from '../core/installed/installed-resolver.js';
import { RemovePipeline } from '../core/reconcile/remove-pipeline.js';

export function setupRemoveCommand(program: Command): void {
  program
    .command('remove')
    .alias('rm')
    .argument('<names...>', 'directory names of installed packages')
    .description('Remove installed packages')
    .action(withErrorHandling(async (names: string[], _options: object, command: Command) => {
      const ctx = await createCommandContext(command);
      const catalog = await openCatalogStore(ctx).load();
      const installed = await new InstalledResolver(ctx.environment.modulesDir, ctx.runner, resolveOutput(ctx)).scan(catalog);

      if (!(await new RemovePipeline(ctx).remove(installed, names))) {
        process.exitCode = 1;
      }
    }));
}
