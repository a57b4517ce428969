import { Command } from 'commander';

import { TOOL_NAME } from '../constants/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { getVersion } from '../utils/package.js';
import { createCommandContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { openCatalogStore } from '../core/catalog/catalog-store.js';
import { UpdateChecker } from '../core/reconcile/update-checker.js';

export function setupUpdateCommand(program: Command): void {
  program
    .command('update')
    .description('Check installed packages, MagicMirror and mmpkg for upgrades')
    .action(withErrorHandling(async (_options: object, command: Command) => {
      const ctx = await createCommandContext(command);
      const out = resolveOutput(ctx);
      const store = openCatalogStore(ctx);

      const catalog = await store.load({ forceRefresh: await store.isExpired() });
      const checker = new UpdateChecker(ctx);

      const packages = await checker.checkForPackageUpdates(catalog);
      const app = await checker.checkForDashboardUpdate();
      const tool = await checker.checkForToolUpdate(getVersion());

      const total = packages.length + (app ? 1 : 0) + (tool ? 1 : 0);
      if (total === 0) {
        out.success('Everything is up to date');
        return;
      }
      out.info(`${total} ${total === 1 ? 'upgrade' : 'upgrades'} available. Run '${TOOL_NAME} upgrade' to apply`);
    }));
}
