import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { openCatalogStore } from '../core/catalog/catalog-store.js';
import { encodeCatalog } from '../core/package-record.js';

interface DbOptions {
  refresh?: boolean;
  details?: boolean;
  dump?: boolean;
}

export function setupDbCommand(program: Command): void {
  program
    .command('db')
    .description('Manage the local package catalog snapshot')
    .option('-r, --refresh', 'force a refresh of the catalog snapshot')
    .option('-d, --details', 'show snapshot timestamps and counts')
    .option('--dump', 'print the catalog, including external packages, as JSON')
    .action(withErrorHandling(async (options: DbOptions, command: Command) => {
      const ctx = await createCommandContext(command);
      const out = resolveOutput(ctx);
      const store = openCatalogStore(ctx);

      const catalog = await store.load({ forceRefresh: options.refresh === true });

      if (options.dump) {
        console.log(JSON.stringify(encodeCatalog(catalog), null, 2));
        return;
      }

      if (options.details || !options.refresh) {
        const status = await store.status();
        out.note(
          [
            `Last updated: ${status.createdAt.toLocaleString()}`,
            `Next scheduled update: ${status.expiresAt.toLocaleString()}`,
            `Categories: ${status.categoryCount}`,
            `Packages: ${status.packageCount}`
          ].join('\n'),
          'Package catalog'
        );
      }
    }));
}
