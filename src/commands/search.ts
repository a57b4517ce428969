import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { openCatalogStore } from '../core/catalog/catalog-store.js';
import { searchCatalog } from '../core/catalog/catalog-query.js';
import { countRecords, formatCatalogListing } from '../utils/formatters.js';

interface SearchCommandOptions {
  caseSensitive?: boolean;
  titleOnly?: boolean;
}

export function setupSearchCommand(program: Command): void {
  program
    .command('search')
    .argument('<query>', 'text matched against titles, descriptions and authors, or a category name')
    .description('Search the package catalog')
    .option('-c, --case-sensitive', 'match case')
    .option('-t, --title-only', 'match exact titles only')
    .action(withErrorHandling(async (query: string, options: SearchCommandOptions, command: Command) => {
      const ctx = await createCommandContext(command);
      const out = resolveOutput(ctx);
      const catalog = await openCatalogStore(ctx).load();

      const results = searchCatalog(catalog, query, options);
      if (countRecords(results) === 0) {
        out.info(`No packages matched '${query}'`);
        return;
      }

      for (const line of formatCatalogListing(results)) {
        console.log(line);
      }
    }));
}
