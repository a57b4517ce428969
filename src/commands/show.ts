import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { openCatalogStore } from '../core/catalog/catalog-store.js';
import { findByTitle } from '../core/catalog/catalog-query.js';
import { formatRecordDetails } from '../utils/formatters.js';

export function setupShowCommand(program: Command): void {
  program
    .command('show')
    .argument('<titles...>', 'exact package titles')
    .description('Show the details of packages')
    .action(withErrorHandling(async (titles: string[], _options: object, command: Command) => {
      const ctx = await createCommandContext(command);
      const out = resolveOutput(ctx);
      const catalog = await openCatalogStore(ctx).load();

      for (const title of titles) {
        const found = findByTitle(catalog, title);
        if (found.length === 0) {
          out.error(`Unable to match '${title}' to a package`);
          continue;
        }
        for (const { category, record } of found) {
          console.log(formatRecordDetails(record, category));
        }
      }
    }));
}
