import { Command } from 'commander';

import { FILE_PATTERNS } from '../constants/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { ExternalPackagesStore } from '../core/catalog/external-packages.js';

export function setupMigrateCommand(program: Command): void {
  program
    .command('migrate')
    .description(`Migrate a legacy ${FILE_PATTERNS.LEGACY_EXTERNAL_SOURCES} to ${FILE_PATTERNS.EXTERNAL_PACKAGES}`)
    .action(withErrorHandling(async (_options: object, command: Command) => {
      const ctx = await createCommandContext(command);
      const out = resolveOutput(ctx);
      const store = new ExternalPackagesStore(ctx.paths.externalPackagesFile, ctx.paths.legacyExternalSourcesFile);

      if (await store.migrateLegacy()) {
        out.success(`Migrated ${ctx.paths.legacyExternalSourcesFile} to ${ctx.paths.externalPackagesFile}`);
      } else {
        out.info('Nothing to migrate');
      }
    }));
}
