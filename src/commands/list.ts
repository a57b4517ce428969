import { Command } from 'commander';
import pc from 'picocolors';

import type { Catalog, ExecutionContext } from '../types/index.js';
import { CATALOG_KEYS, DASHBOARD_NAME, TOOL_NAME } from '../constants/index.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { openCatalogStore } from '../core/catalog/catalog-store.js';
import { categorySummaries, flattenCatalog } from '../core/catalog/catalog-query.js';
import { ExternalPackagesStore } from '../core/catalog/external-packages.js';
import { InstalledResolver } from '../core/installed/installed-resolver.js';
import { UpgradeLedger } from '../core/upgrades/upgrade-ledger.js';
import { formatCatalogListing, formatRecordLine } from '../utils/formatters.js';

interface ListOptions {
  all?: boolean;
  installed?: boolean;
  categories?: boolean;
  upgradable?: boolean;
  external?: boolean;
  titleOnly?: boolean;
}

function printCatalog(catalog: Catalog, titleOnly: boolean): void {
  if (titleOnly) {
    for (const record of flattenCatalog(catalog)) {
      console.log(record.title);
    }
    return;
  }
  for (const line of formatCatalogListing(catalog)) {
    console.log(line);
  }
}

async function listUpgradable(ctx: ExecutionContext, titleOnly: boolean): Promise<void> {
  const out = resolveOutput(ctx);
  const ledger = new UpgradeLedger(ctx.paths.upgradesFile, ctx.environment.root);
  const document = await ledger.get();
  const { packages, dashboardAppUpgrade } = await ledger.forRoot();

  if (packages.length === 0 && !dashboardAppUpgrade && !document.toolSelfUpgrade) {
    out.info(`No upgrades available. Run '${TOOL_NAME} update' to check for new ones`);
    return;
  }

  for (const record of packages) {
    console.log(titleOnly ? record.title : formatRecordLine(record));
  }
  if (dashboardAppUpgrade) {
    console.log(titleOnly ? DASHBOARD_NAME : `${pc.green(DASHBOARD_NAME)} ${pc.dim('[application]')}`);
  }
  if (document.toolSelfUpgrade) {
    console.log(titleOnly ? TOOL_NAME : `${pc.green(TOOL_NAME)} ${pc.dim('[application]')}`);
  }
}

export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List catalog, installed, upgradable or external packages')
    .option('-a, --all', 'every package in the catalog')
    .option('-i, --installed', 'packages installed in the MagicMirror modules directory')
    .option('-c, --categories', 'category names with their package counts')
    .option('-u, --upgradable', 'packages and applications with a pending upgrade')
    .option('-e, --external', 'external packages registered with ext-pkg')
    .option('-t, --title-only', 'print titles only')
    .action(withErrorHandling(async (options: ListOptions, command: Command) => {
      const ctx = await createCommandContext(command);
      const titleOnly = options.titleOnly === true;

      if (options.upgradable) {
        await listUpgradable(ctx, titleOnly);
        return;
      }

      if (options.external) {
        const store = new ExternalPackagesStore(ctx.paths.externalPackagesFile);
        const records = (await store.isPresent()) ? await store.read() : [];
        printCatalog(new Map([[CATALOG_KEYS.EXTERNAL_PACKAGES, records]]), titleOnly);
        return;
      }

      if (!options.all && !options.installed && !options.categories) {
        throw new ValidationError('choose one of --all, --installed, --categories, --upgradable or --external');
      }

      const catalog = await openCatalogStore(ctx).load();

      if (options.categories) {
        for (const { category, packageCount } of categorySummaries(catalog)) {
          console.log(titleOnly ? category : `${pc.cyan(category)} ${pc.dim(`(${packageCount})`)}`);
        }
        return;
      }

      if (options.installed) {
        const resolver = new InstalledResolver(ctx.environment.modulesDir, ctx.runner, resolveOutput(ctx));
        printCatalog(await resolver.scan(catalog), titleOnly);
        return;
      }

      printCatalog(catalog, titleOnly);
    }));
}
