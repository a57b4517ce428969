import { basename } from 'path';

import type { InstalledSet, PackageRecord } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { listDirectories, remove } from '../../utils/fs.js';
import { confirmAction, resolveOutput } from '../ports/resolve.js';
import { UpgradeLedger } from '../upgrades/upgrade-ledger.js';

/**
 * Deletes installed packages whose directory name was requested.
 */
export class RemovePipeline {
  private readonly ledger: UpgradeLedger;

  constructor(private readonly ctx: ExecutionContext, ledger?: UpgradeLedger) {
    this.ledger = ledger ?? new UpgradeLedger(ctx.paths.upgradesFile, ctx.environment.root);
  }

  /**
   * Requested names are matched against the basenames of installed
   * directories. Unmatched names are reported as not installed; declined
   * ones are only logged. Returns whether anything was removed.
   */
  async remove(installed: InstalledSet, requestedTitles: string[]): Promise<boolean> {
    const out = resolveOutput(this.ctx);
    const { modulesDir, root } = this.ctx.environment;
    const present = new Set(await listDirectories(modulesDir));

    const marked: PackageRecord[] = [];
    const cancelled: string[] = [];

    for (const records of installed.values()) {
      for (const record of records) {
        const name = basename(record.directory);
        if (!present.has(name) || !requestedTitles.includes(name)) {
          continue;
        }
        if (marked.some(seen => seen.directory === record.directory) || cancelled.includes(name)) {
          continue;
        }
        if (await confirmAction(this.ctx, `Remove ${record.title} (${record.directory})?`)) {
          marked.push(record);
          this.ctx.logger.info(`User marked ${name} for removal`);
        } else {
          cancelled.push(name);
          this.ctx.logger.info(`User chose not to remove ${name}`);
        }
      }
    }

    const markedNames = marked.map(record => basename(record.directory));
    for (const title of requestedTitles) {
      if (!markedNames.includes(title) && !cancelled.includes(title)) {
        out.error(`'${title}' is not installed`);
      }
    }

    for (const record of marked) {
      await remove(record.directory);
      await this.ledger.clearPackageUpgrade(root, record);
      out.success(`Removed ${basename(record.directory)}`);
    }

    if (marked.length > 0) {
      out.info('Delete the configuration of removed modules from the MagicMirror config.js');
    }
    return marked.length > 0;
  }
}
