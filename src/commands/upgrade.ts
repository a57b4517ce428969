import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { UpgradePipeline, isEmptySelection } from '../core/reconcile/upgrade-pipeline.js';

export function setupUpgradeCommand(program: Command): void {
  program
    .command('upgrade')
    .argument('[selection...]', 'package titles, mmpkg or MagicMirror (default: everything pending)')
    .description('Apply upgrades found by `mmpkg update`')
    .action(withErrorHandling(async (selection: string[], _options: object, command: Command) => {
      const ctx = await createCommandContext(command);
      const pipeline = new UpgradePipeline(ctx);

      const confirmed = await pipeline.selectUpgrades(selection);
      if (isEmptySelection(confirmed)) {
        return;
      }
      if (!(await pipeline.upgrade(confirmed))) {
        process.exitCode = 1;
      }
    }));
}
