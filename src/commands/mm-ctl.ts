import { Command } from 'commander';
import pc from 'picocolors';

import { DASHBOARD_NAME } from '../constants/index.js';
import { ValidationError, withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { DashboardProcessControl } from '../core/dashboard/process-control.js';
import { ModuleBridge, type ToggleResult } from '../core/dashboard/module-bridge.js';
import type { OutputPort } from '../core/ports/output.js';

interface MmCtlOptions {
  start?: boolean;
  stop?: boolean;
  restart?: boolean;
  status?: boolean;
  hide?: string[];
  show?: string[];
}

function reportToggle(out: OutputPort, result: ToggleResult | null, names: string[], verb: string): boolean {
  if (result === null) {
    return false;
  }
  for (const name of names.filter(candidate => !result.fails.includes(candidate))) {
    out.success(`${verb} ${name}`);
  }
  for (const failed of result.fails) {
    out.error(`Unable to find module '${failed}'`);
  }
  return result.fails.length === 0;
}

export function setupMmCtlCommand(program: Command): void {
  program
    .command('mm-ctl')
    .description(`Control ${DASHBOARD_NAME} and the modules it displays`)
    .option('--start', `start ${DASHBOARD_NAME}`)
    .option('--stop', `stop ${DASHBOARD_NAME}`)
    .option('--restart', `restart ${DASHBOARD_NAME}`)
    .option('--status', 'list active modules and whether they are hidden')
    .option('--hide <names...>', 'hide modules')
    .option('--show <names...>', 'show hidden modules')
    .action(withErrorHandling(async (options: MmCtlOptions, command: Command) => {
      const ctx = await createCommandContext(command);
      const out = resolveOutput(ctx);
      const control = new DashboardProcessControl(ctx);
      const bridge = new ModuleBridge(ctx.environment, out, undefined, ctx.logger);
      let ok = true;

      if (options.start) {
        ok = await control.start();
      } else if (options.stop) {
        ok = await control.stop();
      } else if (options.restart) {
        ok = await control.restart();
      } else if (options.status) {
        const modules = await bridge.getActiveModules();
        ok = modules !== null;
        for (const module of modules ?? []) {
          console.log(`${pc.green(module.name)} ${module.hidden ? pc.dim('hidden') : 'visible'}`);
        }
      } else if (options.hide) {
        ok = reportToggle(out, await bridge.hideModules(options.hide), options.hide, 'Hid');
      } else if (options.show) {
        ok = reportToggle(out, await bridge.showModules(options.show), options.show, 'Showed');
      } else {
        throw new ValidationError('choose one of --start, --stop, --restart, --status, --hide or --show');
      }

      if (!ok) {
        process.exitCode = 1;
      }
    }));
}
