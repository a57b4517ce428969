import type { PackageRecord } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { DASHBOARD_NAME, TOOL_NAME } from '../../constants/index.js';
import { confirmAction, resolveOutput } from '../ports/resolve.js';
import { UpgradeLedger } from '../upgrades/upgrade-ledger.js';
import { DashboardProcessControl } from '../dashboard/process-control.js';
import { DependencyInstaller } from './dependency-installer.js';

export interface UpgradeSelection {
  packages: PackageRecord[];
  tool: boolean;
  app: boolean;
}

export interface UpgradePipelineOptions {
  ledger?: UpgradeLedger;
  installer?: DependencyInstaller;
  isDashboardRunning?: () => Promise<boolean>;
}

export function isEmptySelection(selection: UpgradeSelection): boolean {
  return selection.packages.length === 0 && !selection.tool && !selection.app;
}

/**
 * Applies pending upgrades recorded in the ledger. Every success clears
 * its pending entry right away; failures stay pending for the next run.
 */
export class UpgradePipeline {
  private readonly ledger: UpgradeLedger;
  private readonly installer: DependencyInstaller;
  private readonly isDashboardRunning: () => Promise<boolean>;

  constructor(private readonly ctx: ExecutionContext, options: UpgradePipelineOptions = {}) {
    this.ledger = options.ledger ?? new UpgradeLedger(ctx.paths.upgradesFile, ctx.environment.root);
    this.installer = options.installer ?? new DependencyInstaller(ctx.runner, resolveOutput(ctx));
    this.isDashboardRunning = options.isDashboardRunning ?? (() => new DashboardProcessControl(ctx).isRunning());
  }

  /**
   * Ask about each pending upgrade. With a non-empty `requested` list only
   * the named packages (or `mmpkg` / `MagicMirror`) are offered.
   */
  async selectUpgrades(requested: string[] = []): Promise<UpgradeSelection> {
    const out = resolveOutput(this.ctx);
    const document = await this.ledger.get();
    const { packages: pending, dashboardAppUpgrade } = await this.ledger.forRoot();
    const selection: UpgradeSelection = { packages: [], tool: false, app: false };

    if (pending.length === 0 && !document.toolSelfUpgrade && !dashboardAppUpgrade) {
      out.info(`No upgrades available. Run '${TOOL_NAME} update' to check for new ones`);
      return selection;
    }

    const wanted = (name: string): boolean => requested.length === 0 || requested.includes(name);
    const offered = new Set<string>();

    for (const record of pending) {
      if (!wanted(record.title)) {
        continue;
      }
      offered.add(record.title);
      if (await confirmAction(this.ctx, `Upgrade ${record.title}?`)) {
        selection.packages.push(record);
      }
    }

    if (dashboardAppUpgrade && wanted(DASHBOARD_NAME)) {
      offered.add(DASHBOARD_NAME);
      selection.app = await confirmAction(this.ctx, `Upgrade ${DASHBOARD_NAME}?`);
    }

    if (document.toolSelfUpgrade && wanted(TOOL_NAME)) {
      offered.add(TOOL_NAME);
      selection.tool = await confirmAction(this.ctx, `Upgrade ${TOOL_NAME}?`);
    }

    const unmatched = requested.filter(name => !offered.has(name));
    if (unmatched.length > 0) {
      out.error(`No upgrades available for: ${unmatched.join(', ')}`);
    }

    return selection;
  }

  /**
   * Returns whether every selected upgrade succeeded.
   */
  async upgrade(selection: UpgradeSelection): Promise<boolean> {
    const out = resolveOutput(this.ctx);
    const { root } = this.ctx.environment;
    let succeeded = 0;
    let failed = 0;

    for (const record of selection.packages) {
      out.step(`Upgrading ${record.title}`);
      if (await this.pullAndInstall(record.title, record.directory)) {
        await this.ledger.clearPackageUpgrade(root, record);
        out.success(`Upgraded ${record.title}`);
        succeeded++;
      } else {
        failed++;
      }
    }

    if (selection.tool) {
      out.step(`Upgrading ${TOOL_NAME}`);
      const code = await this.ctx.runner.runInteractive(['npm', 'install', '-g', `${TOOL_NAME}@latest`]);
      if (code === 0) {
        await this.ledger.recordToolUpgrade(false);
        out.success(`Upgraded ${TOOL_NAME}`);
        succeeded++;
      } else {
        out.error(`Failed to upgrade ${TOOL_NAME} (npm exited with ${code})`);
        failed++;
      }
    }

    if (selection.app) {
      out.step(`Upgrading ${DASHBOARD_NAME}`);
      if (await this.pullAndInstall(DASHBOARD_NAME, root)) {
        await this.ledger.recordAppUpgrade(root, false);
        out.success(`Upgraded ${DASHBOARD_NAME}`);
        succeeded++;
      } else {
        failed++;
      }
    }

    if (succeeded > 0 && (await this.isDashboardRunning())) {
      out.note(`Restart ${DASHBOARD_NAME} for the upgrades to take effect`, 'Restart required');
    }

    return failed === 0;
  }

  private async pullAndInstall(name: string, directory: string): Promise<boolean> {
    const out = resolveOutput(this.ctx);

    const pull = await this.ctx.runner.run(['git', 'pull'], { cwd: directory });
    if (pull.code !== 0) {
      out.error(`Failed to upgrade ${name}: ${pull.stderr.trim()}`);
      return false;
    }

    const dependencies = await this.installer.install(directory);
    if (!dependencies.ok) {
      out.error(`Failed to upgrade ${name}: '${dependencies.step}' failed: ${dependencies.stderr.trim()}`);
      return false;
    }
    return true;
  }
}
