import { join } from 'path';
import * as semver from 'semver';
import { z } from 'zod';

import type { Catalog, InstalledSet, PackageRecord } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { DEFAULTS, DIR_PATTERNS, TOOL_NAME, DASHBOARD_NAME } from '../../constants/index.js';
import { exists } from '../../utils/fs.js';
import { ConfigError } from '../../utils/errors.js';
import { resolveOutput } from '../ports/resolve.js';
import { InstalledResolver, hasInstalledPackages } from '../installed/installed-resolver.js';
import { UpgradeLedger } from '../upgrades/upgrade-ledger.js';

const releaseSchema = z.object({ version: z.string() });

/**
 * A dry-run fetch prints the refs it would update. git writes that report
 * to stderr, so both streams count.
 */
function fetchReportsChanges(stdout: string, stderr: string): boolean {
  return (stdout + stderr).trim().length > 0;
}

/**
 * Probes installed packages, the dashboard and the tool itself for
 * upgrades and records the results in the ledger.
 */
export class UpdateChecker {
  private readonly ledger: UpgradeLedger;

  constructor(private readonly ctx: ExecutionContext, ledger?: UpgradeLedger) {
    this.ledger = ledger ?? new UpgradeLedger(ctx.paths.upgradesFile, ctx.environment.root);
  }

  async checkForPackageUpdates(catalog: Catalog): Promise<PackageRecord[]> {
    const resolver = new InstalledResolver(this.ctx.environment.modulesDir, this.ctx.runner, resolveOutput(this.ctx));
    return this.findUpdateCandidates(await resolver.scan(catalog));
  }

  /**
   * Installed packages whose remote has changes, in installed order. Each
   * clone is probed once, however many categories list it. A probe that fails
   * is reported and the package is left out. With nothing installed the
   * ledger entry of the current root is reset.
   */
  async findUpdateCandidates(installed: InstalledSet): Promise<PackageRecord[]> {
    const out = resolveOutput(this.ctx);
    const { root } = this.ctx.environment;

    if (!hasInstalledPackages(installed)) {
      if (!(await this.ledger.resetForRoot(root))) {
        this.ctx.logger.error('Failed to reset available upgrades for the current environment');
      }
      return [];
    }

    const candidates: PackageRecord[] = [];
    const probed = new Set<string>();
    for (const records of installed.values()) {
      for (const record of records) {
        if (probed.has(record.directory)) {
          continue;
        }
        probed.add(record.directory);
        out.step(`Checking ${record.title} [package] for updates`);
        const result = await this.ctx.runner.run(['git', 'fetch', '--dry-run'], { cwd: record.directory });
        if (result.code !== 0) {
          out.warn(`Unable to communicate with git server for ${record.title}`);
          this.ctx.logger.debug('git fetch --dry-run failed', { directory: record.directory, stderr: result.stderr });
          continue;
        }
        if (fetchReportsChanges(result.stdout, result.stderr)) {
          candidates.push(record);
        }
      }
    }

    await this.ledger.recordPackageUpgrades(root, candidates);
    return candidates;
  }

  async checkForDashboardUpdate(): Promise<boolean> {
    const out = resolveOutput(this.ctx);
    const { root } = this.ctx.environment;

    if (!(await exists(root))) {
      throw new ConfigError(`${DASHBOARD_NAME} root directory not found at ${root}. Check the magicmirrorRoot setting`);
    }

    let available = false;
    if (!(await exists(join(root, DIR_PATTERNS.GIT)))) {
      out.warn(`The ${DASHBOARD_NAME} root is not a git repository. Container installs cannot be upgraded by ${TOOL_NAME}`);
    } else {
      out.step(`Checking ${DASHBOARD_NAME} [application] for updates`);
      const result = await this.ctx.runner.run(['git', 'fetch', '--dry-run'], { cwd: root });
      if (result.code !== 0) {
        out.error('Unable to communicate with git server');
      } else {
        available = fetchReportsChanges(result.stdout, result.stderr);
      }
    }

    await this.ledger.recordAppUpgrade(root, available);
    return available;
  }

  /**
   * Compare the running version with the registry's latest release. A
   * failed lookup is reported and leaves the ledger untouched.
   */
  async checkForToolUpdate(currentVersion: string, releaseUrl: string = DEFAULTS.TOOL_RELEASE_URL): Promise<boolean> {
    const out = resolveOutput(this.ctx);
    out.step(`Checking ${TOOL_NAME} [application] for updates`);

    const result = await this.ctx.runner.run(['curl', '-sL', releaseUrl]);
    if (result.code !== 0) {
      out.error(`Failed to retrieve the latest ${TOOL_NAME} version: ${result.stderr.trim()}`);
      return false;
    }

    let latest: string | null = null;
    try {
      const release = releaseSchema.safeParse(JSON.parse(result.stdout));
      latest = release.success ? semver.valid(release.data.version) : null;
    } catch (error) {
      this.ctx.logger.debug('Release document is not JSON', error);
    }
    if (!latest || !semver.valid(currentVersion)) {
      out.error(`No usable ${TOOL_NAME} version found at ${releaseUrl}`);
      return false;
    }

    const available = semver.gt(latest, currentVersion);
    this.ctx.logger.info(`Latest ${TOOL_NAME} release is ${latest}; running ${currentVersion}`);
    await this.ledger.recordToolUpgrade(available);
    return available;
  }
}
