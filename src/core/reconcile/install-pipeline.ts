import { dirname, join, resolve } from 'path';

import type { Catalog, PackageRecord } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { exists, isDirectory, listDirectories, remove } from '../../utils/fs.js';
import { ConfigError, isInterrupted } from '../../utils/errors.js';
import type { OutputPort } from '../ports/output.js';
import { confirmAction, resolveOutput } from '../ports/resolve.js';
import { withDirectory } from '../package-record.js';
import { findByTitle } from '../catalog/catalog-query.js';
import { DependencyInstaller } from './dependency-installer.js';

/**
 * Exact, case-sensitive title lookup across every category. A title found in
 * several categories yields every match; an unmatched title is reported and
 * left out.
 */
export function resolveInstallTargets(
  catalog: Catalog,
  requestedTitles: string[],
  output: OutputPort = resolveOutput()
): PackageRecord[] {
  const targets: PackageRecord[] = [];
  for (const title of requestedTitles) {
    const found = findByTitle(catalog, title);
    if (found.length === 0) {
      output.error(`Unable to match package to query of '${title}'. Is there a typo?`);
      continue;
    }
    targets.push(...found.map(match => match.record));
  }
  return targets;
}

/**
 * `git clone` accepts extra arguments baked into an external package's
 * repository string, e.g. `https://host/repo.git -b branch`.
 */
export function cloneCommand(repository: string, target: string): string[] {
  return ['git', 'clone', ...repository.trim().split(/\s+/), target];
}

/**
 * Clones confirmed candidates into `<modules>/<title>` and installs their
 * dependencies, one package at a time.
 */
export class InstallPipeline {
  private readonly installer: DependencyInstaller;

  constructor(private readonly ctx: ExecutionContext, installer?: DependencyInstaller) {
    this.installer = installer ?? new DependencyInstaller(ctx.runner, resolveOutput(ctx));
  }

  /**
   * Returns whether at least one candidate was installed.
   */
  async install(candidates: PackageRecord[]): Promise<boolean> {
    const out = resolveOutput(this.ctx);
    const { modulesDir } = this.ctx.environment;

    if (!(await isDirectory(modulesDir))) {
      throw new ConfigError(
        `MagicMirror modules directory not found at ${modulesDir}. Check the magicmirrorRoot setting`
      );
    }

    if (candidates.length === 0) {
      out.error('Unable to match query to any installation candidates');
      return false;
    }

    out.info(`Matched query to ${candidates.length} ${candidates.length === 1 ? 'package' : 'packages'}`);

    const confirmed: PackageRecord[] = [];
    for (const candidate of candidates) {
      if (await confirmAction(this.ctx, `Install ${candidate.title} (${candidate.repository})?`)) {
        confirmed.push(candidate);
      } else {
        this.ctx.logger.info(`User chose not to install ${candidate.title}`);
      }
    }

    const knownDirectories = new Set(
      (await listDirectories(modulesDir)).map(name => resolve(modulesDir, name))
    );
    let installedAny = false;

    for (const candidate of confirmed) {
      const target = resolve(join(modulesDir, candidate.title));

      if (dirname(target) !== resolve(modulesDir)) {
        out.error(`Refusing to install ${candidate.title}: ${target} is not a directory of its own in ${modulesDir}`);
        continue;
      }

      if (knownDirectories.has(target)) {
        this.ctx.logger.error(`Conflict: ${candidate.title} already present at ${target}`);
        out.error(`A module named ${candidate.title} is already installed in ${target}. Remove ${candidate.title} first`);
        continue;
      }

      if (await this.installOne(withDirectory(candidate, target))) {
        knownDirectories.add(target);
        installedAny = true;
      }
    }

    if (installedAny) {
      out.info('Edit the MagicMirror config.js to enable the newly installed modules');
    }
    return installedAny;
  }

  private async installOne(record: PackageRecord): Promise<boolean> {
    const out = resolveOutput(this.ctx);
    const { modulesDir } = this.ctx.environment;
    // anything already at the target is not ours to clean up
    const preexisting = await exists(record.directory);

    try {
      out.step(`Installing ${record.title}`);
      this.ctx.logger.info(`Cloning ${record.repository} into ${record.directory}`);

      const clone = await this.ctx.runner.run(cloneCommand(record.repository, record.directory), { cwd: modulesDir });
      if (clone.code !== 0) {
        out.error(`Failed to clone ${record.title}: ${clone.stderr.trim()}`);
        if (!preexisting) {
          await this.offerCleanup(record);
        }
        return false;
      }

      const dependencies = await this.installer.install(record.directory);
      if (!dependencies.ok) {
        out.error(`'${dependencies.step}' failed: ${dependencies.stderr.trim()}`);
        this.ctx.logger.error(`Failed to install ${record.title} at '${record.directory}'`);
        if (!preexisting) {
          await this.offerCleanup(record);
        }
        return false;
      }

      out.success(`Installed ${record.title}`);
      return true;
    } catch (error) {
      if (isInterrupted(error) && !preexisting) {
        this.ctx.logger.info(`Cleaning up cancelled installation path of ${record.directory}`);
        await remove(record.directory);
      }
      throw error;
    }
  }

  /**
   * After a failed step the directory this attempt created stays unless the
   * user asks for it to be removed.
   */
  private async offerCleanup(record: PackageRecord): Promise<void> {
    const out = resolveOutput(this.ctx);
    if (!(await exists(record.directory))) {
      return;
    }

    const yes = await confirmAction(
      this.ctx,
      `Failed to install ${record.title} at '${record.directory}'. Remove the directory?`
    );
    if (yes) {
      await remove(record.directory);
      out.success(`Removed '${record.directory}'`);
    } else {
      out.info(`Keeping ${record.title} at '${record.directory}'`);
      this.ctx.logger.info(`Keeping ${record.title} at '${record.directory}'`);
    }
  }
}
