import { basename, join } from 'path';

import type { Catalog, InstalledSet, PackageRecord, ProcessRunner } from '../../types/index.js';
import { DIR_PATTERNS } from '../../constants/index.js';
import { exists, isDirectory, listDirectories } from '../../utils/fs.js';
import { ConfigError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { OutputPort } from '../ports/output.js';
import { consoleOutput } from '../ports/console-output.js';
import { sameRepository, withDirectory } from '../package-record.js';

/**
 * A git checkout found under the modules directory.
 */
export interface LocalClone {
  /** Basename of the remote URL without `.git` */
  projectName: string;
  remoteUrl: string;
  directory: string;
}

export function projectNameFromRemote(remoteUrl: string): string {
  return basename(remoteUrl.trim()).replace(/\.git$/, '');
}

/**
 * Correlates git checkouts under `<root>/modules` with catalog entries by
 * their `remote.origin.url`.
 */
export class InstalledResolver {
  constructor(
    private readonly modulesDir: string,
    private readonly runner: ProcessRunner,
    private readonly output: OutputPort = consoleOutput
  ) {}

  /**
   * Directories with a `.git` entry, with their remote. A directory whose
   * remote cannot be read is reported and skipped.
   */
  async discoverClones(): Promise<LocalClone[]> {
    if (!(await isDirectory(this.modulesDir))) {
      throw new ConfigError(
        `Failed to find the MagicMirror modules directory at ${this.modulesDir}. Check the magicmirrorRoot setting`
      );
    }

    const clones: LocalClone[] = [];
    for (const name of await listDirectories(this.modulesDir)) {
      const directory = join(this.modulesDir, name);
      if (!(await exists(join(directory, DIR_PATTERNS.GIT)))) {
        continue;
      }

      const result = await this.runner.run(['git', 'config', '--get', 'remote.origin.url'], { cwd: directory });
      const remoteUrl = result.stdout.trim();
      if (result.code !== 0 || !remoteUrl) {
        this.output.error(`Unable to determine repository origin for ${name}`);
        logger.debug(`git config failed in ${directory}`, { code: result.code, stderr: result.stderr });
        continue;
      }

      clones.push({ projectName: projectNameFromRemote(remoteUrl), remoteUrl, directory });
    }
    return clones;
  }

  /**
   * Every catalog category, in catalog order, holding the packages with a
   * matching local clone. A package cloned more than once appears once per
   * clone.
   */
  async scan(catalog: Catalog): Promise<InstalledSet> {
    const clones = await this.discoverClones();
    const installed: InstalledSet = new Map();

    for (const [category, records] of catalog) {
      const matches: PackageRecord[] = [];
      for (const record of records) {
        for (const clone of clones) {
          if (sameRepository(record.repository, clone.remoteUrl)) {
            matches.push(withDirectory(record, clone.directory));
          }
        }
      }
      installed.set(category, matches);
    }

    return installed;
  }
}

export function hasInstalledPackages(installed: InstalledSet): boolean {
  for (const records of installed.values()) {
    if (records.length > 0) {
      return true;
    }
  }
  return false;
}
