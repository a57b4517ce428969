import { availableParallelism } from 'os';
import { join } from 'path';

import type { ProcessRunner } from '../../types/index.js';
import { DEPENDENCY_MARKERS, DIR_PATTERNS, type DependencyMarker } from '../../constants/index.js';
import { ensureDir, isFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { OutputPort } from '../ports/output.js';
import { consoleOutput } from '../ports/console-output.js';

export type DependencyInstallResult =
  | { ok: true }
  | { ok: false; step: string; stderr: string };

/**
 * Marker lookup is case-insensitive in the sense the shell tools accept:
 * the canonical, lower-case and upper-case spellings are probed.
 */
export async function hasMarker(directory: string, marker: DependencyMarker): Promise<boolean> {
  for (const name of new Set([marker, marker.toLowerCase(), marker.toUpperCase()])) {
    if (await isFile(join(directory, name))) {
      return true;
    }
  }
  return false;
}

/**
 * Runs the build steps a freshly cloned or pulled package needs, each only
 * when its marker file is present, in this order: package.json, Gemfile,
 * Makefile, CMakeLists.txt. A successful CMake configure is followed by a
 * Makefile check inside the build directory.
 */
export class DependencyInstaller {
  constructor(
    private readonly runner: ProcessRunner,
    private readonly output: OutputPort = consoleOutput,
    private readonly jobs: number = availableParallelism()
  ) {}

  async install(directory: string): Promise<DependencyInstallResult> {
    logger.info(`Installing dependencies in ${directory}`);

    if (await hasMarker(directory, DEPENDENCY_MARKERS.PACKAGE_JSON)) {
      const result = await this.step(directory, 'npm install', ['npm', 'install']);
      if (!result.ok) return result;
    }

    if (await hasMarker(directory, DEPENDENCY_MARKERS.GEMFILE)) {
      const result = await this.step(directory, 'bundle install', ['bundle', 'install']);
      if (!result.ok) return result;
    }

    const hasTopLevelMakefile = await hasMarker(directory, DEPENDENCY_MARKERS.MAKEFILE);
    if (hasTopLevelMakefile) {
      const result = await this.make(directory);
      if (!result.ok) return result;
    }

    if (await hasMarker(directory, DEPENDENCY_MARKERS.CMAKELISTS)) {
      const buildDir = join(directory, DIR_PATTERNS.BUILD);
      await ensureDir(buildDir);

      const configured = await this.step(buildDir, 'cmake', ['cmake', '..']);
      if (!configured.ok) return configured;

      if (await hasMarker(buildDir, DEPENDENCY_MARKERS.MAKEFILE)) {
        if (hasTopLevelMakefile) {
          logger.debug(`Both ${directory} and ${buildDir} carry a Makefile; building twice`);
        }
        const result = await this.make(buildDir);
        if (!result.ok) return result;
      }
    }

    logger.info(`Dependencies installed in ${directory}`);
    return { ok: true };
  }

  private make(cwd: string): Promise<DependencyInstallResult> {
    return this.step(cwd, `make -j ${this.jobs}`, ['make', '-j', String(this.jobs)]);
  }

  private async step(cwd: string, label: string, argv: string[]): Promise<DependencyInstallResult> {
    this.output.step(`Running '${label}' in ${cwd}`);
    const result = await this.runner.run(argv, { cwd });
    if (result.code !== 0) {
      logger.info(`'${label}' failed with exit code ${result.code}`, { stderr: result.stderr });
      return { ok: false, step: label, stderr: result.stderr || `'${label}' exited with code ${result.code}` };
    }
    return { ok: true };
  }
}
