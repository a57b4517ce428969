import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import type { Catalog } from '../../../src/types/index.js';
import { InstalledResolver, hasInstalledPackages, projectNameFromRemote } from '../../../src/core/installed/installed-resolver.js';
import { ConfigError } from '../../../src/utils/errors.js';
import { FakeRunner, RecordingOutput, makeTempDir, record, removeTempDir } from '../../test-helpers.js';

describe('InstalledResolver', () => {
  let dir: string;
  let modulesDir: string;
  let runner: FakeRunner;
  let output: RecordingOutput;

  async function clone(name: string, remote: string | null): Promise<string> {
    const directory = join(modulesDir, name);
    await mkdir(join(directory, '.git'), { recursive: true });
    runner.on(
      'git config --get remote.origin.url',
      remote === null ? { code: 1, stderr: 'fatal: not a git repository' } : { stdout: `${remote}\n` },
      directory
    );
    return directory;
  }

  beforeEach(async () => {
    dir = await makeTempDir('installed');
    modulesDir = join(dir, 'modules');
    await mkdir(modulesDir);
    runner = new FakeRunner();
    output = new RecordingOutput();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('returns only catalog packages whose repository matches a clone', async () => {
    const rainDir = await clone('MMM-Rain', 'https://x/rain');
    await clone('unlisted', 'https://x/unlisted');
    const catalog: Catalog = new Map([
      ['Weather', [record('MMM-Rain', 'https://x/rain'), record('MMM-Sun', 'https://x/sun')]],
      ['Clocks', [record('MMM-Clock', 'https://x/clock')]]
    ]);

    const installed = await new InstalledResolver(modulesDir, runner, output).scan(catalog);

    assert.deepEqual([...installed.keys()], ['Weather', 'Clocks']);
    assert.deepEqual(installed.get('Weather')?.map(entry => [entry.title, entry.directory]), [['MMM-Rain', rainDir]]);
    assert.deepEqual(installed.get('Clocks'), []);
  });

  it('skips directories without .git and never asks git about them', async () => {
    await mkdir(join(modulesDir, 'default'));

    const clones = await new InstalledResolver(modulesDir, runner, output).discoverClones();

    assert.deepEqual(clones, []);
    assert.deepEqual(runner.calls, []);
  });

  it('reports an unreadable remote and keeps scanning', async () => {
    await clone('broken', null);
    const good = await clone('good', 'https://x/good.git');

    const clones = await new InstalledResolver(modulesDir, runner, output).discoverClones();

    assert.deepEqual(clones, [{ projectName: 'good', remoteUrl: 'https://x/good.git', directory: good }]);
    assert.deepEqual(output.of('error'), ['Unable to determine repository origin for broken']);
  });

  it('is a configuration error when the modules directory is missing', async () => {
    const resolver = new InstalledResolver(join(dir, 'missing'), runner, output);

    await assert.rejects(resolver.scan(new Map()), ConfigError);
  });

  it('derives project names from remotes', () => {
    assert.equal(projectNameFromRemote('https://github.com/someone/MMM-Rain.git'), 'MMM-Rain');
    assert.equal(projectNameFromRemote('git@github.com:someone/MMM-Sun'), 'MMM-Sun');
  });

  it('detects whether anything is installed', () => {
    assert.equal(hasInstalledPackages(new Map([['A', []]])), false);
    assert.equal(hasInstalledPackages(new Map([['A', [record('x', 'y')]]])), true);
  });
});
