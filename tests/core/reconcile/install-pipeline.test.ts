import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import type { Catalog, PackageRecord } from '../../../src/types/index.js';
import { InstallPipeline, cloneCommand, resolveInstallTargets } from '../../../src/core/reconcile/install-pipeline.js';
import { ConfigError, OperationInterruptedError } from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import {
  FakeRunner,
  RecordingOutput,
  ScriptedPrompt,
  type RecordedCall,
  type TestContext,
  makeContext,
  makeTempDir,
  record,
  removeTempDir
} from '../../test-helpers.js';

async function fakeClone(call: RecordedCall): Promise<{ code: number }> {
  const target = call.argv[call.argv.length - 1];
  if (target !== undefined) {
    await mkdir(join(target, '.git'), { recursive: true });
  }
  return { code: 0 };
}

describe('resolveInstallTargets', () => {
  const catalog: Catalog = new Map([
    ['Weather', [record('MMM-Sun', 'https://x/sun')]],
    ['Misc', [record('MMM-Sun', 'https://x/sun-fork'), record('MMM-Rain', 'https://x/rain')]]
  ]);

  it('keeps every category match and reports misses', () => {
    const output = new RecordingOutput();

    const targets = resolveInstallTargets(catalog, ['MMM-Sun', 'mmm-rain', 'MMM-Rain'], output);

    assert.deepEqual(targets.map(entry => entry.repository), ['https://x/sun', 'https://x/sun-fork', 'https://x/rain']);
    assert.deepEqual(output.of('error'), ["Unable to match package to query of 'mmm-rain'. Is there a typo?"]);
  });
});

describe('cloneCommand', () => {
  it('passes extra arguments of a repository string to git', () => {
    assert.deepEqual(cloneCommand(' https://x/a.git -b dev ', '/mm/modules/a'), [
      'git', 'clone', 'https://x/a.git', '-b', 'dev', '/mm/modules/a'
    ]);
  });
});

describe('InstallPipeline', () => {
  let dir: string;
  let ctx: TestContext;

  beforeEach(async () => {
    dir = await makeTempDir('install');
    ctx = await makeContext(dir, { assumeYes: true });
    ctx.runner.on('git clone', fakeClone);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('clones into <modules>/<title> and installs dependencies', async () => {
    const target = join(ctx.environment.modulesDir, 'MMM-Rain');
    ctx.runner.on('git clone', async call => {
      await fakeClone(call);
      await writeFile(join(target, 'package.json'), '{}');
      return {};
    });

    assert.equal(await new InstallPipeline(ctx).install([record('MMM-Rain', 'https://x/rain')]), true);

    assert.deepEqual(ctx.runner.calls, [
      { argv: ['git', 'clone', 'https://x/rain', target], cwd: ctx.environment.modulesDir },
      { argv: ['npm', 'install'], cwd: target }
    ]);
    assert.deepEqual(ctx.output.of('success'), ['Installed MMM-Rain']);
  });

  it('reports a conflict, skips that candidate and installs the rest', async () => {
    await mkdir(join(ctx.environment.modulesDir, 'MMM-Taken'));

    const installed = await new InstallPipeline(ctx).install([
      record('MMM-Taken', 'https://x/taken'),
      record('MMM-Free', 'https://x/free')
    ]);

    assert.equal(installed, true);
    assert.deepEqual(ctx.runner.commandLines(), [
      `git clone https://x/free ${join(ctx.environment.modulesDir, 'MMM-Free')}`
    ]);
    assert.equal(ctx.output.of('error').length, 1);
    assert.ok(ctx.output.of('error')[0]?.startsWith('A module named MMM-Taken is already installed'));
  });

  it('treats a second candidate with the same title as a conflict', async () => {
    const installed = await new InstallPipeline(ctx).install([
      record('MMM-Sun', 'https://x/sun'),
      record('MMM-Sun', 'https://x/sun-fork')
    ]);

    assert.equal(installed, true);
    assert.equal(ctx.runner.commandLines().filter(line => line.startsWith('git clone')).length, 1);
  });

  it('skips declined candidates', async () => {
    const prompt = new ScriptedPrompt([false, true]);
    ctx = await makeContext(dir, { prompt, runner: new FakeRunner().on('git clone', fakeClone) });

    await new InstallPipeline(ctx).install([record('A', 'https://x/a'), record('B', 'https://x/b')]);

    assert.deepEqual(prompt.asked, ['Install A (https://x/a)?', 'Install B (https://x/b)?']);
    assert.deepEqual(ctx.runner.commandLines(), [`git clone https://x/b ${join(ctx.environment.modulesDir, 'B')}`]);
  });

  it('offers to remove the clone after a dependency failure', async () => {
    const prompt = new ScriptedPrompt([true, true]);
    const target = join(ctx.environment.modulesDir, 'MMM-Broken');
    const runner = new FakeRunner()
      .on('git clone', async call => {
        await fakeClone(call);
        await writeFile(join(target, 'Makefile'), '');
        return {};
      })
      .on('make', { code: 2, stderr: 'make: *** [all] Error 1' });
    ctx = await makeContext(dir, { prompt, runner });

    assert.equal(await new InstallPipeline(ctx).install([record('MMM-Broken', 'https://x/broken')]), false);

    assert.deepEqual(prompt.asked, [
      'Install MMM-Broken (https://x/broken)?',
      `Failed to install MMM-Broken at '${target}'. Remove the directory?`
    ]);
    assert.equal(await exists(target), false);
  });

  it('keeps the clone when the user declines removal', async () => {
    const prompt = new ScriptedPrompt([true, false]);
    const target = join(ctx.environment.modulesDir, 'MMM-Broken');
    const runner = new FakeRunner()
      .on('git clone', async call => {
        await fakeClone(call);
        await writeFile(join(target, 'Gemfile'), '');
        return {};
      })
      .on('bundle install', { code: 1 });
    ctx = await makeContext(dir, { prompt, runner });

    assert.equal(await new InstallPipeline(ctx).install([record('MMM-Broken', 'https://x/broken')]), false);
    assert.equal(await exists(target), true);
  });

  it('reports a failed clone and continues', async () => {
    ctx.runner.on('git clone https://x/gone', { code: 128, stderr: 'fatal: repository not found' });

    const installed = await new InstallPipeline(ctx).install([
      record('Gone', 'https://x/gone'),
      record('Here', 'https://x/here')
    ]);

    assert.equal(installed, true);
    assert.deepEqual(ctx.output.of('error'), ['Failed to clone Gone: fatal: repository not found']);
    assert.deepEqual(ctx.output.of('success'), ['Installed Here']);
  });

  it('leaves whatever already sat at the target when the clone fails', async () => {
    const target = join(ctx.environment.modulesDir, 'MMM-Note');
    await writeFile(target, 'notes');
    ctx.runner.on('git clone', { code: 128, stderr: `fatal: destination path '${target}' already exists` });

    assert.equal(await new InstallPipeline(ctx).install([record('MMM-Note', 'https://x/note')]), false);

    assert.equal(await exists(target), true);
    assert.deepEqual(ctx.output.of('success'), []);
  });

  it('refuses titles that resolve to the modules directory or above it', async () => {
    const kept = join(ctx.environment.modulesDir, 'MMM-Other', 'keep.js');
    await mkdir(dirname(kept));
    await writeFile(kept, '');
    const unusable = ['.', '..'].map((title): PackageRecord => ({
      title,
      author: 'N/A',
      description: 'N/A',
      repository: 'https://x/dot',
      directory: ''
    }));

    assert.equal(await new InstallPipeline(ctx).install(unusable), false);

    const { modulesDir } = ctx.environment;
    assert.deepEqual(ctx.output.of('error'), [
      `Refusing to install .: ${modulesDir} is not a directory of its own in ${modulesDir}`,
      `Refusing to install ..: ${dirname(modulesDir)} is not a directory of its own in ${modulesDir}`
    ]);
    assert.deepEqual(ctx.runner.calls, []);
    assert.equal(await exists(kept), true);
  });

  it('removes the partial clone when interrupted and rethrows', async () => {
    const target = join(ctx.environment.modulesDir, 'MMM-Slow');
    const runner = new FakeRunner()
      .on('git clone', async call => {
        await fakeClone(call);
        await writeFile(join(target, 'package.json'), '{}');
        return {};
      })
      .on('npm install', () => {
        throw new OperationInterruptedError('Interrupted by user');
      });
    ctx = await makeContext(dir, { assumeYes: true, runner });

    await assert.rejects(new InstallPipeline(ctx).install([record('MMM-Slow', 'https://x/slow')]), OperationInterruptedError);
    assert.equal(await exists(target), false);
  });

  it('returns false without candidates', async () => {
    assert.equal(await new InstallPipeline(ctx).install([]), false);
    assert.deepEqual(ctx.output.of('error'), ['Unable to match query to any installation candidates']);
  });

  it('is a configuration error when the modules directory is missing', async () => {
    ctx.environment = { ...ctx.environment, modulesDir: join(dir, 'missing') };

    await assert.rejects(new InstallPipeline(ctx).install([record('A', 'https://x/a')]), ConfigError);
  });
});
