import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';

import {
  ExternalPackagesStore,
  addExternalPackage,
  removeExternalPackages
} from '../../../src/core/catalog/external-packages.js';
import { ConfigError, MalformedRecordError, ValidationError } from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import { ScriptedPrompt, type TestContext, makeContext, makeTempDir, record, removeTempDir } from '../../test-helpers.js';

describe('ExternalPackagesStore', () => {
  let dir: string;
  let ctx: TestContext;
  let store: ExternalPackagesStore;

  beforeEach(async () => {
    dir = await makeTempDir('external');
    ctx = await makeContext(dir);
    store = new ExternalPackagesStore(ctx.paths.externalPackagesFile, ctx.paths.legacyExternalSourcesFile);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('restores the file after adding and removing a package', async () => {
    await store.write([record('First', 'https://x/first'), record('Second', 'https://x/second')]);
    const before = await readFile(ctx.paths.externalPackagesFile, 'utf8');

    await store.add(record('Temp', 'https://x/temp'));
    const { removed } = await store.remove(['Temp'], async () => true);

    assert.deepEqual(removed.map(entry => entry.title), ['Temp']);
    assert.equal(await readFile(ctx.paths.externalPackagesFile, 'utf8'), before);
  });

  it('creates the file on the first add', async () => {
    await store.add(record('Mine', 'https://x/mine', { author: 'me', description: 'mine' }));

    assert.deepEqual(JSON.parse(await readFile(ctx.paths.externalPackagesFile, 'utf8')), {
      'External Packages': [
        { title: 'Mine', author: 'me', description: 'mine', repository: 'https://x/mine', directory: '' }
      ]
    });
  });

  it('rejects a duplicate title', async () => {
    await store.add(record('Mine', 'https://x/mine'));

    await assert.rejects(store.add(record('Mine', 'https://x/other')), ValidationError);
  });

  it('keeps declined matches and reports them separately', async () => {
    await store.write([record('A', 'https://x/a'), record('B', 'https://x/b')]);

    const result = await store.remove(['A', 'B'], async entry => entry.title === 'B');

    assert.deepEqual(result.removed.map(entry => entry.title), ['B']);
    assert.deepEqual(result.cancelled.map(entry => entry.title), ['A']);
    assert.deepEqual((await store.read()).map(entry => entry.title), ['A']);
  });

  it('is a configuration error to remove from a missing or empty file', async () => {
    await assert.rejects(store.remove(['A'], async () => true), ConfigError);

    await writeFile(ctx.paths.externalPackagesFile, '');
    await assert.rejects(store.remove(['A'], async () => true), ConfigError);

    await store.write([]);
    await assert.rejects(store.remove(['A'], async () => true), ConfigError);
  });

  it('loads a corrupt file as an empty category and warns', async () => {
    await writeFile(ctx.paths.externalPackagesFile, '{"External Packages": [{"name": "x"}]}');
    const warnings: string[] = [];

    const records = await store.loadForCatalog(message => warnings.push(message));

    assert.deepEqual(records, []);
    assert.equal(warnings.length, 1);
    assert.equal(await readFile(ctx.paths.externalPackagesFile, 'utf8'), '{"External Packages": [{"name": "x"}]}');
  });

  it('rejects a document without the package list', async () => {
    await writeFile(ctx.paths.externalPackagesFile, '{"Packages": []}');

    await assert.rejects(store.read(), MalformedRecordError);
  });

  it('migrates the legacy sources file', async () => {
    await writeFile(
      ctx.paths.legacyExternalSourcesFile,
      JSON.stringify({ 'External Module Sources': [{ title: 'Old', repository: 'https://x/old' }] })
    );

    assert.equal(await store.migrateLegacy(), true);
    assert.equal(await exists(ctx.paths.legacyExternalSourcesFile), false);
    assert.deepEqual((await store.read()).map(entry => entry.title), ['Old']);
  });

  it('has nothing to migrate without a legacy file', async () => {
    assert.equal(await store.migrateLegacy(), false);
  });
});

describe('addExternalPackage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('external-add');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('prompts for the fields that were not given', async () => {
    const prompt = new ScriptedPrompt([], ['someone', 'A module of my own']);
    const ctx = await makeContext(dir, { prompt });

    const added = await addExternalPackage(ctx, { title: 'Mine', repository: 'https://x/mine' });

    assert.deepEqual(prompt.asked, ['Author:', 'Description:']);
    assert.equal(added.author, 'someone');
    assert.equal(added.description, 'A module of my own');
  });
});

describe('removeExternalPackages', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('external-remove');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('reports when no title matched', async () => {
    const ctx = await makeContext(dir, { assumeYes: true });
    await new ExternalPackagesStore(ctx.paths.externalPackagesFile).write([record('A', 'https://x/a')]);

    assert.equal(await removeExternalPackages(ctx, ['Z']), false);
    assert.deepEqual(ctx.output.of('error'), ['No external packages found matching: Z']);
  });

  it('removes confirmed matches without prompting under --yes', async () => {
    const ctx = await makeContext(dir, { assumeYes: true });
    const store = new ExternalPackagesStore(ctx.paths.externalPackagesFile);
    await store.write([record('A', 'https://x/a'), record('B', 'https://x/b')]);

    assert.equal(await removeExternalPackages(ctx, ['A']), true);
    assert.deepEqual(ctx.prompt.asked, []);
    assert.deepEqual((await store.read()).map(entry => entry.title), ['B']);
  });
});
