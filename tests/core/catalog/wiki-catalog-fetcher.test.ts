import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { WikiCatalogFetcher, parseCatalogPage } from '../../../src/core/catalog/wiki-catalog-fetcher.js';
import { encodePackageRecord } from '../../../src/core/package-record.js';
import { CatalogFetchError } from '../../../src/utils/errors.js';

const PAGE = `
<html><body>
<div class="markdown-body">
  <h3>General Advice</h3>
  <p>Read the README of each module.</p>
  <h3>Clocks</h3>
  <table>
    <tr><th>Title</th><th>Author</th><th>Description</th></tr>
    <tr>
      <td><a href="https://x/big-clock">MMM-BigClock</a></td>
      <td>alice</td>
      <td>A very   large clock.</td>
    </tr>
    <tr>
      <td><a href="https://x/mmpkg">mmpkg</a></td>
      <td>bob</td>
      <td>Manager</td>
    </tr>
  </table>
  <h3>Weather</h3>
  <table>
    <tr><th>Title</th><th>Author</th><th>Description</th></tr>
    <tr>
      <td><a href="https://x/docs">docs</a> <a href="https://x/rain">MMM-Rain/Radar</a></td>
      <td>carol</td>
      <td>Radar</td>
      <td>maps</td>
    </tr>
    <tr><td><a href="https://x/sun">MMM-Sun</a></td></tr>
  </table>
</div>
</body></html>`;

describe('parseCatalogPage', () => {
  it('maps the n-th table to the n-th category, skipping General Advice', () => {
    const catalog = parseCatalogPage(PAGE);

    assert.deepEqual([...catalog.keys()], ['Clocks', 'Weather']);
  });

  it('builds records from row cells', () => {
    const catalog = parseCatalogPage(PAGE);

    assert.deepEqual(catalog.get('Clocks')?.map(encodePackageRecord), [
      {
        title: 'MMM-BigClock',
        author: 'alice',
        description: 'A very large clock.',
        repository: 'https://x/big-clock',
        directory: ''
      }
    ]);
  });

  it('takes the last link as the repository and joins extra description cells', () => {
    const [rain, sun] = parseCatalogPage(PAGE).get('Weather') ?? [];

    assert.equal(rain?.title, 'docs MMM-RainRadar');
    assert.equal(rain?.repository, 'https://x/rain');
    assert.equal(rain?.description, 'Radar maps');
    assert.equal(sun?.author, 'N/A');
    assert.equal(sun?.description, 'N/A');
  });

  it('skips rows whose title cannot name a module directory', () => {
    const page = `<div class="markdown-body"><h3>Misc</h3><table>
      <tr><th>Title</th></tr>
      <tr><td><a href="https://x/up">..</a></td><td>eve</td></tr>
      <tr><td><a href="https://x/ok">MMM-Ok</a></td><td>dan</td></tr>
    </table></div>`;

    assert.deepEqual(parseCatalogPage(page).get('Misc')?.map(entry => entry.title), ['MMM-Ok']);
  });

  it('fails on a page without a markdown body', () => {
    assert.throws(() => parseCatalogPage('<html><body></body></html>'), CatalogFetchError);
  });
});

describe('WikiCatalogFetcher', () => {
  it('parses the downloaded page', async () => {
    const fetcher = new WikiCatalogFetcher('https://wiki.test/modules', async () => ({
      ok: true,
      status: 200,
      text: async () => PAGE
    }));

    const catalog = await fetcher.fetch();

    assert.equal(catalog.get('Clocks')?.length, 1);
  });

  it('rejects with CatalogFetchError on an HTTP error', async () => {
    const fetcher = new WikiCatalogFetcher('https://wiki.test/modules', async () => ({
      ok: false,
      status: 503,
      text: async () => ''
    }));

    await assert.rejects(fetcher.fetch(), (error: unknown) =>
      error instanceof CatalogFetchError && error.message.includes('HTTP 503')
    );
  });

  it('rejects with CatalogFetchError when the request throws', async () => {
    const fetcher = new WikiCatalogFetcher('https://wiki.test/modules', async () => {
      throw new Error('getaddrinfo ENOTFOUND wiki.test');
    });

    await assert.rejects(fetcher.fetch(), CatalogFetchError);
  });
});
