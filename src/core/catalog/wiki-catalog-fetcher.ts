import { parse, type HTMLElement } from 'node-html-parser';

import type { Catalog, PackageRecord } from '../../types/index.js';
import { CATALOG_KEYS, NOT_AVAILABLE, TOOL_NAME } from '../../constants/index.js';
import { CatalogFetchError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createPackageRecord, isUsableTitle, sanitizeTitle } from '../package-record.js';
import type { CatalogFetcher } from './catalog-fetcher.js';

export type FetchFunction = (url: string) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

function cellText(cell: HTMLElement | undefined): string {
  return cell ? cell.text.replace(/\s+/g, ' ').trim() : '';
}

function recordFromRow(row: HTMLElement): PackageRecord | null {
  const cells = row.querySelectorAll('td');
  const [titleCell, authorCell, ...descriptionCells] = cells;
  if (!titleCell) {
    return null;
  }

  const links = titleCell.querySelectorAll('a').filter(a => a.hasAttribute('href'));
  const lastLink = links[links.length - 1];
  const repository = lastLink?.getAttribute('href')?.trim() || NOT_AVAILABLE;

  const title = cellText(titleCell) || NOT_AVAILABLE;
  if (!isUsableTitle(sanitizeTitle(title))) {
    logger.debug(`Skipping catalog row titled '${title}'`);
    return null;
  }
  const author = cellText(authorCell) || NOT_AVAILABLE;
  const description = descriptionCells.map(cellText).filter(Boolean).join(' ') || NOT_AVAILABLE;

  return createPackageRecord({ title, author, description, repository });
}

/**
 * Turn the 3rd-party-modules wiki page into a catalog. The h3 headers of the
 * page body name the categories (minus "General Advice"); the n-th table holds
 * the packages of the n-th category, first row being the column headers.
 */
export function parseCatalogPage(html: string): Catalog {
  const root = parse(html);
  const body = root.querySelector('.markdown-body');
  if (!body) {
    throw new CatalogFetchError('catalog page', 'page has no markdown body');
  }

  const categories = body
    .querySelectorAll('h3')
    .map(header => cellText(header))
    .filter(name => name !== CATALOG_KEYS.GENERAL_ADVICE);

  const catalog: Catalog = new Map();
  const tables = root.querySelectorAll('table');

  tables.forEach((table, index) => {
    const category = categories[index];
    if (category === undefined) {
      logger.debug(`Ignoring table ${index} without a category header`);
      return;
    }

    const records = catalog.get(category) ?? [];
    for (const row of table.querySelectorAll('tr').slice(1)) {
      const record = recordFromRow(row);
      if (record && record.title.toLowerCase() !== TOOL_NAME) {
        records.push(record);
      }
    }
    catalog.set(category, records);
  });

  return catalog;
}

/**
 * Downloads and parses the community wiki listing.
 */
export class WikiCatalogFetcher implements CatalogFetcher {
  constructor(
    private readonly url: string,
    private readonly fetchPage: FetchFunction = (target) => fetch(target)
  ) {}

  async fetch(): Promise<Catalog> {
    let html: string;
    try {
      const response = await this.fetchPage(this.url);
      if (!response.ok) {
        throw new CatalogFetchError(this.url, `HTTP ${response.status}`);
      }
      html = await response.text();
    } catch (error) {
      if (error instanceof CatalogFetchError) {
        throw error;
      }
      throw new CatalogFetchError(this.url, error instanceof Error ? error.message : String(error));
    }

    logger.debug(`Retrieved ${html.length} bytes from ${this.url}`);
    return parseCatalogPage(html);
  }
}
