import type { Catalog, PackageRecord } from '../../types/index.js';

export interface SearchOptions {
  caseSensitive?: boolean;
  titleOnly?: boolean;
}

/**
 * Search the catalog.
 *
 * A query naming a category returns that category alone. Otherwise every
 * category is kept in catalog order, holding its matching packages.
 * Title-only search is exact title equality; the default matches the query
 * as a substring of title, description or author, lower-cased unless
 * `caseSensitive`.
 */
export function searchCatalog(catalog: Catalog, query: string, options: SearchOptions = {}): Catalog {
  const category = catalog.get(query);
  if (category) {
    return new Map([[query, category]]);
  }

  let matches: (record: PackageRecord) => boolean;
  if (options.titleOnly) {
    matches = record => record.title === query;
  } else if (options.caseSensitive) {
    matches = record =>
      record.title.includes(query) || record.description.includes(query) || record.author.includes(query);
  } else {
    const needle = query.toLowerCase();
    matches = record =>
      record.title.toLowerCase().includes(needle) ||
      record.description.toLowerCase().includes(needle) ||
      record.author.toLowerCase().includes(needle);
  }

  const results: Catalog = new Map();
  for (const [name, records] of catalog) {
    results.set(name, records.filter(matches));
  }
  return results;
}

/**
 * Every (category, record) pair whose title equals `title` exactly.
 */
export function findByTitle(catalog: Catalog, title: string): Array<{ category: string; record: PackageRecord }> {
  const found: Array<{ category: string; record: PackageRecord }> = [];
  for (const [category, records] of catalog) {
    for (const record of records) {
      if (record.title === title) {
        found.push({ category, record });
      }
    }
  }
  return found;
}

export function categorySummaries(catalog: Catalog): Array<{ category: string; packageCount: number }> {
  return [...catalog].map(([category, records]) => ({ category, packageCount: records.length }));
}

export function flattenCatalog(catalog: Catalog): PackageRecord[] {
  return [...catalog.values()].flat();
}
