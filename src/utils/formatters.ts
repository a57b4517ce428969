import pc from 'picocolors';

import type { Catalog, PackageRecord } from '../types/index.js';
import { DESCRIPTION_MAX_LENGTH } from '../constants/index.js';
import { normalizePathWithTilde } from './home-directory.js';

/**
 * Formatting utilities for consistent display across commands
 */

export function truncate(text: string, max: number = DESCRIPTION_MAX_LENGTH): string {
  if (text.length <= max) {
    return text;
  }
  return `${text.slice(0, max - 3)}...`;
}

/**
 * One-line summary used by search, list and the upgrade listings.
 */
export function formatRecordLine(record: PackageRecord, full: boolean = false): string {
  const description = full ? record.description : truncate(record.description);
  return `${pc.green(record.title)}\n  ${description}`;
}

/**
 * Multi-line detail block used by `show`.
 */
export function formatRecordDetails(record: PackageRecord, category?: string): string {
  const lines = [
    pc.bold(pc.green(record.title)),
    `  Category: ${category ?? 'N/A'}`,
    `  Repository: ${record.repository}`,
    `  Author: ${record.author}`,
    `  Description: ${record.description}`
  ];
  if (record.directory) {
    lines.push(`  Directory: ${normalizePathWithTilde(record.directory)}`);
  }
  return lines.join('\n');
}

/**
 * Group listing, category headers followed by their packages.
 */
export function formatCatalogListing(catalog: Catalog, full: boolean = false): string[] {
  const lines: string[] = [];
  for (const [category, records] of catalog) {
    if (records.length === 0) {
      continue;
    }
    lines.push(pc.bold(pc.cyan(category)));
    for (const record of records) {
      lines.push(formatRecordLine(record, full));
    }
  }
  return lines;
}

export function countRecords(catalog: Catalog): number {
  let total = 0;
  for (const records of catalog.values()) {
    total += records.length;
  }
  return total;
}
