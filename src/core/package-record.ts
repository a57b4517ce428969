import { z } from 'zod';

import type { Catalog, PackageRecord } from '../types/index.js';
import { NOT_AVAILABLE } from '../constants/index.js';
import { MalformedRecordError } from '../utils/errors.js';

/**
 * Persisted package object. Title and repository are required; the other
 * fields fall back to their defaults. Unknown keys are rejected.
 */
const packageRecordSchema = z
  .object({
    title: z.string(),
    author: z.string().default(NOT_AVAILABLE),
    description: z.string().default(NOT_AVAILABLE),
    repository: z.string(),
    directory: z.string().default('')
  })
  .strict();

const packageListSchema = z.array(z.unknown());

const catalogDocumentSchema = z.record(z.string(), packageListSchema);

export type PackageRecordInput = z.input<typeof packageRecordSchema>;

/**
 * Remove path separators so a title can name a directory under modules/.
 */
export function sanitizeTitle(title: string): string {
  return title.replace(/[/\\]/g, '');
}

/**
 * Whether a sanitized title can name its own directory under modules/.
 * Empty titles, `.` and `..` would resolve to modules/ or above it.
 */
export function isUsableTitle(title: string): boolean {
  const trimmed = title.trim();
  return trimmed !== '' && trimmed !== '.' && trimmed !== '..';
}

export function createPackageRecord(fields: {
  title: string;
  repository: string;
  author?: string;
  description?: string;
  directory?: string;
}): PackageRecord {
  const title = sanitizeTitle(fields.title);
  if (!isUsableTitle(title)) {
    throw new MalformedRecordError(`title '${fields.title}' cannot name a module directory`, { title: fields.title });
  }
  return Object.freeze({
    title,
    author: fields.author ?? NOT_AVAILABLE,
    description: fields.description ?? NOT_AVAILABLE,
    repository: fields.repository,
    directory: fields.directory ?? ''
  });
}

export function withDirectory(record: PackageRecord, directory: string): PackageRecord {
  return Object.freeze({ ...record, directory });
}

/**
 * Decode one persisted package object.
 *
 * @throws MalformedRecordError on a missing required field, a wrongly typed
 * field or an unknown key
 */
export function decodePackageRecord(value: unknown, where: string = 'package'): PackageRecord {
  const parsed = packageRecordSchema.safeParse(value);
  if (!parsed.success) {
    const reasons = parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new MalformedRecordError(`${where}: ${reasons}`, { value });
  }
  return createPackageRecord(parsed.data);
}

export function decodePackageList(value: unknown, where: string): PackageRecord[] {
  const list = packageListSchema.safeParse(value);
  if (!list.success) {
    throw new MalformedRecordError(`${where}: expected a list of packages`, { value });
  }
  return list.data.map((item, index) => decodePackageRecord(item, `${where}[${index}]`));
}

export function encodePackageRecord(record: PackageRecord): Record<keyof PackageRecord, string> {
  return {
    title: record.title,
    author: record.author,
    description: record.description,
    repository: record.repository,
    directory: record.directory
  };
}

/**
 * Decode a category -> packages document, keeping the document's key order.
 */
export function decodeCatalog(value: unknown): Catalog {
  const document = catalogDocumentSchema.safeParse(value);
  if (!document.success) {
    throw new MalformedRecordError('expected an object of category -> package list', { value });
  }
  const catalog: Catalog = new Map();
  for (const [category, records] of Object.entries(document.data)) {
    catalog.set(category, decodePackageList(records, category));
  }
  return catalog;
}

export function encodeCatalog(catalog: Catalog): Record<string, Array<Record<keyof PackageRecord, string>>> {
  const document: Record<string, Array<Record<keyof PackageRecord, string>>> = {};
  for (const [category, records] of catalog) {
    document[category] = records.map(encodePackageRecord);
  }
  return document;
}

/**
 * Repository URLs are compared after trimming surrounding whitespace.
 */
export function sameRepository(a: string, b: string): boolean {
  return a.trim() === b.trim();
}
