import { rename } from 'fs/promises';
import { z } from 'zod';

import type { PackageRecord } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { CATALOG_KEYS } from '../../constants/index.js';
import { exists, fileSize, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { ConfigError, FileSystemError, MalformedRecordError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createPackageRecord, decodePackageList, encodePackageRecord } from '../package-record.js';
import { confirmAction, resolveOutput, resolvePrompt } from '../ports/resolve.js';

const externalDocumentSchema = z.object({
  [CATALOG_KEYS.EXTERNAL_PACKAGES]: z.array(z.unknown())
});

const legacyDocumentSchema = z.object({
  [CATALOG_KEYS.LEGACY_EXTERNAL_SOURCES]: z.unknown().optional()
});

export interface ExternalRemovalResult {
  removed: PackageRecord[];
  cancelled: PackageRecord[];
}

/**
 * User-registered packages, stored as `{"External Packages": [...]}`.
 */
export class ExternalPackagesStore {
  constructor(
    private readonly file: string,
    private readonly legacyFile?: string
  ) {}

  /** True when the file exists and is non-empty. */
  async isPresent(): Promise<boolean> {
    return (await fileSize(this.file)) > 0;
  }

  /**
   * Read the stored packages.
   *
   * @throws FileSystemError when the file is not JSON
   * @throws MalformedRecordError when the document or a record is malformed
   */
  async read(): Promise<PackageRecord[]> {
    const raw = await readJsonFile(this.file);
    const document = externalDocumentSchema.safeParse(raw);
    if (!document.success) {
      throw new MalformedRecordError(`${this.file} has no '${CATALOG_KEYS.EXTERNAL_PACKAGES}' list`);
    }
    return decodePackageList(document.data[CATALOG_KEYS.EXTERNAL_PACKAGES], CATALOG_KEYS.EXTERNAL_PACKAGES);
  }

  async write(records: PackageRecord[]): Promise<void> {
    await writeJsonFile(this.file, {
      [CATALOG_KEYS.EXTERNAL_PACKAGES]: records.map(encodePackageRecord)
    });
  }

  /**
   * Packages for the catalog merge. A corrupt file is reported and loads as
   * an empty category; the file itself is left for the user to fix.
   */
  async loadForCatalog(warn: (message: string) => void): Promise<PackageRecord[] | null> {
    if (!(await this.isPresent())) {
      return null;
    }
    try {
      return await this.read();
    } catch (error) {
      if (error instanceof MalformedRecordError || error instanceof FileSystemError) {
        logger.debug('External packages file unreadable', error);
        warn(`${this.file} is corrupt and must be fixed manually: ${error.message}`);
        return [];
      }
      throw error;
    }
  }

  /**
   * Append a package. Titles must be unique within the external packages.
   */
  async add(record: PackageRecord): Promise<void> {
    const records = (await this.isPresent()) ? await this.read() : [];
    if (records.some(existing => existing.title === record.title)) {
      throw new ValidationError(`an external package titled '${record.title}' already exists`);
    }
    records.push(record);
    await this.write(records);
  }

  /**
   * Remove the packages whose title is listed and for which `confirm`
   * resolves true. Declined matches are reported separately.
   */
  async remove(
    titles: string[],
    confirm: (record: PackageRecord) => Promise<boolean>
  ): Promise<ExternalRemovalResult> {
    if (!(await exists(this.file))) {
      throw new ConfigError(`${this.file} does not appear to exist`);
    }
    if (!(await this.isPresent())) {
      throw new ConfigError(`${this.file} is empty`);
    }

    const records = await this.read();
    if (records.length === 0) {
      throw new ConfigError('No external packages found in database');
    }

    const removed: PackageRecord[] = [];
    const cancelled: PackageRecord[] = [];

    for (const title of titles) {
      for (const record of records) {
        if (record.title !== title) {
          continue;
        }
        if (await confirm(record)) {
          removed.push(record);
        } else {
          cancelled.push(record);
        }
      }
    }

    if (removed.length > 0) {
      await this.write(records.filter(record => !removed.includes(record)));
    }

    return { removed, cancelled };
  }

  /**
   * Rename the legacy `external-sources.json` and rewrite its
   * `External Module Sources` key. Returns false when there is nothing to
   * migrate.
   */
  async migrateLegacy(): Promise<boolean> {
    if (!this.legacyFile || !(await exists(this.legacyFile))) {
      return false;
    }

    let records: PackageRecord[] = [];
    if ((await fileSize(this.legacyFile)) > 0) {
      const raw = await readJsonFile(this.legacyFile);
      const document = legacyDocumentSchema.safeParse(raw);
      if (!document.success) {
        throw new MalformedRecordError(`${this.legacyFile} is not an external sources document`);
      }
      const legacy = document.data[CATALOG_KEYS.LEGACY_EXTERNAL_SOURCES];
      records = legacy === undefined ? [] : decodePackageList(legacy, CATALOG_KEYS.LEGACY_EXTERNAL_SOURCES);
    }

    try {
      await rename(this.legacyFile, this.file);
    } catch (error) {
      throw new FileSystemError(`Failed to rename ${this.legacyFile} -> ${this.file}`, { error });
    }
    await this.write(records);
    logger.info(`Migrated ${records.length} external package(s) to ${this.file}`);
    return true;
  }
}

/**
 * Interactive removal used by `mmpkg ext-pkg remove`. Returns false when no
 * external package matched.
 */
export async function removeExternalPackages(ctx: ExecutionContext, titles: string[]): Promise<boolean> {
  const out = resolveOutput(ctx);
  const store = new ExternalPackagesStore(ctx.paths.externalPackagesFile);

  const { removed, cancelled } = await store.remove(titles, record =>
    confirmAction(ctx, `Remove ${record.title} (${record.repository}) from the local database?`)
  );

  if (removed.length === 0 && cancelled.length === 0) {
    out.error(`No external packages found matching: ${titles.join(', ')}`);
    return false;
  }

  for (const record of removed) {
    out.success(`Removed ${record.title} (${record.repository})`);
  }
  return true;
}

export interface ExternalPackageFields {
  title?: string;
  author?: string;
  repository?: string;
  description?: string;
}

const EXTERNAL_FIELD_PROMPTS: Array<[keyof ExternalPackageFields, string]> = [
  ['title', 'Title'],
  ['author', 'Author'],
  ['repository', 'Repository URL'],
  ['description', 'Description']
];

/**
 * Register a package the catalog does not list. Fields not given are
 * prompted for; all four are required.
 */
export async function addExternalPackage(ctx: ExecutionContext, fields: ExternalPackageFields): Promise<PackageRecord> {
  const out = resolveOutput(ctx);
  const prompt = resolvePrompt(ctx);
  const values: Required<ExternalPackageFields> = { title: '', author: '', repository: '', description: '' };

  for (const [key, label] of EXTERNAL_FIELD_PROMPTS) {
    let value = fields[key]?.trim() ?? '';
    if (!value) {
      ctx.cancellation.throwIfCancelled();
      value = (await prompt.text(`${label}:`, {
        validate: input => (input.trim() ? undefined : `${label} is required`)
      })).trim();
    }
    if (!value) {
      throw new ValidationError(`${label.toLowerCase()} is required`);
    }
    values[key] = value;
  }

  const record = createPackageRecord(values);
  const store = new ExternalPackagesStore(ctx.paths.externalPackagesFile);
  await store.add(record);

  out.success(`Added external package ${record.title} to ${ctx.paths.externalPackagesFile}`);
  return record;
}
