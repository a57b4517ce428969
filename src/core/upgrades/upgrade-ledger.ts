import { normalize, resolve } from 'path';
import { z } from 'zod';

import type { EnvironmentUpgrades, PackageRecord, UpgradeLedgerDocument } from '../../types/index.js';
import { LEDGER_KEYS } from '../../constants/index.js';
import { fileSize, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { FileSystemError, MalformedRecordError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { decodePackageList, encodePackageRecord } from '../package-record.js';

const environmentSchema = z
  .object({
    [LEDGER_KEYS.PACKAGES]: z.array(z.unknown()),
    [LEDGER_KEYS.DASHBOARD]: z.boolean()
  })
  .strict();

const documentSchema = z.record(z.string(), z.unknown());

export function normalizeRoot(root: string): string {
  return normalize(resolve(root));
}

function emptyEnvironment(): EnvironmentUpgrades {
  return { packages: [], dashboardAppUpgrade: false };
}

function defaultDocument(root: string): UpgradeLedgerDocument {
  return {
    toolSelfUpgrade: false,
    environments: new Map([[root, emptyEnvironment()]])
  };
}

/**
 * Decode the on-disk ledger. Any deviation from the expected shape throws.
 */
function decodeDocument(raw: unknown): UpgradeLedgerDocument {
  const document = documentSchema.safeParse(raw);
  if (!document.success) {
    throw new MalformedRecordError('ledger is not a JSON object');
  }

  let toolSelfUpgrade = false;
  const environments = new Map<string, EnvironmentUpgrades>();

  for (const [key, value] of Object.entries(document.data)) {
    if (key === LEDGER_KEYS.TOOL) {
      if (typeof value !== 'boolean') {
        throw new MalformedRecordError(`'${LEDGER_KEYS.TOOL}' must be a boolean`);
      }
      toolSelfUpgrade = value;
      continue;
    }

    const environment = environmentSchema.safeParse(value);
    if (!environment.success) {
      throw new MalformedRecordError(`ledger entry for ${key} is malformed`);
    }
    environments.set(normalizeRoot(key), {
      packages: decodePackageList(environment.data[LEDGER_KEYS.PACKAGES], key),
      dashboardAppUpgrade: environment.data[LEDGER_KEYS.DASHBOARD]
    });
  }

  return { toolSelfUpgrade, environments };
}

function encodeDocument(document: UpgradeLedgerDocument): Record<string, unknown> {
  const encoded: Record<string, unknown> = { [LEDGER_KEYS.TOOL]: document.toolSelfUpgrade };
  for (const [root, environment] of document.environments) {
    encoded[root] = {
      [LEDGER_KEYS.PACKAGES]: environment.packages.map(encodePackageRecord),
      [LEDGER_KEYS.DASHBOARD]: environment.dashboardAppUpgrade
    };
  }
  return encoded;
}

function isSamePackage(a: PackageRecord, b: PackageRecord): boolean {
  if (a.directory && b.directory) {
    return a.directory === b.directory;
  }
  return a.title === b.title && a.repository === b.repository;
}

/**
 * Pending upgrades per dashboard installation, keyed by normalized root
 * path, plus one flag for the tool itself.
 *
 * Each operation reads the whole file, mutates it in memory and writes the
 * whole document back. A file that cannot be decoded is replaced by the
 * default document for the current root.
 */
export class UpgradeLedger {
  private readonly currentRoot: string;

  constructor(private readonly file: string, currentRoot: string) {
    this.currentRoot = normalizeRoot(currentRoot);
  }

  async get(): Promise<UpgradeLedgerDocument> {
    let document: UpgradeLedgerDocument;
    try {
      if ((await fileSize(this.file)) === 0) {
        throw new MalformedRecordError('ledger file is missing or empty');
      }
      document = decodeDocument(await readJsonFile(this.file));
    } catch (error) {
      if (!(error instanceof FileSystemError || error instanceof MalformedRecordError)) {
        throw error;
      }
      logger.info(`Resetting upgrade ledger ${this.file}: ${error.message}`);
      document = defaultDocument(this.currentRoot);
      await this.write(document);
      return document;
    }

    if (!document.environments.has(this.currentRoot)) {
      document.environments.set(this.currentRoot, emptyEnvironment());
      await this.write(document);
    }

    return document;
  }

  async forRoot(root: string = this.currentRoot): Promise<EnvironmentUpgrades> {
    const document = await this.get();
    return document.environments.get(normalizeRoot(root)) ?? emptyEnvironment();
  }

  async recordPackageUpgrades(root: string, packages: PackageRecord[]): Promise<void> {
    await this.update(root, environment => {
      environment.packages = [...packages];
    });
  }

  async recordAppUpgrade(root: string, available: boolean): Promise<void> {
    await this.update(root, environment => {
      environment.dashboardAppUpgrade = available;
    });
  }

  async recordToolUpgrade(available: boolean): Promise<void> {
    const document = await this.get();
    document.toolSelfUpgrade = available;
    await this.write(document);
  }

  /**
   * Drop one package from the pending list of `root` after it upgraded.
   */
  async clearPackageUpgrade(root: string, record: PackageRecord): Promise<void> {
    await this.update(root, environment => {
      environment.packages = environment.packages.filter(pending => !isSamePackage(pending, record));
    });
  }

  /**
   * Clear the pending packages and the dashboard flag of `root`. Returns
   * false when the ledger could not be written.
   */
  async resetForRoot(root: string): Promise<boolean> {
    try {
      await this.update(root, environment => {
        environment.packages = [];
        environment.dashboardAppUpgrade = false;
      });
      return true;
    } catch (error) {
      if (error instanceof FileSystemError) {
        logger.error(`Failed to reset upgrade ledger for ${root}`, error);
        return false;
      }
      throw error;
    }
  }

  private async update(root: string, mutate: (environment: EnvironmentUpgrades) => void): Promise<void> {
    const document = await this.get();
    const key = normalizeRoot(root);
    const environment = document.environments.get(key) ?? emptyEnvironment();
    mutate(environment);
    document.environments.set(key, environment);
    await this.write(document);
  }

  private async write(document: UpgradeLedgerDocument): Promise<void> {
    await writeJsonFile(this.file, encodeDocument(document));
  }
}
