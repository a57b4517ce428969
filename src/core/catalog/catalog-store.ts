import type { Catalog, CatalogStatus, MmpkgPaths } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import { CATALOG_EXPIRATION_MS, CATALOG_KEYS } from '../../constants/index.js';
import { copyFile, fileSize, getStats, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { CatalogUnavailableError, ConfigError, FileSystemError, MalformedRecordError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { countRecords } from '../../utils/formatters.js';
import type { OutputPort } from '../ports/output.js';
import { consoleOutput } from '../ports/console-output.js';
import { resolveOutput } from '../ports/resolve.js';
import { decodeCatalog, encodeCatalog } from '../package-record.js';
import type { CatalogFetcher } from './catalog-fetcher.js';
import { ExternalPackagesStore } from './external-packages.js';
import { WikiCatalogFetcher } from './wiki-catalog-fetcher.js';

export interface CatalogLoadOptions {
  forceRefresh?: boolean;
}

/**
 * Owns the on-disk catalog snapshot and its `.bak` sibling.
 *
 * Every call re-reads the file; nothing is cached between invocations.
 * Concurrent processes writing the same snapshot are not coordinated.
 */
export class CatalogStore {
  private readonly externalPackages: ExternalPackagesStore;

  constructor(
    private readonly paths: Pick<MmpkgPaths, 'catalogFile' | 'catalogBackupFile' | 'externalPackagesFile'>,
    private readonly fetcher: CatalogFetcher,
    private readonly output: OutputPort = consoleOutput
  ) {
    this.externalPackages = new ExternalPackagesStore(paths.externalPackagesFile);
  }

  async load(options: CatalogLoadOptions = {}): Promise<Catalog> {
    const snapshotOnDisk = (await fileSize(this.paths.catalogFile)) > 0;
    const snapshot = snapshotOnDisk ? await this.readSnapshot() : null;

    let catalog: Catalog | null = null;
    if (options.forceRefresh || snapshot === null) {
      catalog = await this.refresh(snapshotOnDisk, snapshot !== null);
    }
    catalog ??= snapshot;
    if (catalog === null) {
      throw new CatalogUnavailableError();
    }

    const external = await this.externalPackages.loadForCatalog(message => this.output.warn(message));
    if (external !== null) {
      catalog.set(CATALOG_KEYS.EXTERNAL_PACKAGES, external);
    }

    return catalog;
  }

  /**
   * Expiration is the snapshot's modification time plus six hours.
   */
  async status(): Promise<CatalogStatus> {
    if ((await fileSize(this.paths.catalogFile)) === 0) {
      throw new ConfigError(`No catalog snapshot at ${this.paths.catalogFile}; run 'mmpkg db --refresh'`);
    }
    const stats = await getStats(this.paths.catalogFile);
    const catalog: Catalog = (await this.readSnapshot()) ?? new Map();

    return {
      createdAt: stats.mtime,
      expiresAt: new Date(stats.mtime.getTime() + CATALOG_EXPIRATION_MS),
      categoryCount: catalog.size,
      packageCount: countRecords(catalog)
    };
  }

  async isExpired(now: Date = new Date()): Promise<boolean> {
    if ((await fileSize(this.paths.catalogFile)) === 0) {
      return true;
    }
    const { expiresAt } = await this.status();
    return expiresAt.getTime() <= now.getTime();
  }

  /**
   * Fetch and, only when something came back, back up the old snapshot file
   * and replace it. Returns null when the fetch failed and a usable snapshot
   * remains.
   */
  private async refresh(snapshotOnDisk: boolean, canFallBack: boolean): Promise<Catalog | null> {
    const spinner = this.output.spinner();
    spinner.start(`${snapshotOnDisk ? 'Refreshing' : 'Initializing'} package catalog`);

    let fetched: Catalog;
    try {
      fetched = await this.fetcher.fetch();
    } catch (error) {
      spinner.stop('Catalog refresh failed');
      const reason = error instanceof Error ? error.message : String(error);
      if (!canFallBack) {
        throw new CatalogUnavailableError(reason);
      }
      this.output.error(`${reason}. Using the existing catalog snapshot`);
      return null;
    }

    const packageCount = countRecords(fetched);
    if (packageCount === 0) {
      spinner.stop('Catalog refresh returned no packages');
      if (!canFallBack) {
        throw new CatalogUnavailableError('the remote listing contained no packages');
      }
      this.output.error('The remote listing contained no packages. Using the existing catalog snapshot');
      return null;
    }

    if (snapshotOnDisk) {
      logger.info(`Backing up catalog snapshot as ${this.paths.catalogBackupFile}`);
      await copyFile(this.paths.catalogFile, this.paths.catalogBackupFile);
    }
    await writeJsonFile(this.paths.catalogFile, encodeCatalog(fetched));
    spinner.stop(`Catalog updated (${packageCount} packages)`);

    return fetched;
  }

  /**
   * Decode the snapshot. An undecodable snapshot is reported and treated as
   * absent.
   */
  private async readSnapshot(): Promise<Catalog | null> {
    try {
      return decodeCatalog(await readJsonFile(this.paths.catalogFile));
    } catch (error) {
      if (error instanceof FileSystemError || error instanceof MalformedRecordError) {
        this.output.warn(`Catalog snapshot ${this.paths.catalogFile} is unreadable: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}

/**
 * The store of an invocation, fetching from the configured wiki page.
 */
export function openCatalogStore(
  ctx: Pick<ExecutionContext, 'paths' | 'environment' | 'output'>,
  fetcher: CatalogFetcher = new WikiCatalogFetcher(ctx.environment.catalogUrl)
): CatalogStore {
  return new CatalogStore(ctx.paths, fetcher, resolveOutput(ctx));
}
