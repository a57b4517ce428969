import * as os from 'os';
import * as path from 'path';
import { MmpkgPaths } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { expandHome } from '../utils/home-directory.js';

/**
 * Resolve the files owned by the catalog store, the upgrade ledger and the
 * external packages store. The directory is `$MMPKG_CONFIG_DIR` when set,
 * otherwise `~/.config/mmpkg`.
 */
export function getMmpkgPaths(configDir?: string): MmpkgPaths {
  const dir = configDir
    ? expandHome(configDir)
    : process.env[ENV_VARS.CONFIG_DIR]
      ? expandHome(process.env[ENV_VARS.CONFIG_DIR] ?? '')
      : path.join(os.homedir(), DIR_PATTERNS.CONFIG_PARENT, DIR_PATTERNS.CONFIG);

  const catalogFile = path.join(dir, FILE_PATTERNS.CATALOG);

  return {
    configDir: dir,
    configFile: path.join(dir, FILE_PATTERNS.CONFIG_JSONC),
    catalogFile,
    catalogBackupFile: `${catalogFile}${FILE_PATTERNS.BACKUP_SUFFIX}`,
    externalPackagesFile: path.join(dir, FILE_PATTERNS.EXTERNAL_PACKAGES),
    legacyExternalSourcesFile: path.join(dir, FILE_PATTERNS.LEGACY_EXTERNAL_SOURCES),
    upgradesFile: path.join(dir, FILE_PATTERNS.AVAILABLE_UPGRADES)
  };
}

export async function ensureMmpkgDirectories(paths: MmpkgPaths): Promise<MmpkgPaths> {
  try {
    await ensureDir(paths.configDir);
    logger.debug('mmpkg directories ensured', { configDir: paths.configDir });
    return paths;
  } catch (error) {
    logger.error('Failed to create mmpkg directories', { error, configDir: paths.configDir });
    throw error;
  }
}
