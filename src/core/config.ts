import * as path from 'path';
import { z } from 'zod';
import { EnvironmentSettings, MmpkgConfig } from '../types/index.js';
import { DEFAULTS, DIR_PATTERNS, ENV_VARS } from '../constants/index.js';
import { readJsonOrJsoncFile, writeJsonFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getHomeDirectory, expandHome } from '../utils/home-directory.js';

/**
 * Configuration management for the mmpkg CLI (config.jsonc, comments allowed)
 */

const configSchema = z.object({
  magicmirrorRoot: z.string().optional(),
  magicmirrorUri: z.string().optional(),
  pm2ProcessName: z.string().optional(),
  dockerComposeFile: z.string().optional(),
  catalogUrl: z.string().optional(),
  bridgeNamespace: z.string().optional(),
  bridgeTimeoutMs: z.number().int().positive().optional()
});

export const DEFAULT_CONFIG: MmpkgConfig = {
  magicmirrorRoot: path.join(getHomeDirectory(), DEFAULTS.MAGICMIRROR_DIR),
  magicmirrorUri: DEFAULTS.MAGICMIRROR_URI,
  pm2ProcessName: '',
  dockerComposeFile: '',
  catalogUrl: DEFAULTS.CATALOG_URL,
  bridgeNamespace: DEFAULTS.BRIDGE_NAMESPACE,
  bridgeTimeoutMs: DEFAULTS.BRIDGE_TIMEOUT_MS
};

export class ConfigManager {
  private config: MmpkgConfig | null = null;

  constructor(private readonly configPath: string) {}

  /**
   * Load configuration from file, create default if it doesn't exist
   */
  async load(): Promise<MmpkgConfig> {
    if (this.config) {
      return this.config;
    }

    if (!(await exists(this.configPath))) {
      logger.debug('Config file not found, using defaults');
      this.config = { ...DEFAULT_CONFIG };
      await this.save();
      return this.config;
    }

    logger.debug(`Loading config from: ${this.configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(this.configPath);
    } catch (error) {
      throw new ConfigError(`Failed to load configuration from ${this.configPath}`, { error });
    }

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid configuration in ${this.configPath}: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
      );
    }

    this.config = { ...DEFAULT_CONFIG, ...parsed.data };
    return this.config;
  }

  async save(): Promise<void> {
    if (!this.config) {
      throw new ConfigError('No configuration loaded to save');
    }
    logger.debug(`Saving config to: ${this.configPath}`);
    await writeJsonFile(this.configPath, this.config);
  }

  async get<K extends keyof MmpkgConfig>(key: K): Promise<MmpkgConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  async set<K extends keyof MmpkgConfig>(key: K, value: MmpkgConfig[K]): Promise<void> {
    const config = await this.load();
    config[key] = value;
    await this.save();
    logger.info(`Configuration updated: ${key} = ${String(value)}`);
  }
}

function pickEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Merge file settings, environment overrides (env wins) and an explicit root
 * override into the settings of the environment being operated on.
 */
export function resolveEnvironmentSettings(
  config: MmpkgConfig,
  env: NodeJS.ProcessEnv = process.env,
  rootOverride?: string
): EnvironmentSettings {
  const rootSetting =
    rootOverride ??
    pickEnv(env, ENV_VARS.MAGICMIRROR_ROOT) ??
    config.magicmirrorRoot ??
    DEFAULT_CONFIG.magicmirrorRoot ??
    DEFAULTS.MAGICMIRROR_DIR;
  const root = path.normalize(expandHome(rootSetting));

  return {
    root,
    modulesDir: path.join(root, DIR_PATTERNS.MODULES),
    uri: pickEnv(env, ENV_VARS.MAGICMIRROR_URI) ?? config.magicmirrorUri ?? DEFAULTS.MAGICMIRROR_URI,
    pm2ProcessName: pickEnv(env, ENV_VARS.PM2_PROCESS_NAME) ?? config.pm2ProcessName ?? '',
    dockerComposeFile: pickEnv(env, ENV_VARS.DOCKER_COMPOSE_FILE) ?? config.dockerComposeFile ?? '',
    catalogUrl: config.catalogUrl ?? DEFAULTS.CATALOG_URL,
    bridgeNamespace: config.bridgeNamespace ?? DEFAULTS.BRIDGE_NAMESPACE,
    bridgeTimeoutMs: config.bridgeTimeoutMs ?? DEFAULTS.BRIDGE_TIMEOUT_MS
  };
}
