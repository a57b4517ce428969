/**
 * Shared constants for the mmpkg CLI application
 * This file provides a single source of truth for file names, ledger keys,
 * and other constants used throughout the application.
 */

export const TOOL_NAME = 'mmpkg' as const;

export const DASHBOARD_NAME = 'MagicMirror' as const;

export const DIR_PATTERNS = {
  CONFIG_PARENT: '.config',
  CONFIG: 'mmpkg',
  MODULES: 'modules',
  GIT: '.git',
  BUILD: 'build'
} as const;

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'config.jsonc',
  CATALOG: 'catalog.json',
  BACKUP_SUFFIX: '.bak',
  EXTERNAL_PACKAGES: 'external-packages.json',
  LEGACY_EXTERNAL_SOURCES: 'external-sources.json',
  AVAILABLE_UPGRADES: 'available-upgrades.json'
} as const;

/**
 * Marker files probed (case-insensitively) by the dependency installer,
 * in the order they are handled.
 */
export const DEPENDENCY_MARKERS = {
  PACKAGE_JSON: 'package.json',
  GEMFILE: 'Gemfile',
  MAKEFILE: 'Makefile',
  CMAKELISTS: 'CMakeLists.txt'
} as const;

export const CATALOG_KEYS = {
  EXTERNAL_PACKAGES: 'External Packages',
  LEGACY_EXTERNAL_SOURCES: 'External Module Sources',
  GENERAL_ADVICE: 'General Advice'
} as const;

export const LEDGER_KEYS = {
  PACKAGES: 'packages',
  TOOL: TOOL_NAME,
  DASHBOARD: DASHBOARD_NAME
} as const;

export const NOT_AVAILABLE = 'N/A' as const;

/** Snapshot lifetime before `mmpkg update` refreshes it. */
export const CATALOG_EXPIRATION_MS = 6 * 60 * 60 * 1000;

export const DESCRIPTION_MAX_LENGTH = 120;

export const DEFAULTS = {
  MAGICMIRROR_DIR: 'MagicMirror',
  MAGICMIRROR_URI: 'http://localhost:8080',
  CATALOG_URL: 'https://github.com/MichMich/MagicMirror/wiki/3rd-party-modules',
  TOOL_RELEASE_URL: 'https://registry.npmjs.org/mmpkg/latest',
  DASHBOARD_INSTALLER_URL: 'https://raw.githubusercontent.com/sdetweil/MagicMirror_scripts/master/raspberry.sh',
  BRIDGE_NAMESPACE: '/mmpm',
  BRIDGE_TIMEOUT_MS: 10_000
} as const;

export const ENV_VARS = {
  CONFIG_DIR: 'MMPKG_CONFIG_DIR',
  MAGICMIRROR_ROOT: 'MMPKG_MAGICMIRROR_ROOT',
  MAGICMIRROR_URI: 'MMPKG_MAGICMIRROR_URI',
  PM2_PROCESS_NAME: 'MMPKG_MAGICMIRROR_PM2_PROCESS_NAME',
  DOCKER_COMPOSE_FILE: 'MMPKG_MAGICMIRROR_DOCKER_COMPOSE_FILE',
  VERBOSE: 'MMPKG_VERBOSE'
} as const;

export const BRIDGE_EVENTS = {
  GET_ACTIVE_MODULES: 'FROM_MMPM_APP_get_active_modules',
  HIDE_MODULES: 'FROM_MMPM_APP_hide_modules',
  SHOW_MODULES: 'FROM_MMPM_APP_show_modules',
  ACTIVE_MODULES: 'ACTIVE_MODULES',
  MODULES_HIDDEN: 'MODULES_HIDDEN',
  MODULES_SHOWN: 'MODULES_SHOWN'
} as const;

export const EXIT_CODES = {
  FAILURE: 1,
  INTERRUPTED: 130
} as const;

export type BridgeEvent = typeof BRIDGE_EVENTS[keyof typeof BRIDGE_EVENTS];
export type DependencyMarker = typeof DEPENDENCY_MARKERS[keyof typeof DEPENDENCY_MARKERS];
