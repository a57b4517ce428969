/**
 * Common types and interfaces for the mmpkg CLI application
 */

export * from './execution-context.js';

// Configuration types
export interface MmpkgPaths {
  configDir: string;
  configFile: string;
  catalogFile: string;
  catalogBackupFile: string;
  externalPackagesFile: string;
  legacyExternalSourcesFile: string;
  upgradesFile: string;
}

export interface MmpkgConfig {
  magicmirrorRoot?: string;
  magicmirrorUri?: string;
  pm2ProcessName?: string;
  dockerComposeFile?: string;
  catalogUrl?: string;
  bridgeNamespace?: string;
  bridgeTimeoutMs?: number;
}

/**
 * Resolved settings of the dashboard installation (environment) the
 * current invocation operates on.
 */
export interface EnvironmentSettings {
  /** Normalized absolute path of the dashboard root; the ledger key */
  root: string;
  modulesDir: string;
  uri: string;
  pm2ProcessName: string;
  dockerComposeFile: string;
  catalogUrl: string;
  bridgeNamespace: string;
  bridgeTimeoutMs: number;
}

// Package types

export interface PackageRecord {
  readonly title: string;
  readonly author: string;
  readonly description: string;
  readonly repository: string;
  /** Absolute path of the local clone; empty until matched or installed */
  readonly directory: string;
}

/**
 * Category name -> packages. Map iteration order is the wiki's section
 * order, followed by the external packages pseudo-category.
 */
export type Catalog = Map<string, PackageRecord[]>;

/** Same shape as a Catalog, holding only packages with a local clone. */
export type InstalledSet = Map<string, PackageRecord[]>;

export interface CatalogStatus {
  createdAt: Date;
  expiresAt: Date;
  categoryCount: number;
  packageCount: number;
}

// Upgrade ledger types

export interface EnvironmentUpgrades {
  packages: PackageRecord[];
  dashboardAppUpgrade: boolean;
}

export interface UpgradeLedgerDocument {
  toolSelfUpgrade: boolean;
  environments: Map<string, EnvironmentUpgrades>;
}

// Subprocess types

export interface ProcessResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
}

export interface ProcessRunner {
  /** Run to completion, capturing output. Never rejects on a non-zero exit. */
  run(argv: string[], options?: RunOptions): Promise<ProcessResult>;

  /** Run attached to the terminal (stdio inherited); resolves with the exit code. */
  runInteractive(argv: string[], options?: RunOptions): Promise<number>;

  /** Start a process in the background and return without waiting. */
  spawnDetached(argv: string[], options?: RunOptions): void;
}

export interface CommandResult<T = undefined> {
  success: boolean;
  data?: T;
  error?: string;
}

// Error types
export class MmpkgError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'MmpkgError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  MALFORMED_RECORD = 'MALFORMED_RECORD',
  FETCH_ERROR = 'FETCH_ERROR',
  CATALOG_UNAVAILABLE = 'CATALOG_UNAVAILABLE',
  INTERRUPTED = 'INTERRUPTED'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
