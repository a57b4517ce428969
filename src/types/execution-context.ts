/**
 * Execution Context Types
 *
 * One ExecutionContext is constructed per CLI invocation and passed into
 * every component instead of module-level singletons.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import type { CancellationToken } from '../utils/cancellation.js';
import type { EnvironmentSettings, Logger, MmpkgPaths, ProcessRunner } from './index.js';

/**
 * ExecutionContext - carries everything a command needs
 *
 * - paths: files owned by the catalog store, ledger and external packages store
 * - environment: the dashboard installation being operated on
 * - runner: the subprocess collaborator (git, npm, pm2, ...)
 * - cancellation: checked before every subprocess call and prompt
 */
export interface ExecutionContext {
  paths: MmpkgPaths;

  environment: EnvironmentSettings;

  logger: Logger;

  runner: ProcessRunner;

  cancellation: CancellationToken;

  /**
   * --yes flag: every confirmation is answered with yes without prompting.
   */
  assumeYes: boolean;

  /**
   * Output port for all user-facing messages (info, success, error, warn, etc.).
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;

  /**
   * Prompt port for all interactive user prompts (confirm, text).
   * When not provided, defaults to nonInteractivePrompt (throws on prompt).
   */
  prompt?: PromptPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /**
   * Overrides the config directory (defaults to $MMPKG_CONFIG_DIR or ~/.config/mmpkg)
   */
  configDir?: string;

  /**
   * Overrides the dashboard root from config/env
   */
  root?: string;

  assumeYes?: boolean;

  logger?: Logger;

  runner?: ProcessRunner;

  cancellation?: CancellationToken;
}
