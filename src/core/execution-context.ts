/**
 * Execution Context Module
 *
 * Builds the one ExecutionContext of a CLI invocation: config directory
 * paths, resolved environment settings, logger, process runner and the
 * cancellation token.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { getMmpkgPaths, ensureMmpkgDirectories } from './directory.js';
import { ConfigManager, resolveEnvironmentSettings } from './config.js';
import { CancellationToken } from '../utils/cancellation.js';
import { ExecFileProcessRunner } from '../utils/process-runner.js';
import { logger as defaultLogger } from '../utils/logger.js';

export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const paths = await ensureMmpkgDirectories(getMmpkgPaths(options.configDir));
  const config = await new ConfigManager(paths.configFile).load();
  const environment = resolveEnvironmentSettings(config, process.env, options.root);

  const cancellation = options.cancellation ?? new CancellationToken();
  const logger = options.logger ?? defaultLogger;

  const context: ExecutionContext = {
    paths,
    environment,
    logger,
    runner: options.runner ?? new ExecFileProcessRunner(cancellation),
    cancellation,
    assumeYes: options.assumeYes ?? false
  };

  logger.debug('Created execution context', {
    configDir: paths.configDir,
    root: environment.root
  });

  return context;
}
