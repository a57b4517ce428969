import { execFile, spawn } from 'child_process';
import { promisify } from 'util';

import type { ProcessResult, ProcessRunner, RunOptions } from '../types/index.js';
import { logger } from './logger.js';
import { CancellationToken } from './cancellation.js';

const execFileAsync = promisify(execFile);

/** Exit code reported when the executable cannot be found. */
export const COMMAND_NOT_FOUND = 127;

function toExitCode(code: unknown): number {
  if (typeof code === 'number') {
    return code;
  }
  return code === 'ENOENT' ? COMMAND_NOT_FOUND : 1;
}

function toFailureResult(error: Error): ProcessResult {
  const code = 'code' in error ? error.code : undefined;
  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
  return { code: toExitCode(code), stdout, stderr: stderr || error.message };
}

/**
 * Runs external programs (git, npm, pm2, ...) with execFile. Non-zero exits
 * resolve with the code and captured output; only cancellation rejects.
 */
export class ExecFileProcessRunner implements ProcessRunner {
  constructor(private readonly cancellation: CancellationToken = new CancellationToken()) {}

  async run(argv: string[], options: RunOptions = {}): Promise<ProcessResult> {
    const [command, ...args] = argv;
    if (!command) {
      return { code: 1, stdout: '', stderr: 'empty command' };
    }

    this.cancellation.throwIfCancelled();
    logger.debug(`Running: ${argv.join(' ')}`, options.cwd ? { cwd: options.cwd } : undefined);

    let result: ProcessResult;
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        cwd: options.cwd,
        maxBuffer: 64 * 1024 * 1024,
        encoding: 'utf8'
      });
      result = { code: 0, stdout, stderr };
    } catch (error) {
      if (!(error instanceof Error)) {
        throw error;
      }
      result = toFailureResult(error);
    }

    this.cancellation.throwIfCancelled();
    logger.debug(`Exited ${result.code}: ${command}`);
    return result;
  }

  async runInteractive(argv: string[], options: RunOptions = {}): Promise<number> {
    const [command, ...args] = argv;
    if (!command) {
      return 1;
    }

    this.cancellation.throwIfCancelled();
    logger.debug(`Running (attached): ${argv.join(' ')}`);

    const code = await new Promise<number>((resolve) => {
      const child = spawn(command, args, { cwd: options.cwd, stdio: 'inherit' });
      child.on('error', (error: NodeJS.ErrnoException) => {
        logger.debug(`Failed to start ${command}`, error);
        resolve(toExitCode(error.code));
      });
      child.on('close', (exitCode) => resolve(exitCode ?? 1));
    });

    this.cancellation.throwIfCancelled();
    return code;
  }

  spawnDetached(argv: string[], options: RunOptions = {}): void {
    const [command, ...args] = argv;
    if (!command) {
      return;
    }
    this.cancellation.throwIfCancelled();
    logger.debug(`Spawning detached: ${argv.join(' ')}`);

    const child = spawn(command, args, { cwd: options.cwd, detached: true, stdio: 'ignore' });
    child.on('error', (error) => logger.warn(`Failed to start ${command}`, error));
    child.unref();
  }
}
