/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations
 * and wires SIGINT to the context's cancellation token.
 */

import type { Command } from 'commander';

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import { cancelOnSigint } from '../utils/cancellation.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;
let cachedClackPrompt: PromptPort | undefined;

function getCliPorts(isInteractive: boolean): { output: OutputPort; prompt: PromptPort } {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    cachedClackPrompt ??= createClackPrompt();
    return { output: cachedClackOutput, prompt: cachedClackPrompt };
  }
  cachedPlainOutput ??= createPlainOutput();
  return { output: cachedPlainOutput, prompt: nonInteractivePrompt };
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Create an ExecutionContext with CLI-specific ports injected.
 *
 * In interactive mode (TTY): uses Clack for output and prompts.
 * In non-interactive mode (CI/piped): plain console output; prompts throw
 * unless --yes answers them.
 */
export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  const ports = getCliPorts(detectInteractive(options.interactive));

  ctx.output = ports.output;
  ctx.prompt = ports.prompt;

  cancelOnSigint(ctx.cancellation);

  return ctx;
}

export interface GlobalOptions {
  yes?: boolean;
  root?: string;
}

/**
 * Context for a subcommand action, honoring the program's global options.
 */
export function createCommandContext(command: Command): Promise<ExecutionContext> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  return createCliExecutionContext({ assumeYes: globals.yes === true, root: globals.root });
}
