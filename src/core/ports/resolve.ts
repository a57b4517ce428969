/**
 * Port Resolution Helpers
 *
 * Resolve OutputPort and PromptPort from an ExecutionContext, falling back
 * to console output and the non-interactive prompt.
 */

import type { ExecutionContext } from '../../types/execution-context.js';
import type { OutputPort } from './output.js';
import type { PromptPort } from './prompt.js';
import { consoleOutput } from './console-output.js';
import { nonInteractivePrompt } from './console-prompt.js';

export function resolveOutput(ctx?: Pick<ExecutionContext, 'output'>): OutputPort {
  return ctx?.output ?? consoleOutput;
}

export function resolvePrompt(ctx?: Pick<ExecutionContext, 'prompt'>): PromptPort {
  return ctx?.prompt ?? nonInteractivePrompt;
}

/**
 * Ask a yes/no question honoring --yes. With assumeYes the question is
 * echoed with the answer and no prompt is shown.
 */
export async function confirmAction(
  ctx: Pick<ExecutionContext, 'output' | 'prompt' | 'assumeYes' | 'cancellation'>,
  message: string,
  initial: boolean = false
): Promise<boolean> {
  if (ctx.assumeYes) {
    resolveOutput(ctx).message(`${message} yes`);
    return true;
  }
  ctx.cancellation.throwIfCancelled();
  return resolvePrompt(ctx).confirm(message, initial);
}
