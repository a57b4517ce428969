/**
 * Clack Prompt Adapter
 *
 * PromptPort implementation backed by @clack/prompts. Ctrl-C inside a
 * prompt surfaces as an OperationInterruptedError so install and upgrade
 * runs unwind the same way they do on SIGINT.
 */

import * as clack from '@clack/prompts';
import type { PromptPort, TextPromptOptions } from '../core/ports/prompt.js';
import { OperationInterruptedError } from '../utils/errors.js';

function unwrap<T>(result: T | symbol): T {
  if (clack.isCancel(result)) {
    clack.cancel('Operation cancelled.');
    throw new OperationInterruptedError('Operation cancelled by user');
  }
  if (typeof result === 'symbol') {
    throw new OperationInterruptedError('Operation cancelled by user');
  }
  return result;
}

export function createClackPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const result = await clack.confirm({
        message,
        initialValue: initial ?? false,
      });
      return unwrap(result);
    },

    async text(message: string, options?: TextPromptOptions): Promise<string> {
      const result = await clack.text({
        message,
        initialValue: options?.initial,
        placeholder: options?.placeholder,
        validate: options?.validate,
      });
      return unwrap(result);
    },
  };
}
