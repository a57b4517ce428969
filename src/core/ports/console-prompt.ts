/**
 * Non-Interactive Prompt Adapter (Default/CI)
 *
 * PromptPort implementation that throws on any prompt attempt.
 */

import type { PromptPort, TextPromptOptions } from './prompt.js';

export class NonInteractivePromptError extends Error {
  constructor(promptType: string) {
    super(
      `Cannot prompt for ${promptType} in non-interactive mode. ` +
      `Pass --yes or provide the value as an option.`
    );
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  async confirm(_message: string, _initial?: boolean): Promise<boolean> {
    throw new NonInteractivePromptError('confirmation');
  },

  async text(_message: string, _options?: TextPromptOptions): Promise<string> {
    throw new NonInteractivePromptError('text input');
  },
};
