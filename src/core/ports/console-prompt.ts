/**
 * Non-Interactive Prompt Adapter (Default/CI)
 *
 * PromptPort implementation that throws on any prompt attempt.
 * Used in CI/CD pipelines and headless environments where
 * user interaction is not possible.
 */

import type { PromptPort } from './prompt.js';

export class NonInteractivePromptError extends Error {
  constructor(promptType: string) {
    super(
      `Cannot prompt for ${promptType} in non-interactive mode. ` +
      `Use specific flags or options to provide the required input.`
    );
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  async confirm(_message: string, _initial?: boolean): Promise<boolean> {
    throw new NonInteractivePromptError('confirmation');
  },
};
