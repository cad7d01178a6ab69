/**
 * Plain Prompt Adapter
 *
 * PromptPort implementation that uses Node's readline module for
 * console-style prompts, visually consistent with createPlainOutput().
 *
 * Used when the CLI commits to "plain" output mode on a TTY.
 */

import { createInterface, type Interface as ReadlineInterface } from 'node:readline';
import type { PromptPort } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

/** Create a one-shot readline interface, auto-closing on completion. */
function createRl(): ReadlineInterface {
  return createInterface({
    input: process.stdin,
    output: process.stderr, // prompts go to stderr so stdout stays clean for piping
    terminal: true,
  });
}

/** Read a single line, handling Ctrl-C / EOF as cancellation. */
function askLine(rl: ReadlineInterface, query: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    rl.question(query, (answer) => {
      resolve(answer);
    });
    rl.once('close', () => {
      reject(new UserCancellationError('Prompt cancelled'));
    });
    rl.once('SIGINT', () => {
      rl.close();
      reject(new UserCancellationError('Prompt cancelled'));
    });
  });
}

/**
 * Interpret a typed answer to a yes/no question. Blank takes the default.
 */
export function parseConfirmAnswer(answer: string, initial: boolean = false): boolean {
  const trimmed = answer.trim().toLowerCase();
  if (trimmed === '') return initial;
  return trimmed === 'y' || trimmed === 'yes';
}

export function createPlainPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const hint = initial ? '[Y/n]' : '[y/N]';
      const rl = createRl();
      try {
        return parseConfirmAnswer(await askLine(rl, `${message} ${hint}: `), initial);
      } finally {
        rl.close();
      }
    },
  };
}
