/**
 * Re-index step: refreshes generated help indexes once after a pass
 * that changed the install root.
 */

import type { OutputPort } from './ports/output.js';
import { runExecutable, describeProcessFailure } from '../utils/process.js';
import { logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';

export interface Reindexer {
  reindex(installRoot: string): Promise<void>;
}

/**
 * Runs `command` (argv form) from the install root. An empty command disables the step.
 */
export function createCommandReindexer(command: readonly string[]): Reindexer {
  return {
    async reindex(installRoot: string): Promise<void> {
      const [file, ...args] = command;
      if (!file) {
        logger.debug('Re-index command is empty; skipping');
        return;
      }
      try {
        await runExecutable(file, args, { cwd: installRoot });
      } catch (error) {
        throw new Error(`${command.join(' ')}: ${describeProcessFailure(error).message}`);
      }
    }
  };
}

/**
 * Run the re-index step behind a spinner. Failure is reported as a warning
 * and never changes the outcome of the pass that triggered it.
 *
 * @returns whether the step completed
 */
export async function runReindexStep(reindexer: Reindexer, installRoot: string, out: OutputPort): Promise<boolean> {
  const s = out.spinner();
  s.start('Refreshing help tags...');
  try {
    await reindexer.reindex(installRoot);
    s.stop('Help tags refreshed');
    return true;
  } catch (error) {
    s.fail('Help tags not refreshed');
    logger.debug('Re-index failed', { error });
    out.warn(`Failed to refresh help tags: ${describeError(error)}`);
    return false;
  }
}
