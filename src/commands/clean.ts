import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { addSessionOptions, runSessionCommand, type SessionCommandOptions } from '../cli/session-command.js';

export function setupCleanCommand(program: Command): void {
  addSessionOptions(
    program
      .command('clean')
      .description('Remove directories under the install root that no declared package claims')
      .option('-y, --yes', 'remove without asking for confirmation')
  ).action(withErrorHandling(async (options: SessionCommandOptions) => {
    await runSessionCommand('clean', options);
  }));
}
