import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { addSessionOptions, runSessionCommand, type SessionCommandOptions } from '../cli/session-command.js';

export function setupListCommand(program: Command): void {
  addSessionOptions(
    program
      .command('list')
      .alias('ls')
      .description('Show the declared package tree and untracked directories')
  ).action(withErrorHandling(async (options: SessionCommandOptions) => {
    await runSessionCommand('list', options);
  }));
}
