import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { addSessionOptions, runSessionCommand, type SessionCommandOptions } from '../cli/session-command.js';

export function setupUpgradeCommand(program: Command): void {
  addSessionOptions(
    program
      .command('upgrade')
      .alias('update')
      .description('Pull or re-copy every installed package')
  ).action(withErrorHandling(async (options: SessionCommandOptions) => {
    await runSessionCommand('upgrade', options);
  }));
}
