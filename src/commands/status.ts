import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { addSessionOptions, runSessionCommand, type SessionCommandOptions } from '../cli/session-command.js';

export function setupStatusCommand(program: Command): void {
  addSessionOptions(
    program
      .command('status')
      .description('Check external tools, configuration and package health')
  ).action(withErrorHandling(async (options: SessionCommandOptions) => {
    await runSessionCommand('status', options);
  }));
}
