import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { addSessionOptions, runSessionCommand, type SessionCommandOptions } from '../cli/session-command.js';

export function setupInstallCommand(program: Command): void {
  addSessionOptions(
    program
      .command('install')
      .description('Install every declared package that is not on disk yet')
  ).action(withErrorHandling(async (options: SessionCommandOptions) => {
    await runSessionCommand('install', options);
  }));
}
