import type { Command } from 'commander';
import type { CommandName } from '../constants/index.js';
import { runCommand, type RunCommandOptions } from '../core/command-surface.js';
import { loadCliSession, type CliSessionOptions } from './context.js';

export type SessionCommandOptions = CliSessionOptions & RunCommandOptions;

/**
 * Options every subcommand that reads a manifest accepts.
 */
export function addSessionOptions(command: Command): Command {
  return command
    .option('-m, --manifest <path>', 'manifest to read (default: ./tendril.yml, then the config directory)')
    .option('--install-root <dir>', 'directory packages are installed into');
}

/**
 * Load the session for `options` and run one operation against it.
 * A run that reports failures sets a nonzero exit code.
 */
export async function runSessionCommand(name: CommandName, options: SessionCommandOptions): Promise<void> {
  const session = await loadCliSession(options);
  const result = await runCommand(session, name, options);
  if (!result.success) {
    process.exitCode = 1;
  }
}
