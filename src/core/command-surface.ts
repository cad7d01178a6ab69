import type { CommandResult } from '../types/index.js';
import { COMMAND_ALIASES, COMMAND_NAMES, type CommandName } from '../constants/index.js';
import type { TendrilSession } from './session.js';
import type { CleanOptions } from './reconciler/clean-pipeline.js';
import { printHealthReport, printPackageList } from './status/status-printers.js';

export type RunCommandOptions = CleanOptions;

function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some(command => command === name);
}

/**
 * Map a user-typed name (including aliases) to a command, or undefined.
 */
export function resolveCommandName(name: string): CommandName | undefined {
  const normalized = name.trim().toLowerCase();
  if (isCommandName(normalized)) {
    return normalized;
  }
  return COMMAND_ALIASES.get(normalized);
}

/**
 * Run one named operation against the session's registered tree.
 * An unknown name is reported and nothing else happens.
 */
export async function runCommand(
  session: TendrilSession,
  name: string,
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  const command = resolveCommandName(name);
  if (!command) {
    const error = `Invalid subcommand: ${name}`;
    session.output.error(error);
    return { success: false, error };
  }

  switch (command) {
    case 'install':
    case 'upgrade': {
      const summary = command === 'install' ? await session.install() : await session.upgrade();
      return { success: summary.counts.failed === 0, data: summary };
    }
    case 'clean': {
      const summary = await session.clean(options);
      return { success: summary.failed.length === 0, data: summary };
    }
    case 'list': {
      const report = await session.status();
      printPackageList(report, session.output);
      return { success: true, data: report };
    }
    case 'status': {
      const report = await session.health();
      printHealthReport(report, session.output);
      return { success: report.healthy, data: report };
    }
  }
}
