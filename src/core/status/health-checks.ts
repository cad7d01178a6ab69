/**
 * Health report: the checks behind `tendril status`.
 *
 * Each section is a list of leveled items; rendering lives in
 * status-printers so front ends can present the same data differently.
 */

import type { StatusContext, StatusEntry, StatusReport } from './status-pipeline.js';
import { collectStatus } from './status-pipeline.js';
import { EXPECTED_SPEC_SHAPE, describeNode } from '../spec-validator.js';
import { isGitAvailable, runGit, type GitRunner } from '../../utils/git.js';
import { formatCount, formatPathForDisplay } from '../../utils/formatters.js';

export type HealthLevel = 'ok' | 'warn' | 'error';

export interface HealthItem {
  level: HealthLevel;
  message: string;
  advice?: string[];
  /** Nesting level for package lines */
  depth?: number;
}

export interface HealthSection {
  title: string;
  items: HealthItem[];
}

export interface HealthReport {
  sections: HealthSection[];
  /** False when any item is at error level */
  healthy: boolean;
  status: StatusReport;
}

export interface HealthCheckOptions {
  git?: GitRunner;
}

async function checkExternalTools(git: GitRunner): Promise<HealthSection> {
  const items: HealthItem[] = (await isGitAvailable(git))
    ? [{ level: 'ok', message: 'git is installed' }]
    : [{
        level: 'error',
        message: 'git is not installed or not on your PATH',
        advice: ['Install it with your package manager', 'Check that your $PATH is set correctly']
      }];
  return { title: 'External tools', items };
}

function checkConfig(status: StatusReport): HealthSection {
  const root = formatPathForDisplay(status.installRoot);
  const items: HealthItem[] = status.installRootExists
    ? [{ level: 'ok', message: `Install root exists: ${root}` }]
    : [{
        level: 'error',
        message: `Install root does not exist: ${root}`,
        advice: ['Run `tendril install` to create it', 'Check the installRoot setting in your config or manifest']
      }];
  return { title: 'Config', items };
}

function packageItems(entries: readonly StatusEntry[]): HealthItem[] {
  return entries.flatMap(entry => {
    const item: HealthItem = entry.installed
      ? { level: 'ok', message: `${entry.name} (${entry.source})`, depth: entry.depth }
      : { level: 'warn', message: `${entry.name} (${entry.source}) is not installed`, depth: entry.depth };
    return [item, ...packageItems(entry.dependencies)];
  });
}

function checkManagedPackages(status: StatusReport): HealthSection {
  const items = packageItems(status.packages);

  for (const { node, error, depth } of status.invalid) {
    items.push({
      level: 'error',
      message: `Invalid package ${describeNode(node)}: ${error.message}`,
      advice: [`Expected a table such as ${EXPECTED_SPEC_SHAPE}`],
      depth
    });
  }

  if (status.missing.length > 0) {
    items.push({
      level: 'warn',
      message: `${formatCount(status.missing.length, 'package')} not installed`,
      advice: ['Run `tendril install` to install them']
    });
  }

  return { title: `Managed packages (${status.managedCount})`, items };
}

function checkUntracked(status: StatusReport): HealthSection {
  const items: HealthItem[] = status.untracked.length > 0
    ? [{
        level: 'warn',
        message: `Untracked packages found: ${status.untracked.join(', ')}`,
        advice: ['Run `tendril clean` to remove them']
      }]
    : [{ level: 'ok', message: 'No untracked packages found.' }];
  return { title: 'Untracked packages', items };
}

export async function runHealthChecks(ctx: StatusContext, options: HealthCheckOptions = {}): Promise<HealthReport> {
  const status = await collectStatus(ctx);
  const sections = [
    await checkExternalTools(options.git ?? runGit),
    checkConfig(status),
    checkManagedPackages(status),
    checkUntracked(status)
  ];

  return {
    sections,
    healthy: sections.every(section => section.items.every(item => item.level !== 'error')),
    status
  };
}
