import type { StatusEntry, StatusReport } from './status-pipeline.js';
import type { HealthItem, HealthReport } from './health-checks.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { describeNode } from '../spec-validator.js';
import { formatPathForDisplay, getTreeConnector, getTreePrefix } from '../../utils/formatters.js';

// ---------------------------------------------------------------------------
// ANSI helpers
// ---------------------------------------------------------------------------

const DIM = '\x1b[2m';
const RESET = '\x1b[0m';
const CYAN = '\x1b[36m';

export function dim(text: string): string {
  return `${DIM}${text}${RESET}`;
}

export function cyan(text: string): string {
  return `${CYAN}${text}${RESET}`;
}

export function sectionHeader(title: string, count?: number): string {
  return count === undefined ? cyan(`[${title}]`) : `${cyan(`[${title}]`)} ${dim(`(${count})`)}`;
}

// ---------------------------------------------------------------------------
// Package list
// ---------------------------------------------------------------------------

export function formatPackageLine(entry: StatusEntry): string {
  const missing = entry.installed ? '' : dim(' (missing)');
  return `${entry.name} ${dim(`(${entry.source})`)}${missing}`;
}

function printDependencies(entries: readonly StatusEntry[], prefix: string, out: OutputPort): void {
  entries.forEach((entry, index) => {
    const isLast = index === entries.length - 1;
    out.info(`${prefix}${getTreeConnector(isLast)}${formatPackageLine(entry)}`);
    printDependencies(entry.dependencies, getTreePrefix(prefix, isLast), out);
  });
}

/**
 * Declared packages as a tree, then anything the tree does not account for.
 */
export function printPackageList(report: StatusReport, output?: OutputPort): void {
  const out = output ?? resolveOutput();

  out.info(`${sectionHeader('Packages', report.managedCount)} ${dim(formatPathForDisplay(report.installRoot))}`);
  if (report.packages.length === 0) {
    out.info(dim('No packages declared'));
  }

  for (const entry of report.packages) {
    out.info(formatPackageLine(entry));
    printDependencies(entry.dependencies, '', out);
  }

  for (const { node, error } of report.invalid) {
    out.warn(`Skipping invalid package ${describeNode(node)}: ${error.message}`);
  }

  if (report.untracked.length > 0) {
    out.warn(`Untracked packages: ${report.untracked.join(', ')}. Run \`tendril clean\` to remove them`);
  }
}

// ---------------------------------------------------------------------------
// Health report
// ---------------------------------------------------------------------------

function printHealthItem(item: HealthItem, out: OutputPort): void {
  const indent = '  '.repeat(item.depth ?? 0);
  const line = `${indent}${item.message}`;

  switch (item.level) {
    case 'ok':
      out.success(line);
      break;
    case 'warn':
      out.warn(line);
      break;
    case 'error':
      out.error(line);
      break;
  }

  for (const advice of item.advice ?? []) {
    out.info(`${indent}  ${dim('-')} ${advice}`);
  }
}

export function printHealthReport(report: HealthReport, output?: OutputPort): void {
  const out = output ?? resolveOutput();

  for (const section of report.sections) {
    out.step(sectionHeader(section.title));
    for (const item of section.items) {
      printHealthItem(item, out);
    }
  }
}
