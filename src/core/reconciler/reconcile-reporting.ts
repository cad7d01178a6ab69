import type { FetchMode, PackageResult } from '../../types/index.js';
import type { OutputPort } from '../ports/output.js';
import type { ValidationError } from '../../utils/errors.js';
import { describeNode } from '../spec-validator.js';

/**
 * One line per terminal state. Failures go out at error severity,
 * skips at warning, everything else as informational/success.
 */
export function reportPackageResult(mode: FetchMode, result: PackageResult, out: OutputPort): void {
  const label = `${result.name} (${result.source})`;
  const { outcome } = result;

  switch (outcome.status) {
    case 'installed':
      out.success(`Installed ${label}`);
      break;
    case 'updated':
      out.success(`Upgraded ${label}`);
      break;
    case 'unchanged':
      out.info(mode === 'install' ? `${label} is already installed` : `${label} is already up to date`);
      break;
    case 'skipped':
      out.warn(`Skipped ${label}: ${outcome.reason}`);
      break;
    case 'failed':
      out.error(`Failed to ${mode} ${label}: ${outcome.error.message}`);
      break;
  }
}

export function reportInvalidPackage(node: unknown, error: ValidationError, out: OutputPort): void {
  out.warn(`Skipping invalid package ${describeNode(node)}: ${error.message}`);
}
