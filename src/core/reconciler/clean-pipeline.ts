import { join } from 'path';
import type { ReconcileContext } from './reconcile-context.js';
import { buildManagedRegistry, findUntracked } from '../registry.js';
import { listInstalledDirectories } from '../status/status-pipeline.js';
import { runReindexStep } from '../reindex.js';
import { resolveOutput, resolvePrompt } from '../ports/resolve.js';
import { reportInvalidPackage } from './reconcile-reporting.js';
import { remove } from '../../utils/fs.js';
import { describeError } from '../../utils/errors.js';
import { formatPathForDisplay } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';

export interface CleanOptions {
  /** Caller has already confirmed; skip the prompt */
  yes?: boolean;
  /** Defaults to a recursive delete */
  removeDirectory?: (path: string) => Promise<void>;
}

export interface CleanFailure {
  name: string;
  path: string;
  message: string;
}

export interface CleanSummary {
  /** Untracked directory names, sorted */
  candidates: string[];
  removed: string[];
  failed: CleanFailure[];
  cancelled: boolean;
  reindexed: boolean;
}

/**
 * Remove every directory under the install root that the declared tree
 * does not name. Nothing is deleted without an affirmative answer.
 */
export async function runCleanPipeline(ctx: ReconcileContext, options: CleanOptions = {}): Promise<CleanSummary> {
  const out = resolveOutput(ctx);
  const registry = buildManagedRegistry(ctx.tree);

  for (const { node, error } of registry.invalid) {
    reportInvalidPackage(node, error, out);
  }

  const onDisk = await listInstalledDirectories(ctx.config.installRoot);
  const candidates = findUntracked(registry, onDisk);
  const summary: CleanSummary = { candidates, removed: [], failed: [], cancelled: false, reindexed: false };

  if (candidates.length === 0) {
    out.info('No packages to remove');
    return summary;
  }

  out.note(
    candidates.map(name => `  ${formatPathForDisplay(join(ctx.config.installRoot, name))}`).join('\n'),
    'Remove the following directories?'
  );

  const confirmed = options.yes === true || await resolvePrompt(ctx).confirm('Proceed with removal?', false);
  if (!confirmed) {
    out.info('Clean cancelled');
    summary.cancelled = true;
    return summary;
  }

  const removeDirectory = options.removeDirectory ?? remove;
  out.step('Removing unused packages...');
  for (const name of candidates) {
    const path = join(ctx.config.installRoot, name);
    try {
      await removeDirectory(path);
      summary.removed.push(name);
      out.success(`Removed ${name}`);
    } catch (error) {
      const message = describeError(error);
      logger.debug(`Failed to remove ${path}`, { error });
      summary.failed.push({ name, path, message });
      out.error(`Failed to remove ${name}: ${message}`);
    }
  }

  if (summary.removed.length > 0) {
    summary.reindexed = await runReindexStep(ctx.reindexer, ctx.config.installRoot, out);
  }

  return summary;
}
