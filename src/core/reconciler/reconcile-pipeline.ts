/**
 * Install / upgrade pipeline.
 *
 * The tree is walked once, synchronously. Each valid node's fetch is
 * dispatched as soon as the walker reaches it, before its dependencies are
 * visited, and runs concurrently with every other node's fetch. Results are
 * joined at a single barrier; the summary and the re-index decision are
 * made only after every dispatched fetch has settled.
 */

import type { FetchMode, FetchOutcome, FetchStatus, PackageResult, PackageSpec, RepositoryReference } from '../../types/index.js';
import { TendrilError } from '../../types/index.js';
import type { ReconcileContext } from './reconcile-context.js';
import type { InvalidPackage } from '../tree-walker.js';
import { walkPackageTree } from '../tree-walker.js';
import { resolveInstallPath, resolvePackageName, resolveRepositoryReference } from '../path-resolver.js';
import { NOT_INSTALLED_REASON, runFetch } from '../fetch/fetch-backend.js';
import { runHook } from '../hooks.js';
import { runReindexStep } from '../reindex.js';
import { resolveOutput } from '../ports/resolve.js';
import type { OutputPort } from '../ports/output.js';
import { reportInvalidPackage, reportPackageResult } from './reconcile-reporting.js';
import { ensureDir, exists } from '../../utils/fs.js';
import { FetchError, describeError } from '../../utils/errors.js';
import { formatCount } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';

export interface ReconcileSummary {
  mode: FetchMode;
  /** One entry per dispatched node, in walk order */
  results: PackageResult[];
  invalid: InvalidPackage[];
  counts: Record<FetchStatus, number>;
  /** True when the pass changed something and the re-index step completed */
  reindexed: boolean;
}

const HOOK_TRIGGER: Record<FetchMode, FetchStatus> = {
  install: 'installed',
  upgrade: 'updated'
};

export function installPackages(ctx: ReconcileContext): Promise<ReconcileSummary> {
  return runReconcilePipeline('install', ctx);
}

export function upgradePackages(ctx: ReconcileContext): Promise<ReconcileSummary> {
  return runReconcilePipeline('upgrade', ctx);
}

export async function runReconcilePipeline(mode: FetchMode, ctx: ReconcileContext): Promise<ReconcileSummary> {
  const out = resolveOutput(ctx);
  out.step(mode === 'install' ? 'Installing packages...' : 'Upgrading packages...');

  if (mode === 'install') {
    await ensureDir(ctx.config.installRoot);
  }

  const pending: Array<Promise<PackageResult>> = [];
  const invalid: InvalidPackage[] = [];
  // install path -> source of the node that claimed it first
  const claimed = new Map<string, string>();

  walkPackageTree(ctx.tree, {
    visit(spec, visit) {
      const name = resolvePackageName(spec);
      const installPath = resolveInstallPath(spec, ctx.config);
      const base = { name, source: spec.source, installPath, depth: visit.depth };
      const owner = claimed.get(installPath);
      if (owner !== undefined) {
        const result: PackageResult = {
          ...base,
          outcome: { status: 'skipped', reason: `duplicate of ${owner}` }
        };
        reportPackageResult(mode, result, out);
        pending.push(Promise.resolve(result));
        return;
      }

      claimed.set(installPath, spec.source);
      pending.push(processPackage(mode, spec, base, ctx, out));
    },
    invalid(node, error, visit) {
      invalid.push({ node, error, depth: visit.depth, parent: visit.parent });
      reportInvalidPackage(node, error, out);
    }
  });

  const results = await Promise.all(pending);
  const counts = countOutcomes(results);
  const changed = counts.installed + counts.updated > 0;

  if (counts.failed > 0) {
    out.warn(`${formatCount(counts.failed, 'package')} failed to ${mode}`);
  }

  let reindexed = false;
  if (changed) {
    reindexed = await runReindexStep(ctx.reindexer, ctx.config.installRoot, out);
  } else if (counts.failed === 0) {
    out.info(mode === 'install' ? 'All packages are already installed' : 'Packages are already up to date');
  }

  return { mode, results, invalid, counts, reindexed };
}

/**
 * Fetch one node, report it, then run its post-checkout hook if the fetch
 * changed it. Never rejects.
 */
async function processPackage(
  mode: FetchMode,
  spec: PackageSpec,
  base: Omit<PackageResult, 'outcome'>,
  ctx: ReconcileContext,
  out: OutputPort
): Promise<PackageResult> {
  const result: PackageResult = { ...base, outcome: await fetchPackage(mode, spec, base, ctx) };
  reportPackageResult(mode, result, out);

  if (result.outcome.status === HOOK_TRIGGER[mode] && typeof spec.postCheckoutHook === 'function') {
    out.info(`Running post checkout for ${result.name}`);
    const hook = await runHook(spec.postCheckoutHook, 'postCheckout', {
      name: result.name,
      source: result.source,
      installPath: result.installPath
    });
    if (hook.status === 'failed') {
      result.hookError = hook.error;
      out.error(hook.error.message);
    }
  }

  return result;
}

async function fetchPackage(
  mode: FetchMode,
  spec: PackageSpec,
  base: Omit<PackageResult, 'outcome'>,
  ctx: ReconcileContext
): Promise<FetchOutcome> {
  let reference: RepositoryReference;
  try {
    reference = await resolveRepositoryReference(spec.source, ctx.config, ctx.baseDir);
  } catch (error) {
    // Presence on disk decides first, as it does inside the backend
    const present = await exists(base.installPath);
    if (mode === 'install' && present) return { status: 'unchanged' };
    if (mode === 'upgrade' && !present) return { status: 'skipped', reason: NOT_INSTALLED_REASON };
    return { status: 'failed', error: toTendrilError(error) };
  }

  try {
    return await runFetch(ctx.backend, mode, {
      spec,
      name: base.name,
      installPath: base.installPath,
      reference
    });
  } catch (error) {
    logger.debug(`Fetch backend rejected for ${base.name}`, { error });
    return { status: 'failed', error: toTendrilError(error) };
  }
}

function toTendrilError(error: unknown): TendrilError {
  return error instanceof TendrilError ? error : new FetchError(describeError(error), { cause: error });
}

function countOutcomes(results: readonly PackageResult[]): Record<FetchStatus, number> {
  const counts: Record<FetchStatus, number> = { installed: 0, updated: 0, unchanged: 0, skipped: 0, failed: 0 };
  for (const result of results) {
    counts[result.outcome.status] += 1;
  }
  return counts;
}
