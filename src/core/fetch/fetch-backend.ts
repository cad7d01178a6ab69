/**
 * Fetch backend: acquires or refreshes one package's files.
 *
 * Remote packages go through git (shallow clone, pull in place); local
 * directories are copied wholesale. Each call is independent and
 * reports its result as a FetchOutcome instead of throwing.
 */

import type { FetchMode, FetchOutcome, PackageTarget } from '../../types/index.js';
import { TendrilError } from '../../types/index.js';
import { copyDirectory, exists, remove } from '../../utils/fs.js';
import { buildCloneArgs, buildPullArgs, isAlreadyUpToDate, runGit, type GitRunner } from '../../utils/git.js';
import { FetchError, describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface FetchBackend {
  /** Clone or copy when absent; `unchanged` when the install path already exists */
  install(target: PackageTarget): Promise<FetchOutcome>;
  /** Refresh in place; `skipped` when the install path does not exist */
  upgrade(target: PackageTarget): Promise<FetchOutcome>;
}

export interface FetchBackendOptions {
  git?: GitRunner;
}

export const NOT_INSTALLED_REASON = 'not installed';

function failed(error: unknown): FetchOutcome {
  return {
    status: 'failed',
    error: error instanceof TendrilError ? error : new FetchError(describeError(error), { cause: error })
  };
}

export function createFetchBackend(options: FetchBackendOptions = {}): FetchBackend {
  const git = options.git ?? runGit;

  async function install(target: PackageTarget): Promise<FetchOutcome> {
    if (await exists(target.installPath)) {
      return { status: 'unchanged' };
    }

    try {
      if (target.reference.kind === 'local') {
        await copyLocal(target.reference.path, target.installPath);
      } else {
        await git(buildCloneArgs({
          url: target.reference.url,
          destination: target.installPath,
          branch: target.spec.branch
        }));
      }
      logger.debug(`Installed ${target.name}`, { installPath: target.installPath });
      return { status: 'installed' };
    } catch (error) {
      return failed(error);
    }
  }

  async function upgrade(target: PackageTarget): Promise<FetchOutcome> {
    if (!(await exists(target.installPath))) {
      return { status: 'skipped', reason: NOT_INSTALLED_REASON };
    }

    try {
      if (target.reference.kind === 'local') {
        await remove(target.installPath);
        await copyLocal(target.reference.path, target.installPath);
        return { status: 'updated' };
      }

      const result = await git(buildPullArgs(target.installPath));
      return isAlreadyUpToDate(result) ? { status: 'unchanged' } : { status: 'updated' };
    } catch (error) {
      return failed(error);
    }
  }

  return { install, upgrade };
}

async function copyLocal(from: string, to: string): Promise<void> {
  try {
    await copyDirectory(from, to);
  } catch (error) {
    // A partial copy would read as installed on the next pass
    await remove(to).catch(cleanupError => {
      logger.debug(`Failed to clean up partial copy at ${to}`, { error: cleanupError });
    });
    throw error;
  }
}

/**
 * Dispatch helper for callers that hold the mode as data.
 */
export function runFetch(backend: FetchBackend, mode: FetchMode, target: PackageTarget): Promise<FetchOutcome> {
  return mode === 'install' ? backend.install(target) : backend.upgrade(target);
}
