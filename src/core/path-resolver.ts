/**
 * Path resolution for declared packages.
 *
 * A package's local name is its alias, or the last path segment of its
 * source. Its install path is that name directly under the install root.
 * Names are pure functions of the spec; only the repository reference
 * (local directory vs. remote URL) touches the filesystem.
 */

import { isAbsolute, join, resolve } from 'path';
import type { PackageSpec, PackageTarget, ReconcilerConfig, RepositoryReference } from '../types/index.js';
import { expandTilde } from '../utils/home-directory.js';
import { isDirectory } from '../utils/fs.js';
import { FetchError, ValidationError } from '../utils/errors.js';

const URL_SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;
// user@host:path, as accepted by git for ssh remotes
const SCP_LIKE_PATTERN = /^[\w.-]+@[\w.-]+:/;

/**
 * Last path segment of a source, after home expansion and trailing-slash removal.
 */
export function deriveNameFromSource(source: string): string {
  const stripped = expandTilde(source.trim()).replace(/\/+$/, '');
  return stripped.slice(stripped.lastIndexOf('/') + 1);
}

/**
 * The directory name a package installs under.
 *
 * @throws ValidationError when the name cannot be a single directory entry
 */
export function resolvePackageName(spec: Pick<PackageSpec, 'source' | 'alias'>): string {
  const name = spec.alias !== undefined ? spec.alias : deriveNameFromSource(spec.source);

  if (typeof name !== 'string' || name.length === 0 || name === '.' || name === '..') {
    throw new ValidationError(`cannot derive a package name from source '${spec.source}'`, { spec });
  }
  if (name.includes('/') || name.includes('\\')) {
    throw new ValidationError(`package name '${name}' must not contain a path separator`, { spec });
  }

  return name;
}

export function resolveInstallPath(
  spec: Pick<PackageSpec, 'source' | 'alias'>,
  config: Pick<ReconcilerConfig, 'installRoot'>
): string {
  return join(config.installRoot, resolvePackageName(spec));
}

export function hasUrlScheme(source: string): boolean {
  return URL_SCHEME_PATTERN.test(source) || SCP_LIKE_PATTERN.test(source);
}

/**
 * Sources that name a filesystem location rather than an `owner/repo` shorthand.
 */
export function isPathLikeSource(source: string): boolean {
  return (
    isAbsolute(source) ||
    source === '~' ||
    source.startsWith('~/') ||
    source === '.' ||
    source === '..' ||
    source.startsWith('./') ||
    source.startsWith('../')
  );
}

/**
 * Build the clone URL for a shorthand such as `owner/repo`.
 */
export function expandShorthand(source: string, gitHost: string): string {
  const repo = source.trim().replace(/^\/+|\/+$/g, '');
  const suffix = repo.endsWith('.git') ? '' : '.git';
  return `${gitHost.replace(/\/+$/, '')}/${repo}${suffix}`;
}

/**
 * Decide where a package's files come from.
 *
 * - URLs (including `user@host:path`) are used verbatim
 * - path-like sources must be existing directories, resolved against `baseDir`
 * - anything else is shorthand for a repository on the configured git host
 *
 * @throws FetchError when a path-like source is not a directory
 */
export async function resolveRepositoryReference(
  source: string,
  config: Pick<ReconcilerConfig, 'gitHost'>,
  baseDir: string
): Promise<RepositoryReference> {
  const trimmed = source.trim();

  if (hasUrlScheme(trimmed)) {
    return { kind: 'remote', url: trimmed };
  }

  if (isPathLikeSource(trimmed)) {
    const localPath = resolve(baseDir, expandTilde(trimmed));
    if (!(await isDirectory(localPath))) {
      throw new FetchError(`Local source not found: ${localPath}`);
    }
    return { kind: 'local', path: localPath };
  }

  return { kind: 'remote', url: expandShorthand(trimmed, config.gitHost) };
}

export async function resolvePackageTarget(
  spec: PackageSpec,
  config: ReconcilerConfig,
  baseDir: string
): Promise<PackageTarget> {
  const name = resolvePackageName(spec);
  return {
    spec,
    name,
    installPath: join(config.installRoot, name),
    reference: await resolveRepositoryReference(spec.source, config, baseDir)
  };
}
