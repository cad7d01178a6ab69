import * as yaml from 'js-yaml';
import { dirname, join, resolve } from 'path';
import type { PackageHook, PackageTree, ReconcilerConfigInput } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { parseConfigFields } from '../core/config.js';
import { getTendrilDirectories } from '../core/directory.js';
import { exists, readTextFile } from './fs.js';
import { runShell } from './process.js';
import { ConfigError, describeError } from './errors.js';
import { logger } from './logger.js';

/**
 * A tendril.yml file, read and converted to a package tree.
 */
export interface LoadedManifest {
  path: string;
  /** Directory holding the manifest; relative local sources resolve against it */
  directory: string;
  packages: PackageTree;
  /** Top-level settings (installRoot, gitHost, reindexCommand) */
  settings: ReconcilerConfigInput;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function shellHook(command: string, cwdFor: (installPath: string) => string): PackageHook {
  return async ({ installPath }) => {
    logger.debug(`Running hook command: ${command}`, { cwd: cwdFor(installPath) });
    await runShell(command, { cwd: cwdFor(installPath) });
  };
}

/**
 * Turn one YAML package entry into a tree node. Hook command strings
 * become functions; a `postCheckout` command runs inside the package's
 * install directory, a `configure` command inside the manifest directory.
 * Anything that does not look like an entry is returned as-is and left
 * for the spec validator.
 */
function toPackageNode(entry: unknown, manifestDir: string): unknown {
  if (!isRecord(entry)) {
    return entry;
  }

  const { postCheckout, configure, dependencies, ...rest } = entry;
  const node: Record<string, unknown> = { ...rest };

  if (typeof postCheckout === 'string' && postCheckout.trim()) {
    node.postCheckoutHook = shellHook(postCheckout, installPath => installPath);
  }
  if (typeof configure === 'string' && configure.trim()) {
    node.configureHook = shellHook(configure, () => manifestDir);
  }
  if (dependencies !== undefined) {
    node.dependencies = Array.isArray(dependencies)
      ? dependencies.map(dependency => toPackageNode(dependency, manifestDir))
      : dependencies;
  }

  return node;
}

/**
 * Parse manifest text. Exposed separately from {@link loadManifest} so
 * callers holding YAML in memory skip the filesystem.
 */
export function parseManifest(content: string, manifestPath: string): LoadedManifest {
  const directory = dirname(manifestPath);

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${manifestPath}: ${describeError(error)}`, { manifestPath, error });
  }

  if (parsed === undefined || parsed === null) {
    return { path: manifestPath, directory, packages: [], settings: {} };
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${manifestPath}: manifest must be a mapping with a packages list`);
  }

  const packages = parsed.packages ?? [];
  if (!Array.isArray(packages)) {
    throw new ConfigError(`${manifestPath}: packages must be a list`);
  }

  return {
    path: manifestPath,
    directory,
    packages: packages.map((entry: unknown) => toPackageNode(entry, directory)),
    settings: parseConfigFields(parsed, manifestPath, directory)
  };
}

/**
 * Read and parse a tendril.yml file
 */
export async function loadManifest(manifestPath: string): Promise<LoadedManifest> {
  const absolutePath = resolve(manifestPath);
  if (!(await exists(absolutePath))) {
    throw new ConfigError(`Manifest not found: ${absolutePath}`);
  }

  logger.debug(`Loading manifest from: ${absolutePath}`);
  return parseManifest(await readTextFile(absolutePath), absolutePath);
}

export interface ResolveManifestPathOptions {
  /** Explicit path, e.g. from `--manifest` */
  manifest?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Which manifest a command reads: the explicit path, else `./tendril.yml`
 * when present, else the one in the config directory.
 */
export async function resolveManifestPath(options: ResolveManifestPathOptions = {}): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  if (options.manifest) {
    return resolve(cwd, options.manifest);
  }

  const local = join(cwd, FILE_PATTERNS.MANIFEST_YML);
  if (await exists(local)) {
    return local;
  }

  return join(getTendrilDirectories(options.env).config, FILE_PATTERNS.MANIFEST_YML);
}
