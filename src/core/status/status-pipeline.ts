import type { ReconcileContext } from '../reconciler/reconcile-context.js';
import { walkPackageTree, type InvalidPackage } from '../tree-walker.js';
import { buildManagedRegistry, findUntracked } from '../registry.js';
import { resolveInstallPath, resolvePackageName } from '../path-resolver.js';
import { exists, isDirectory, listDirectories } from '../../utils/fs.js';

export interface StatusEntry {
  name: string;
  source: string;
  installPath: string;
  depth: number;
  installed: boolean;
  dependencies: StatusEntry[];
}

export interface StatusReport {
  installRoot: string;
  installRootExists: boolean;
  /** Top-level entries; nested dependencies hang off each entry */
  packages: StatusEntry[];
  /** Every valid node, in walk order */
  managedCount: number;
  invalid: InvalidPackage[];
  /** Directories under the install root no declared package claims */
  untracked: string[];
  /** Declared package names with no directory yet */
  missing: string[];
}

export type StatusContext = Pick<ReconcileContext, 'tree' | 'config'>;

/**
 * Directory names directly under the install root. A root that does not
 * exist yet has no entries.
 */
export async function listInstalledDirectories(installRoot: string): Promise<string[]> {
  if (!(await isDirectory(installRoot))) {
    return [];
  }
  return listDirectories(installRoot);
}

/**
 * Cross-reference the declared tree with the install root. Read-only.
 */
export async function collectStatus(ctx: StatusContext): Promise<StatusReport> {
  const { tree, config } = ctx;
  const roots: StatusEntry[] = [];
  const invalid: InvalidPackage[] = [];
  const flat: StatusEntry[] = [];
  // Most recent entry at each depth; a node's parent is the entry one level up
  const lineage: StatusEntry[] = [];

  walkPackageTree(tree, {
    visit(spec, visit) {
      const entry: StatusEntry = {
        name: resolvePackageName(spec),
        source: spec.source,
        installPath: resolveInstallPath(spec, config),
        depth: visit.depth,
        installed: false,
        dependencies: []
      };

      lineage[visit.depth] = entry;
      if (visit.depth === 0) {
        roots.push(entry);
      } else {
        lineage[visit.depth - 1].dependencies.push(entry);
      }
      flat.push(entry);
    },
    invalid(node, error, visit) {
      invalid.push({ node, error, depth: visit.depth, parent: visit.parent });
    }
  });

  await Promise.all(flat.map(async entry => {
    entry.installed = await exists(entry.installPath);
  }));

  const onDisk = await listInstalledDirectories(config.installRoot);
  const registry = buildManagedRegistry(tree);
  const missing = [...new Set(flat.filter(entry => !entry.installed).map(entry => entry.name))];

  return {
    installRoot: config.installRoot,
    installRootExists: await isDirectory(config.installRoot),
    packages: roots,
    managedCount: flat.length,
    invalid,
    untracked: findUntracked(registry, onDisk),
    missing
  };
}
