import type { PackageSpec, PackageTree } from '../types/index.js';
import { flattenPackageTree, type InvalidPackage } from './tree-walker.js';
import { resolvePackageName } from './path-resolver.js';

/**
 * Declared packages keyed by resolved name. Built fresh for every pass.
 */
export interface ManagedRegistry {
  packages: Map<string, PackageSpec>;
  /** Nodes that failed validation */
  invalid: InvalidPackage[];
}

/**
 * Flatten the tree into name → spec. When two nodes share a name the
 * first in visit order is kept; both count as declared.
 */
export function buildManagedRegistry(tree: PackageTree): ManagedRegistry {
  const { packages, invalid } = flattenPackageTree(tree);
  const registry: ManagedRegistry = { packages: new Map(), invalid };

  for (const entry of packages) {
    const name = resolvePackageName(entry.spec);
    if (!registry.packages.has(name)) {
      registry.packages.set(name, entry.spec);
    }
  }

  return registry;
}

/**
 * Directory names on disk that no declared package claims, sorted.
 */
export function findUntracked(registry: ManagedRegistry, onDisk: readonly string[]): string[] {
  return onDisk
    .filter(name => !registry.packages.has(name))
    .sort((a, b) => a.localeCompare(b));
}
