import type { PackageSpec, PackageTree } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { validatePackageSpec } from './spec-validator.js';

export interface TreeVisitContext {
  /** 0 for top-level packages */
  depth: number;
  /** Position among siblings */
  index: number;
  siblingCount: number;
  parent?: PackageSpec;
}

export interface TreeVisitor {
  /** Called for each valid node, before its dependencies */
  visit(spec: PackageSpec, ctx: TreeVisitContext): void;
  /**
   * Called for each node that failed validation. When the node is a record
   * its dependencies are still walked, in its place.
   */
  invalid?(node: unknown, error: ValidationError, ctx: TreeVisitContext): void;
}

export interface FlatPackage {
  spec: PackageSpec;
  depth: number;
  parent?: PackageSpec;
}

export interface InvalidPackage {
  node: unknown;
  error: ValidationError;
  depth: number;
  parent?: PackageSpec;
}

export interface FlattenedTree {
  packages: FlatPackage[];
  invalid: InvalidPackage[];
}

function dependenciesOf(node: unknown): readonly unknown[] {
  if (typeof node !== 'object' || node === null || !('dependencies' in node)) {
    return [];
  }
  return Array.isArray(node.dependencies) ? node.dependencies : [];
}

/**
 * Depth-first pre-order walk: each node is handed to the visitor before
 * its dependencies are walked.
 *
 * Every node is visited once per walk. The same source declared in two
 * branches is two nodes and is visited twice. The input is never mutated.
 * A node that reappears among its own ancestors is reported as invalid
 * instead of being walked again.
 *
 * The dependencies of an invalid record are walked at the invalid node's
 * depth, under its nearest valid ancestor.
 */
export function walkPackageTree(roots: PackageTree, visitor: TreeVisitor): void {
  const ancestors = new Set<unknown>();

  const walkLevel = (nodes: readonly unknown[], depth: number, parent?: PackageSpec): void => {
    nodes.forEach((node, index) => {
      const ctx: TreeVisitContext = { depth, index, siblingCount: nodes.length, parent };

      if (ancestors.has(node)) {
        visitor.invalid?.(node, new ValidationError('package depends on itself through a dependency cycle', { node }), ctx);
        return;
      }

      const result = validatePackageSpec(node);
      ancestors.add(node);
      if (result.valid) {
        visitor.visit(result.spec, ctx);
        walkLevel(dependenciesOf(result.spec), depth + 1, result.spec);
      } else {
        visitor.invalid?.(node, result.error, ctx);
        walkLevel(dependenciesOf(node), depth, parent);
      }
      ancestors.delete(node);
    });
  };

  walkLevel(roots, 0);
}

/**
 * Collect every node of the tree in visit order.
 */
export function flattenPackageTree(roots: PackageTree): FlattenedTree {
  const flattened: FlattenedTree = { packages: [], invalid: [] };

  walkPackageTree(roots, {
    visit(spec, ctx) {
      flattened.packages.push({ spec, depth: ctx.depth, parent: ctx.parent });
    },
    invalid(node, error, ctx) {
      flattened.invalid.push({ node, error, depth: ctx.depth, parent: ctx.parent });
    }
  });

  return flattened;
}
