import type { PackageSpec } from '../types/index.js';
import { ValidationError } from '../utils/errors.js';
import { resolvePackageName } from './path-resolver.js';

export type SpecValidationResult =
  | { valid: true; spec: PackageSpec }
  | { valid: false; error: ValidationError };

export const EXPECTED_SPEC_SHAPE = "{ source: 'owner/repo' }";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard: a structured record with a non-empty string `source`.
 * Dependencies are not inspected; every node is checked when it is visited.
 */
export function isPackageSpec(node: unknown): node is PackageSpec {
  return isRecord(node) && typeof node.source === 'string' && node.source.trim().length > 0;
}

/**
 * Classify a candidate node: it must be a record with a usable source,
 * and the name it installs under must be a single directory entry.
 * Pure; never throws.
 */
export function validatePackageSpec(node: unknown): SpecValidationResult {
  if (isPackageSpec(node)) {
    try {
      resolvePackageName(node);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      return { valid: false, error };
    }
    return { valid: true, spec: node };
  }

  if (!isRecord(node)) {
    return {
      valid: false,
      error: new ValidationError(
        `package must be a table with a source, e.g. ${EXPECTED_SPEC_SHAPE}; got ${describeNode(node)}`,
        { node }
      )
    };
  }

  const reason = node.source === undefined
    ? 'missing source'
    : typeof node.source !== 'string'
      ? `source must be a string, got ${describeNode(node.source)}`
      : 'source is empty';

  return {
    valid: false,
    error: new ValidationError(`${reason}; expected e.g. ${EXPECTED_SPEC_SHAPE}`, { node })
  };
}

/**
 * Short human-readable rendering of an arbitrary node for warnings.
 */
export function describeNode(node: unknown): string {
  if (node === null) return 'null';
  if (Array.isArray(node)) return 'a list';
  if (typeof node === 'string') return `string '${node}'`;
  if (typeof node === 'object') {
    try {
      return JSON.stringify(node);
    } catch {
      return 'object';
    }
  }
  return `${typeof node} ${String(node)}`;
}
