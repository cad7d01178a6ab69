/**
 * Common types and interfaces for the tendril package manager
 */

export * from './execution-context.js';

// Package declaration types

/**
 * What a hook is told about the package it runs for.
 */
export interface PackageHookContext {
  name: string;
  source: string;
  installPath: string;
}

/**
 * Lifecycle callback attached to a package. Return value is ignored;
 * a thrown error or rejected promise is reported and discarded.
 */
export type PackageHook = (context: PackageHookContext) => void | Promise<void>;

/**
 * A declared package: one node in the package tree.
 *
 * `dependencies` are owned exclusively by this node. Trees loaded from a
 * manifest may carry malformed nodes at any depth; those are classified by
 * the spec validator at reconcile time rather than when the tree is built.
 */
export interface PackageSpec {
  /** Remote reference (`owner/repo`, a URL) or a local directory path */
  source: string;
  /** Overrides the local name derived from `source` */
  alias?: string;
  /** Version-control ref to pin */
  branch?: string;
  dependencies?: readonly PackageSpec[];
  /** Runs after this package has been freshly installed or updated */
  postCheckoutHook?: PackageHook;
  /** Runs once when the tree is registered, regardless of fetch outcome */
  configureHook?: PackageHook;
}

/**
 * A declared tree as supplied by the caller. Nodes are `unknown` until
 * validated so that malformed entries survive to be reported individually.
 */
export type PackageTree = readonly unknown[];

// Configuration types

export interface ReconcilerConfig {
  /** Absolute directory under which every package directory lives */
  installRoot: string;
  /** URL prefix used to expand `owner/repo` shorthand into a clone URL */
  gitHost: string;
  /** argv run once after a mutating pass; empty disables re-indexing */
  reindexCommand: readonly string[];
}

/** Fields a caller may supply to override the active configuration. */
export type ReconcilerConfigInput = Partial<ReconcilerConfig>;

export interface TendrilUserConfig {
  installRoot?: string;
  gitHost?: string;
  reindexCommand?: string[];
}

// Resolution types

export type RepositoryReference =
  | { kind: 'remote'; url: string }
  | { kind: 'local'; path: string };

/**
 * Everything the fetch backend needs to act on one node.
 */
export interface PackageTarget {
  spec: PackageSpec;
  name: string;
  installPath: string;
  reference: RepositoryReference;
}

// Fetch outcome types

export type FetchMode = 'install' | 'upgrade';

export type FetchOutcome =
  | { status: 'installed' }
  | { status: 'updated' }
  | { status: 'unchanged' }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: TendrilError };

export type FetchStatus = FetchOutcome['status'];

/**
 * Per-node result of an install or upgrade pass.
 */
export interface PackageResult {
  name: string;
  source: string;
  installPath: string;
  depth: number;
  outcome: FetchOutcome;
  /** Set when the post-checkout hook ran and failed */
  hookError?: TendrilError;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Error types
export class TendrilError extends Error {
  public code: ErrorCodes;
  public details?: unknown;

  constructor(message: string, code: ErrorCodes, details?: unknown) {
    super(message);
    this.name = 'TendrilError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  FETCH_ERROR = 'FETCH_ERROR',
  HOOK_ERROR = 'HOOK_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
