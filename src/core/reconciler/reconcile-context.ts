import type { ExecutionContext, PackageTree, ReconcilerConfig } from '../../types/index.js';
import type { FetchBackend } from '../fetch/fetch-backend.js';
import type { Reindexer } from '../reindex.js';

/**
 * Everything one reconciliation pass reads. Built per invocation and
 * treated as read-only for the duration of the pass.
 */
export interface ReconcileContext extends ExecutionContext {
  tree: PackageTree;
  config: ReconcilerConfig;
  /** Directory that relative local sources resolve against */
  baseDir: string;
  backend: FetchBackend;
  reindexer: Reindexer;
}
