/**
 * Library entry point: drive tendril from another program (for example an
 * editor integration registering function hooks) without the CLI.
 */

export * from './types/index.js';
export type { OutputPort, UnifiedSpinner, PromptPort } from './core/ports/index.js';
export { consoleOutput, nonInteractivePrompt, NonInteractivePromptError } from './core/ports/index.js';

export { TendrilSession, type TendrilSessionOptions, type ConfigureSummary } from './core/session.js';
export { runCommand, resolveCommandName, type RunCommandOptions } from './core/command-surface.js';
export { loadReconcilerConfig, getDefaultConfig, mergeConfig, type LoadReconcilerConfigOptions } from './core/config.js';
export { getTendrilDirectories, getDefaultInstallRoot, type TendrilDirectories } from './core/directory.js';
export { loadManifest, parseManifest, resolveManifestPath, type LoadedManifest } from './utils/manifest-yml.js';

export { validatePackageSpec, isPackageSpec, type SpecValidationResult } from './core/spec-validator.js';
export {
  deriveNameFromSource,
  resolvePackageName,
  resolveInstallPath,
  resolveRepositoryReference,
  resolvePackageTarget
} from './core/path-resolver.js';
export {
  walkPackageTree,
  flattenPackageTree,
  type TreeVisitor,
  type TreeVisitContext,
  type FlatPackage,
  type InvalidPackage,
  type FlattenedTree
} from './core/tree-walker.js';
export { buildManagedRegistry, findUntracked, type ManagedRegistry } from './core/registry.js';
export { createFetchBackend, runFetch, type FetchBackend, type FetchBackendOptions } from './core/fetch/fetch-backend.js';
export { createCommandReindexer, type Reindexer } from './core/reindex.js';
export {
  installPackages,
  upgradePackages,
  runReconcilePipeline,
  type ReconcileSummary
} from './core/reconciler/reconcile-pipeline.js';
export { runCleanPipeline, type CleanOptions, type CleanSummary, type CleanFailure } from './core/reconciler/clean-pipeline.js';
export type { ReconcileContext } from './core/reconciler/reconcile-context.js';
export { collectStatus, type StatusReport, type StatusEntry } from './core/status/status-pipeline.js';
export { runHealthChecks, type HealthReport, type HealthSection, type HealthItem } from './core/status/health-checks.js';
export { printPackageList, printHealthReport } from './core/status/status-printers.js';

export {
  ValidationError,
  FetchError,
  HookError,
  FileSystemError,
  ConfigError,
  UserCancellationError
} from './utils/errors.js';
export type { GitRunner, GitResult } from './utils/git.js';
