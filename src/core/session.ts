/**
 * TendrilSession: the declared tree and configuration a front end is
 * currently working with.
 *
 * The session owns state between calls; the engine never does. Every
 * operation snapshots the session into a fresh ReconcileContext and
 * hands that to the pipeline.
 */

import type {
  ExecutionContext,
  PackageTree,
  ReconcilerConfig,
  ReconcilerConfigInput
} from '../types/index.js';
import type { HookError } from '../utils/errors.js';
import type { GitRunner } from '../utils/git.js';
import type { ReconcileContext } from './reconciler/reconcile-context.js';
import type { InvalidPackage } from './tree-walker.js';
import { walkPackageTree, type FlatPackage } from './tree-walker.js';
import { createFetchBackend, type FetchBackend } from './fetch/fetch-backend.js';
import { createCommandReindexer, type Reindexer } from './reindex.js';
import { installPackages, upgradePackages, type ReconcileSummary } from './reconciler/reconcile-pipeline.js';
import { runCleanPipeline, type CleanOptions, type CleanSummary } from './reconciler/clean-pipeline.js';
import { collectStatus, type StatusReport } from './status/status-pipeline.js';
import { runHealthChecks, type HealthReport } from './status/health-checks.js';
import { resolveInstallPath, resolvePackageName } from './path-resolver.js';
import { runHook } from './hooks.js';
import { mergeConfig, normalizeInstallRoot } from './config.js';
import { resolveOutput } from './ports/resolve.js';
import type { OutputPort } from './ports/output.js';
import { logger } from '../utils/logger.js';

export interface TendrilSessionOptions extends ExecutionContext {
  config: ReconcilerConfig;
  tree?: PackageTree;
  /** Directory relative local sources resolve against; defaults to cwd */
  baseDir?: string;
  git?: GitRunner;
  /** Replaces the git/copy backend entirely */
  backend?: FetchBackend;
  /** Replaces the command built from `config.reindexCommand` */
  reindexer?: Reindexer;
}

export interface ConfigureSummary {
  /** Nodes whose configure hook ran and returned */
  configured: number;
  failed: HookError[];
  invalid: InvalidPackage[];
}

export class TendrilSession {
  private tree: PackageTree;
  private config: ReconcilerConfig;
  private readonly baseDir: string;
  private readonly backend: FetchBackend;
  private readonly git?: GitRunner;
  private readonly reindexer?: Reindexer;
  private readonly execution: ExecutionContext;

  constructor(options: TendrilSessionOptions) {
    this.tree = options.tree ?? [];
    this.config = { ...options.config };
    this.baseDir = options.baseDir ?? process.cwd();
    this.git = options.git;
    this.backend = options.backend ?? createFetchBackend({ git: options.git });
    this.reindexer = options.reindexer;
    this.execution = { output: options.output, prompt: options.prompt, outputMode: options.outputMode };
  }

  get output(): OutputPort {
    return resolveOutput(this.execution);
  }

  getTree(): PackageTree {
    return this.tree;
  }

  getConfig(): ReconcilerConfig {
    return { ...this.config };
  }

  /**
   * Register a new declared tree, merge any supplied settings over the
   * current ones, then run each valid node's configure hook once, parents
   * before their dependencies. Hook failures are reported and the
   * remaining hooks still run. Invalid nodes are collected, not reported.
   */
  async manage(tree: PackageTree, config: ReconcilerConfigInput = {}): Promise<ConfigureSummary> {
    const layer: ReconcilerConfigInput = { ...config };
    if (layer.installRoot !== undefined) {
      layer.installRoot = normalizeInstallRoot(layer.installRoot, this.baseDir);
    }

    this.tree = tree;
    this.config = mergeConfig(this.config, layer);
    logger.debug('Registered package tree', { roots: tree.length, config: this.config });

    const out = this.output;
    const nodes: FlatPackage[] = [];
    const summary: ConfigureSummary = { configured: 0, failed: [], invalid: [] };

    walkPackageTree(tree, {
      visit(spec, visit) {
        nodes.push({ spec, depth: visit.depth, parent: visit.parent });
      },
      invalid(node, error, visit) {
        // Reported by whichever pass acts on the tree next
        summary.invalid.push({ node, error, depth: visit.depth, parent: visit.parent });
      }
    });

    for (const { spec } of nodes) {
      const result = await runHook(spec.configureHook, 'configure', {
        name: resolvePackageName(spec),
        source: spec.source,
        installPath: resolveInstallPath(spec, this.config)
      });

      if (result.status === 'ok') {
        summary.configured += 1;
      } else if (result.status === 'failed') {
        summary.failed.push(result.error);
        out.error(result.error.message);
      }
    }

    return summary;
  }

  install(): Promise<ReconcileSummary> {
    return installPackages(this.createContext());
  }

  upgrade(): Promise<ReconcileSummary> {
    return upgradePackages(this.createContext());
  }

  clean(options: CleanOptions = {}): Promise<CleanSummary> {
    return runCleanPipeline(this.createContext(), options);
  }

  status(): Promise<StatusReport> {
    return collectStatus(this.createContext());
  }

  health(): Promise<HealthReport> {
    return runHealthChecks(this.createContext(), { git: this.git });
  }

  private createContext(): ReconcileContext {
    const config = this.getConfig();
    return {
      ...this.execution,
      tree: this.tree,
      config,
      baseDir: this.baseDir,
      backend: this.backend,
      reindexer: this.reindexer ?? createCommandReindexer(config.reindexCommand)
    };
  }
}
