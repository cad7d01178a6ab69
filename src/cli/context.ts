/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with CLI-specific port implementations,
 * and the session a subcommand runs against.
 *
 * Output mode is committed once per command: rich (Clack) on an
 * interactive terminal, plain everywhere else.
 */

import type { ExecutionContext, OutputMode } from '../types/execution-context.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';
import { createPlainPrompt } from './plain-prompt-adapter.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import { TendrilSession } from '../core/session.js';
import { loadReconcilerConfig } from '../core/config.js';
import { loadManifest, resolveManifestPath } from '../utils/manifest-yml.js';
import { logger } from '../utils/logger.js';

export interface CliContextOptions {
  /** Explicit output mode; detected from the terminal when omitted */
  outputMode?: OutputMode;
}

/** Options shared by every subcommand */
export interface CliSessionOptions extends CliContextOptions {
  manifest?: string;
  installRoot?: string;
}

// ── Cached singletons ──────────────────────────────────────────────────────

let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;
let cachedClackPrompt: PromptPort | undefined;
let cachedPlainPrompt: PromptPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(): boolean {
  const isTTY = process.stdin.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Create an ExecutionContext with CLI-specific ports injected.
 *
 * Prompts are only wired up on an interactive terminal; elsewhere any
 * prompt attempt throws and the caller must pass a flag such as `--yes`.
 */
export function createCliExecutionContext(options: CliContextOptions = {}): ExecutionContext {
  const isTTY = detectInteractive();
  const mode: OutputMode = options.outputMode ?? (isTTY && process.stdout.isTTY === true ? 'rich' : 'plain');

  if (mode === 'rich') {
    return {
      outputMode: mode,
      output: cachedClackOutput ??= createClackOutput(),
      prompt: isTTY ? (cachedClackPrompt ??= createClackPrompt()) : nonInteractivePrompt
    };
  }

  return {
    outputMode: mode,
    output: cachedPlainOutput ??= createPlainOutput(),
    prompt: isTTY ? (cachedPlainPrompt ??= createPlainPrompt()) : nonInteractivePrompt
  };
}

/**
 * Load the manifest and configuration a subcommand names and wrap them
 * in a session with CLI ports.
 */
export async function loadCliSession(options: CliSessionOptions = {}): Promise<TendrilSession> {
  const manifestPath = await resolveManifestPath({ manifest: options.manifest });
  const manifest = await loadManifest(manifestPath);
  const config = await loadReconcilerConfig({
    manifest,
    overrides: options.installRoot !== undefined ? { installRoot: options.installRoot } : undefined
  });

  logger.debug('CLI session ready', { manifest: manifest.path, installRoot: config.installRoot });

  const session = new TendrilSession({
    ...createCliExecutionContext(options),
    config,
    baseDir: manifest.directory
  });
  await session.manage(manifest.packages);
  return session;
}
