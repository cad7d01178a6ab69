import { logger } from './logger.js';
import { FetchError } from './errors.js';
import { runExecutable, describeProcessFailure, type ProcessResult } from './process.js';

export type GitResult = ProcessResult;

export interface GitRunOptions {
  cwd?: string;
}

/**
 * Runs one git invocation. Resolves with captured output on exit 0,
 * rejects with a FetchError otherwise.
 */
export type GitRunner = (args: readonly string[], options?: GitRunOptions) => Promise<GitResult>;

export interface GitCloneOptions {
  url: string;
  destination: string;
  branch?: string;
}

// Matches both the current and the pre-2.x spelling
const UP_TO_DATE_PATTERN = /Already up[ -]to[ -]date/;

/**
 * Default runner: the `git` on PATH with a C locale, so that the
 * up-to-date marker is stable, and terminal prompts disabled.
 */
export const runGit: GitRunner = async (args, options = {}) => {
  logger.debug('Running git', { args, cwd: options.cwd });
  try {
    return await runExecutable('git', args, {
      cwd: options.cwd,
      env: { ...process.env, LC_ALL: 'C', GIT_TERMINAL_PROMPT: '0' }
    });
  } catch (error) {
    const failure = describeProcessFailure(error);
    throw new FetchError(`Git command failed: ${failure.message}`, {
      command: ['git', ...args],
      exitCode: failure.exitCode,
      stderr: failure.stderr,
      cause: error
    });
  }
};

/**
 * Shallow, single-branch, blob-filtered clone arguments.
 */
export function buildCloneArgs(options: GitCloneOptions): string[] {
  const args = ['clone', '--depth=1', '--filter=blob:none', '--single-branch'];
  if (options.branch) {
    args.push(`--branch=${options.branch}`);
  }
  args.push(options.url, options.destination);
  return args;
}

export function buildPullArgs(repoPath: string): string[] {
  return ['-C', repoPath, 'pull'];
}

/**
 * True when pull output says nothing changed.
 */
export function isAlreadyUpToDate(result: GitResult): boolean {
  return UP_TO_DATE_PATTERN.test(result.stdout) || UP_TO_DATE_PATTERN.test(result.stderr);
}

/**
 * Probe for a working git executable.
 */
export async function isGitAvailable(runner: GitRunner = runGit): Promise<boolean> {
  try {
    await runner(['--version']);
    return true;
  } catch {
    return false;
  }
}
