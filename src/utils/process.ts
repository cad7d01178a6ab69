import { exec, execFile } from 'child_process';
import { promisify } from 'util';

const execAsync = promisify(exec);
const execFileAsync = promisify(execFile);

const MAX_BUFFER = 16 * 1024 * 1024;

export interface ProcessResult {
  stdout: string;
  stderr: string;
}

export interface ProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Details pulled off a rejected exec/execFile call.
 */
export interface ProcessFailure {
  message: string;
  /** Exit status, or an errno string such as ENOENT when spawning failed */
  exitCode?: number | string;
  stderr?: string;
}

/**
 * Run an executable without a shell and capture its output.
 * Rejects when the process cannot be spawned or exits nonzero.
 */
export async function runExecutable(
  file: string,
  args: readonly string[],
  options: ProcessOptions = {}
): Promise<ProcessResult> {
  const { stdout, stderr } = await execFileAsync(file, args, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    maxBuffer: MAX_BUFFER
  });
  return { stdout, stderr };
}

/**
 * Run a command line through the user's shell.
 */
export async function runShell(command: string, options: ProcessOptions = {}): Promise<ProcessResult> {
  const { stdout, stderr } = await execAsync(command, {
    cwd: options.cwd,
    env: options.env ?? process.env,
    maxBuffer: MAX_BUFFER
  });
  return { stdout, stderr };
}

export function describeProcessFailure(error: unknown): ProcessFailure {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const code = 'code' in error ? error.code : undefined;
  const exitCode = typeof code === 'number' || typeof code === 'string' ? code : undefined;
  const rawStderr = 'stderr' in error ? error.stderr : undefined;
  const stderr = typeof rawStderr === 'string' && rawStderr.trim() ? rawStderr.trim() : undefined;

  if (exitCode === 'ENOENT') {
    return { message: 'executable not found', exitCode };
  }

  return {
    message: stderr ?? error.message,
    exitCode,
    stderr
  };
}
