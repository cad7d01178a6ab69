import { TendrilError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure kinds the engine distinguishes.
 * All of them are contained at node granularity by the reconciler.
 */

/** A malformed package node; the node is skipped, the run continues. */
export class ValidationError extends TendrilError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export interface FetchErrorDetails {
  command?: readonly string[];
  exitCode?: number | string;
  stderr?: string;
  cause?: unknown;
}

/** A clone/pull/copy that did not complete. */
export class FetchError extends TendrilError {
  constructor(message: string, details: FetchErrorDetails = {}) {
    super(message, ErrorCodes.FETCH_ERROR, details);
    this.name = 'FetchError';
  }
}

/** A caller-supplied hook threw or rejected. */
export class HookError extends TendrilError {
  constructor(hookName: string, packageName: string, cause: unknown) {
    super(
      `${hookName} hook for '${packageName}' failed: ${describeError(cause)}`,
      ErrorCodes.HOOK_ERROR,
      { hookName, packageName, cause }
    );
    this.name = 'HookError';
  }
}

export class FileSystemError extends TendrilError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends TendrilError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Render any thrown value as a single line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof TendrilError) {
    // For CLI UX, avoid noisy error logs by default; surface details only in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      // Handle user cancellation gracefully - just exit without error message
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
