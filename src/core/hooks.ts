import type { PackageHook, PackageHookContext } from '../types/index.js';
import { HookError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type HookName = 'postCheckout' | 'configure';

export type HookResult =
  | { status: 'skipped' }
  | { status: 'ok' }
  | { status: 'failed'; error: HookError };

/**
 * Invoke an optional package hook. Anything that is not a function is
 * treated as absent. Errors are captured in the result, never thrown.
 */
export async function runHook(
  hook: PackageHook | undefined,
  hookName: HookName,
  context: PackageHookContext
): Promise<HookResult> {
  if (typeof hook !== 'function') {
    return { status: 'skipped' };
  }

  try {
    await hook(context);
    return { status: 'ok' };
  } catch (cause) {
    const error = new HookError(hookName, context.name, cause);
    logger.debug(error.message, { cause });
    return { status: 'failed', error };
  }
}
