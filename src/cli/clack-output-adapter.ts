/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementations: @clack/prompts for rich
 * interactive sessions, plain console lines with an ora spinner otherwise.
 */

import { log, spinner as clackSpinner, note as clackNote } from '@clack/prompts';
import { Spinner } from '../utils/spinner.js';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';
import { consoleOutput } from '../core/ports/console-output.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    note(content: string, title?: string): void {
      clackNote(content, title ?? '');
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage);
            isStarted = false;
          }
        },
        fail(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage, 1);
            isStarted = false;
          }
        },
        message(text: string) {
          if (isStarted) {
            s.message(text);
          }
        },
      };
    },
  };
}

/**
 * Plain console lines for non-interactive sessions (CI, piped output),
 * with an ora spinner in place of the static one.
 */
export function createPlainOutput(): OutputPort {
  return {
    ...consoleOutput,

    spinner(): UnifiedSpinner {
      let s: Spinner | null = null;
      let current = '';

      return {
        start(message: string) {
          current = message;
          s = new Spinner(message);
          s.start();
        },
        stop(finalMessage?: string) {
          s?.succeed(finalMessage ?? current);
          s = null;
        },
        fail(finalMessage?: string) {
          s?.fail(finalMessage ?? current);
          s = null;
        },
        message(text: string) {
          current = text;
          s?.update(text);
        },
      };
    },
  };
}
