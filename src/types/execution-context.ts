/**
 * Execution Context Types
 *
 * Carries the port interfaces that decouple the engine from any
 * particular terminal or editor front end.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';

/**
 * Rendering mode committed once per command.
 * - `rich`: Clack output and prompts
 * - `plain`: console output, readline prompts
 */
export type OutputMode = 'rich' | 'plain';

export interface ExecutionContext {
  /**
   * Output port for all user-facing messages (info, success, error, warn, etc.).
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;

  /**
   * Prompt port for interactive confirmation.
   * When not provided, defaults to nonInteractivePrompt (throws on prompt).
   */
  prompt?: PromptPort;

  outputMode?: OutputMode;
}
