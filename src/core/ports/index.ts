/**
 * Core Ports
 *
 * Re-exports all port interfaces and default implementations.
 * These ports define the boundary between the engine and its front ends.
 */

export type { OutputPort, UnifiedSpinner } from './output.js';
export type { PromptPort } from './prompt.js';
export { consoleOutput } from './console-output.js';
export { nonInteractivePrompt, NonInteractivePromptError } from './console-prompt.js';
export { resolveOutput, resolvePrompt } from './resolve.js';
