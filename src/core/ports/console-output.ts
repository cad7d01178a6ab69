/**
 * Console Output Adapter (Default/CI)
 *
 * Line-oriented OutputPort: one line per message, warnings and errors on
 * stderr. Used when a caller supplies no output port.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  info: message => console.log(message),
  step: message => console.log(message),
  message: message => console.log(message),
  success: message => console.log(`✓ ${message}`),
  warn: message => console.warn(`⚠️  ${message}`),
  error: message => console.error(`❌ ${message}`),

  note(content: string, title?: string): void {
    console.log(title ? `\n${title}\n${content}` : `\n${content}`);
  },

  // No animation: the start line and the final line are all that is printed
  spinner(): UnifiedSpinner {
    let current = '';
    return {
      start(message: string) {
        current = message;
        console.log(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.log(`✓ ${finalMessage ?? current}`);
      },
      fail(finalMessage?: string) {
        console.log(`✗ ${finalMessage ?? current}`);
      },
      message(text: string) {
        current = text;
      }
    };
  }
};
