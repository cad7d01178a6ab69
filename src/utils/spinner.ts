/**
 * Ora-backed spinner for plain (non-Clack) terminal output.
 */

import ora, { type Ora } from 'ora';

export class Spinner {
  private spinner: Ora;

  constructor(message: string = 'Loading...') {
    this.spinner = ora({ text: message, spinner: 'dots' });
  }

  start(): void {
    this.spinner.start();
  }

  update(message: string): void {
    this.spinner.text = message;
  }

  /**
   * Stop the spinner with a success checkmark and final message
   */
  succeed(message: string): void {
    this.spinner.succeed(message);
  }

  fail(message: string): void {
    this.spinner.fail(message);
  }
}
