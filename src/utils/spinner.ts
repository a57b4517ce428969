/**
 * Ora-backed spinner used by the plain (non-TTY-clack) output adapter while
 * the catalog is downloaded or a subprocess runs.
 */

import ora, { type Ora } from 'ora';

export class Spinner {
  private spinner: Ora;

  constructor(message: string = 'Loading...') {
    this.spinner = ora({ text: message, spinner: 'dots' });
  }

  start(message?: string): void {
    if (message) {
      this.spinner.text = message;
    }
    this.spinner.start();
  }

  update(message: string): void {
    this.spinner.text = message;
  }

  stop(): void {
    this.spinner.stop();
  }

  succeed(message: string): void {
    this.spinner.succeed(message);
  }
}
