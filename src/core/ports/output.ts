/**
 * Output Port Interface
 *
 * Defines the contract for all user-facing output operations.
 * Core logic uses this interface instead of console.log or @clack/prompts directly.
 *
 * Implementations:
 *   - createClackOutput (CLI, TTY): routes to @clack/prompts
 *   - createPlainOutput (CLI, piped/CI): console plus an ora spinner
 *   - consoleOutput (default): plain console.log
 */

/**
 * Unified spinner interface that works across all output backends.
 */
export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a step/progress indicator */
  step(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  success(message: string): void;

  error(message: string): void;

  warn(message: string): void;

  /** Display a note block with optional title */
  note(content: string, title?: string): void;

  /** Create a spinner for long-running operations */
  spinner(): UnifiedSpinner;
}
