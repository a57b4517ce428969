/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementations: @clack/prompts for interactive
 * terminals, console plus the ora spinner when output is piped.
 */

import { log, spinner as clackSpinner, note as clackNote } from '@clack/prompts';
import { Spinner } from '../utils/spinner.js';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

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
 * Plain console OutputPort for non-interactive sessions (CI, piped output).
 */
export function createPlainOutput(): OutputPort {
  return {
    info(message: string): void {
      console.log(message);
    },

    step(message: string): void {
      console.log(message);
    },

    message(message: string): void {
      console.log(message);
    },

    success(message: string): void {
      console.log(`✓ ${message}`);
    },

    error(message: string): void {
      console.error(`❌ ${message}`);
    },

    warn(message: string): void {
      console.warn(`⚠️  ${message}`);
    },

    note(content: string, title?: string): void {
      if (title) {
        console.log(`\n${title}\n${content}`);
      } else {
        console.log(`\n${content}`);
      }
    },

    spinner(): UnifiedSpinner {
      let s: Spinner | null = null;

      return {
        start(message: string) {
          s = new Spinner(message);
          s.start();
        },
        stop(finalMessage?: string) {
          if (s) {
            if (finalMessage) {
              s.succeed(finalMessage);
            } else {
              s.stop();
            }
            s = null;
          }
        },
        message(text: string) {
          s?.update(text);
        },
      };
    },
  };
}
