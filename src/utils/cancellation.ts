import { OperationInterruptedError } from './errors.js';

/**
 * Cooperative cancellation flag. The CLI trips it on SIGINT; long-running
 * operations check it before each subprocess call and prompt.
 */
export class CancellationToken {
  private cancelled = false;
  private reason = 'Operation interrupted';

  get isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(reason?: string): void {
    this.cancelled = true;
    if (reason) {
      this.reason = reason;
    }
  }

  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new OperationInterruptedError(this.reason);
    }
  }
}

/**
 * Trip the token on the first SIGINT. A second SIGINT falls through to the
 * default handler. Returns a disposer.
 */
export function cancelOnSigint(token: CancellationToken): () => void {
  const handler = (): void => {
    token.cancel('Interrupted by user');
  };
  process.once('SIGINT', handler);
  return () => {
    process.removeListener('SIGINT', handler);
  };
}
