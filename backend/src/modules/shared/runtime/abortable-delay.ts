/**
 * ABORTABLE DELAY
 * ===============
 *
 * Timer waits for the scheduler and stream loops. An abort resolves the
 * wait early instead of rejecting; callers check `signal.aborted` after.
 */

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Resolves once the signal aborts. Create one per loop and race against it.
 */
export function whenAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Re-armable wake-up. wait() resolves on the next notify() or on abort.
 * A notify() with nobody waiting is remembered for the next wait().
 */
export class WakeSignal {
  private pending: (() => void) | null = null;
  private notified = false;

  notify(): void {
    const resolve = this.pending;
    this.pending = null;
    if (resolve) {
      resolve();
    } else {
      this.notified = true;
    }
  }

  wait(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted || this.notified) {
        this.notified = false;
        resolve();
        return;
      }
      const onAbort = () => {
        this.pending = null;
        resolve();
      };
      this.pending = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
