/**
 * Cooperative cancellation shared by the monitor's loops.
 */
export class StopSignal {
  private controller = new AbortController();

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  stop(): void {
    this.controller.abort();
  }

  // Re-arm for a new session
  reset(): void {
    if (!this.stopped) return;
    this.controller = new AbortController();
  }

  /**
   * Sleep for `ms`, waking early on stop. Resolves true when stopped.
   */
  sleep(ms: number): Promise<boolean> {
    const signal = this.controller.signal;
    if (signal.aborted) return Promise.resolve(true);

    return new Promise<boolean>(resolve => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve(false);
      }, ms);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
