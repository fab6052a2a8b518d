/**
 * Process-wide shutdown flag with wakeable waits.
 *
 * `cancel()` flips the flag once; it is never cleared. Every pending `wait()`
 * resolves immediately when that happens, so suspension points never spin.
 */
export class CancellationSignal {
  private cancelled = false;
  private readonly waiters = new Set<() => void>();

  public get isCancelled(): boolean {
    return this.cancelled;
  }

  public cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiters) {
      wake();
    }
  }

  /**
   * Sleeps for `ms` or until cancellation. Resolves `true` when cancelled.
   */
  public wait(ms: number): Promise<boolean> {
    if (this.cancelled) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(wake);
        resolve(false);
      }, Math.max(0, ms));
      this.waiters.add(wake);
    });
  }

  /**
   * Registers a one-shot callback; runs it synchronously when already cancelled.
   * Returns a disposer.
   */
  public onCancel(callback: () => void): () => void {
    if (this.cancelled) {
      callback();
      return () => undefined;
    }
    this.waiters.add(callback);
    return () => {
      this.waiters.delete(callback);
    };
  }
}
