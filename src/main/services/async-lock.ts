/**
 * AsyncLock — FIFO mutual exclusion for async critical sections.
 *
 * The poller and the command loop interleave at every `await`; every
 * history operation runs through one lock so they never see each other's
 * half-applied mutations.
 */

export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  /**
   * Run `fn` once every previously queued section has settled.
   * The lock is released whether `fn` resolves or throws. Not reentrant.
   */
  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      this.held = true;
      try {
        return await fn();
      } finally {
        this.held = false;
      }
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
