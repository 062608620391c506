/**
 * Promise-chain mutex: callers run one at a time in arrival order.
 * A rejected critical section does not poison the chain.
 */
export class AsyncMutex {
  private chain: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const run = this.chain.then(fn, fn);
    this.chain = run.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return run;
  }

  /** True while a critical section is running or queued. */
  get isLocked(): boolean {
    return this.pending > 0;
  }
}
