/**
 * Promise-chain mutex. Tasks run one at a time in submission order; a task's
 * rejection is returned to its caller and does not block the tasks queued after it.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const run = this.tail.then(() => task());
    this.tail = run.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return run;
  }

  /** True while a task is running or queued */
  isLocked(): boolean {
    return this.pending > 0;
  }

  /** Resolves once every task submitted so far has settled */
  idle(): Promise<void> {
    return this.tail;
  }
}
