// src/services/mutex.ts

/**
 * Promise-chain mutex. Callers queue in arrival order; a failing critical
 * section releases the lock for the next one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get locked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return run;
  }
}
