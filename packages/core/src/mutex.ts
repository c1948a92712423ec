/**
 * promise-chained mutual exclusion for async critical sections
 *
 * callers are admitted strictly in arrival order; a rejected section releases
 * the lock just like a resolved one
 * @example
 * ```typescript
 * const mutex = new Mutex();
 * const session = await mutex.runExclusive(async () => createOrReuse());
 * ```
 */
export class Mutex {
  #tail: Promise<void> = Promise.resolve();
  #pending = 0;

  /** true while a critical section is running or queued */
  public get locked(): boolean {
    return this.#pending > 0;
  }

  /**
   * runs a function once every earlier section has settled
   * @param fn critical section
   * @returns the section's result
   */
  public async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.#tail;
    let release: () => void = () => undefined;

    this.#tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.#pending++;

    try {
      await previous;

      return await fn();
    } finally {
      this.#pending--;
      release();
    }
  }
}
