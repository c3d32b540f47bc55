/**
 * @linked-token/ledger: Per-key mutual exclusion.
 *
 * Serializes async critical sections that share a key while letting
 * different keys run concurrently. Each key holds the tail of a promise
 * chain; a new section waits for the tail, then becomes the tail.
 */

export class KeyedMutex {
  private readonly _tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier section for `key` has finished.
   * The result (or error) of `fn` is returned to the caller; an error
   * never blocks later sections.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this._tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Last holder clears the entry
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    }
  }

  /** Number of keys with a running or queued section. */
  get size(): number {
    return this._tails.size;
  }
}
