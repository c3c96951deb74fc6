/**
 * Per-key async serialization.
 *
 * Work submitted under the same key runs one task at a time, in submission
 * order; different keys run independently. This only serializes within a
 * single process.
 */

export class KeyedLock {
  // Tail of the queue per key; settles when the last queued task settles
  private tails = new Map<string, Promise<void>>();

  /**
   * Runs `fn` once every earlier task for `key` has settled.
   * A rejected earlier task does not block later ones.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);

    // The caller observes failures through `result`; the tail only tracks settlement
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get pendingKeys(): number {
    return this.tails.size;
  }
}
