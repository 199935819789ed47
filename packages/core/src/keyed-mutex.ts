/**
 * Per-key mutual exclusion.
 *
 * Each key owns a promise chain; `run(key, fn)` appends `fn` to that chain so
 * read-modify-write sequences on one device never interleave, while work on
 * different keys proceeds independently. A rejected task does not poison the
 * chain for the tasks queued behind it.
 */

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /** Run `fn` once every earlier task for `key` has settled */
  run<T>(key: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(fn);

    const tail: Promise<void> = result
      .then(
        () => undefined,
        () => undefined,
      )
      .then(() => {
        // Drop the entry once the chain is empty so idle keys don't accumulate
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      });
    this.tails.set(key, tail);

    return result;
  }

  /** Number of keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }
}
