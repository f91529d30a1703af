/**
 * Keyed Lock
 *
 * Serializes async work per key. Work under different keys runs
 * concurrently; work under one key runs in call order.
 */

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `key` has settled.
   */
  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work */
  get size(): number {
    return this.tails.size;
  }
}
