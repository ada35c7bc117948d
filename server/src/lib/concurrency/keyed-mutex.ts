/**
 * Keyed Mutex
 * Serializes async work per key while letting different keys run concurrently.
 *
 * Each key holds the tail of a promise chain; a new task waits for the tail,
 * runs, and removes the key once nothing else is queued behind it.
 */

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key);

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = (previous ?? Promise.resolve()).then(() => current);
    this.tails.set(key, tail);

    try {
      if (previous) {
        await previous;
      }
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
