/**
 * Async mutex keyed by string. Holders of different keys never wait on each
 * other; holders of the same key run strictly one after another in arrival order.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // last holder cleans up
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
