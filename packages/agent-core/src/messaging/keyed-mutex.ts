/**
 * Per-key FIFO lock built on a promise chain.
 *
 * `runExclusive(key, fn)` waits for every earlier call with the same key to
 * settle, then runs `fn`. Different keys never wait on each other.
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
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Keys with a holder or waiters */
  activeKeys(): string[] {
    return [...this.tails.keys()];
  }
}
