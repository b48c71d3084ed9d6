/** Serialises async work per key; different keys run concurrently. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let releaseTail: () => void = () => undefined;
    const tail = new Promise<void>((resolve) => {
      releaseTail = resolve;
    });
    const chained = previous.then(() => tail);
    this.tails.set(key, chained);

    await previous;
    try {
      return await task();
    } finally {
      releaseTail();
      if (this.tails.get(key) === chained) {
        this.tails.delete(key);
      }
    }
  }
}
