/**
 * Runs tasks one at a time per key, in submission order. Tasks under
 * different keys run concurrently. A failing task does not block the
 * ones queued behind it.
 */
export class KeyedSerialQueue {
  private tails: Map<string, Promise<void>> = new Map();
  private pendingCount = 0;

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    this.pendingCount++;

    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      this.pendingCount--;
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** Resolves once every task queued so far has settled. */
  async idle(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
    }
  }

  get pending(): number {
    return this.pendingCount;
  }

  get activeKeys(): number {
    return this.tails.size;
  }
}
