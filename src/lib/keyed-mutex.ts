const noop = (): void => undefined;

/**
 * Serializes async tasks that share a key; tasks with different keys run
 * concurrently. Used for per-path processing and per-directory moves.
 */
export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(noop, noop).then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    this.tails.set(key, tail);

    return result;
  }

  get size(): number {
    return this.tails.size;
  }
}
