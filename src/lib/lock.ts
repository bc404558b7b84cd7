/**
 * In-process named locks. Tasks under the same key run one after another;
 * tasks under different keys do not wait for each other.
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.tails.get(key) === tail) {
          this.tails.delete(key);
        }
      });
    this.tails.set(key, tail);

    return result;
  }
}
