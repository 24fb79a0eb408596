/**
 * Per-key async critical section.
 * Tasks sharing a key run one at a time in call order; different keys never wait on each other.
 * A key's entry is dropped once its last queued task settles.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    // The chain must keep going after a failed task; the failure belongs to its own caller.
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    try {
      return await result;
    } finally {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** Keys with a running or queued task. */
  get size(): number {
    return this.tails.size;
  }
}
