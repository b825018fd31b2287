/**
 * Per-key mutual exclusion built on promise chains.
 * Tasks for the same key run one after another in call order; tasks for
 * different keys never wait on each other.
 */

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /** Number of keys with a running or queued task. */
  get activeKeys(): number {
    return this.tails.size;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    // the tail must never reject, or the next waiter would inherit the failure
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
