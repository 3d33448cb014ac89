/**
 * Serializes tasks that share a key; tasks under different keys run in parallel.
 * Used to allow one in-flight conversation step per user.
 */
export class KeyedQueue {
  private queues = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The caller observes failures through `result`; the chain only needs to settle
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(key, tail);

    // Drop the chain once drained, unless another task was queued behind it
    void tail.then(() => {
      if (this.queues.get(key) === tail) {
        this.queues.delete(key);
      }
    });

    return result;
  }

  get size(): number {
    return this.queues.size;
  }
}
