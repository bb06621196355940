/**
 * Runs operations one at a time per key, in FIFO order.
 * Operations under different keys run concurrently.
 *
 * Operations must not enqueue onto their own key; that would wait on itself.
 */
export class KeyedQueue {
  /** Head of each queue is the operation currently running. */
  private readonly queues = new Map<string, Array<() => Promise<void>>>();

  run<T>(key: string, operation: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const item = async (): Promise<void> => {
        try {
          resolve(await operation());
        } catch (error) {
          reject(error);
        }
      };

      const queue = this.queues.get(key);
      if (queue) {
        queue.push(item);
        return;
      }
      this.queues.set(key, [item]);
      void this.drain(key);
    });
  }

  /** Number of operations queued or running under `key`. */
  pendingCount(key: string): number {
    return this.queues.get(key)?.length ?? 0;
  }

  private async drain(key: string): Promise<void> {
    const queue = this.queues.get(key);
    while (queue && queue.length > 0) {
      await queue[0]();
      queue.shift();
    }
    this.queues.delete(key);
  }
}
