/**
 * Promise-chain lock: tasks run one at a time in call order. A rejected task releases the
 * lock for the next one and still rejects for its own caller.
 */
export class Mutex {
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;

  get locked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(handler: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const task = this.queue.then(handler).finally(() => {
      this.pending -= 1;
    });

    this.queue = task.then(
      () => undefined,
      () => undefined
    );
    return task;
  }
}
