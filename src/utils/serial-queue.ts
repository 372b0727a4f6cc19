/**
 * Runs async operations one at a time, in submission order.
 *
 * A rejected operation does not poison the queue: the next operation still
 * runs, and the rejection is delivered only to the caller that submitted it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(operation: () => Promise<T>): Promise<T> {
    const queued = this.tail.then(() => operation());
    const tracked = queued.then(() => undefined, () => undefined);

    this.pending += 1;
    this.tail = tracked;

    return queued.finally(() => {
      this.pending -= 1;
    });
  }

  get size(): number {
    return this.pending;
  }
}
