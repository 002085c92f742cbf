/**
 * Runs tasks one at a time in submission order. A failed task does not
 * block the ones queued after it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  get size(): number {
    return this.pending;
  }
}
