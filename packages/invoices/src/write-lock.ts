/**
 * Single-writer queue.
 *
 * Tasks run one at a time in submission order, each starting after the
 * previous one settled. A failed task does not stop the queue.
 */
export class WriteLock {
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this._pending++;
    const result = this._tail.then(task).finally(() => {
      this._pending--;
    });
    // The caller observes the failure through `result`.
    this._tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Tasks queued or running. */
  get pending(): number {
    return this._pending;
  }

  /**
   * Resolves once every task submitted so far has settled.
   */
  idle(): Promise<void> {
    return this._tail;
  }
}
