/**
 * Cursor Lock
 *
 * FIFO mutual exclusion for the sandbox's current-directory cursor.
 * Tasks run one at a time, in the order they were submitted.
 */

export class CursorLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `task` once every previously submitted task has settled.
   * The task's own result or rejection is returned to the caller.
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task).finally(() => {
      this.pending--;
    });
    // The chain only tracks completion; rejections reach the caller through `result`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Number of tasks queued or running. */
  get size(): number {
    return this.pending;
  }
}
