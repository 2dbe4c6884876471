/**
 * Runs async tasks one at a time in submission order
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Queue a task behind every task submitted before it.
   * The returned promise settles with the task's own result; a failing task
   * does not stop the tasks queued after it.
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return result;
  }

  /**
   * Number of tasks queued or running
   */
  get size(): number {
    return this.pending;
  }

  /**
   * Resolves once every task queued so far has settled
   */
  onIdle(): Promise<void> {
    return this.tail;
  }
}
