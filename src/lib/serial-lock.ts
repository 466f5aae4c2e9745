/**
 * Runs async tasks one at a time, in the order they were queued.
 *
 * Unlike a boolean "is locked" flag, callers wait their turn instead of being
 * rejected, so an exit notification arriving during a stop is handled right
 * after the stop finishes rather than dropped.
 *
 * ```typescript
 * const lock = new SerialLock();
 * await lock.runExclusive(async () => mutateTable());
 * ```
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Queues `task` and resolves (or rejects) with its outcome. A failing task
   * does not block the ones queued after it.
   */
  public runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);

    this.tail = result.then(
      () => undefined,
      () => undefined,
    );

    return result;
  }
}
