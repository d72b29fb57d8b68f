/**
 * Runs async tasks one at a time in submission order.
 * A failing task rejects its own caller only; the queue keeps going.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();

  /** Executes fn once every previously submitted task has settled. */
  execute<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
