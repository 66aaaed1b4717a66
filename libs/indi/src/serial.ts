/**
 * Runs tasks one at a time in submission order.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller observes the rejection through `result`; the chain only needs ordering.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
