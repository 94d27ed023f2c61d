/** Runs tasks one at a time in submission order. */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // the caller observes failures through `result`; the chain itself keeps going
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
