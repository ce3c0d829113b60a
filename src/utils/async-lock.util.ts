/**
 * Serialises async critical sections: each `run` starts only after every
 * previously queued section has settled.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(section: () => Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
