// StateLock: serialises async critical sections over the listener state

export class StateLock {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `fn` once every previously queued section has settled.
   * The returned promise settles with `fn`'s result; a failing section
   * does not block the ones queued after it.
   */
  run<T>(fn: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
