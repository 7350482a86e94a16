/**
 * Promise-chained mutual exclusion: each `runExclusive` call starts only after
 * every earlier call has settled.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const op = this.tail.then(fn);
    this.tail = op.then(
      () => undefined,
      () => undefined,
    );
    return op;
  }
}

export default Mutex;
