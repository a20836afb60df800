/**
 * Serialises async critical sections: each `run` starts only after every
 * previously queued section has settled, whether it resolved or threw.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(section: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    // the next section waits on this one but must not inherit its failure
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
