// Serializes async critical sections on shared orchestrator state

/**
 * Promise-chained mutex. Sections run one after another in call order;
 * a failing section releases the lock and rejects only its own caller.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    this.waiting++;
    const run = this.tail.then(section).finally(() => {
      this.waiting--;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Whether a section is running or queued
   */
  isLocked(): boolean {
    return this.waiting > 0;
  }
}
