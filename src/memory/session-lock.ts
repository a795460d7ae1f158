/**
 * Per-Session Mutual Exclusion
 *
 * Work submitted for the same key runs strictly one after another, in
 * submission order. Different keys never wait on each other. A key's entry
 * is dropped as soon as its queue drains.
 */
export class SessionLock {
  private readonly tails = new Map<string, Promise<void>>();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);

    // The tail settles either way so one failed task never blocks the next
    const tail: Promise<void> = run.then(
      () => this.release(key, tail),
      () => this.release(key, tail),
    );
    this.tails.set(key, tail);
    return run;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
