/**
 * Mutual exclusion for async critical sections.
 *
 * Callers queue in arrival order; each section starts only after the previous
 * one has settled, whether it resolved or rejected.
 * @example
 * ```typescript
 * const lock = new AsyncLock();
 * await lock.runExclusive(async () => {
 *   clients.set(id, client);
 *   await writeFile(path, JSON.stringify([...clients.values()]));
 * });
 * ```
 * @public
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  public runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(section).finally(() => {
      this.pending -= 1;
    });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Whether a section is running or queued */
  public isLocked(): boolean {
    return this.pending > 0;
  }
}
