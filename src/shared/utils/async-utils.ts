/**
 * Async Utilities
 */

/**
 * Serializes async critical sections in call order. A section that rejects
 * does not block the ones queued behind it.
 */
export class Mutex {
  private tail: Promise<unknown> = Promise.resolve();
  private holders = 0;

  run<T>(fn: () => Promise<T>): Promise<T> {
    this.holders++;
    const result = this.tail.then(fn).finally(() => {
      this.holders--;
    });
    // The caller observes the rejection through `result`
    this.tail = result.catch(() => undefined);
    return result;
  }

  get isLocked(): boolean {
    return this.holders > 0;
  }

  /** Sections queued behind the one currently running */
  get waiting(): number {
    return Math.max(this.holders - 1, 0);
  }
}
