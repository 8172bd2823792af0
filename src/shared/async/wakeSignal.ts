/**
 * Resettable event with a timed wait. `set()` releases every pending waiter
 * and stays set until `clear()`, so a wake that lands between two waits is
 * not lost.
 */
export class WakeSignal {
  private pending = false;
  private readonly waiters = new Set<() => void>();

  public set(): void {
    this.pending = true;
    const waiters = Array.from(this.waiters);
    this.waiters.clear();
    waiters.forEach((release) => release());
  }

  public clear(): void {
    this.pending = false;
  }

  public isSet(): boolean {
    return this.pending;
  }

  /**
   * Resolves to true when woken, false when `timeoutMs` elapsed first.
   */
  public wait(timeoutMs: number): Promise<boolean> {
    if (this.pending) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const release = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(release);
        resolve(false);
      }, timeoutMs);
      this.waiters.add(release);
    });
  }
}
