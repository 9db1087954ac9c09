/**
 * Coalesces concurrent work per key: while a task for a key is pending, later
 * callers attach to the same promise instead of starting another one. The
 * entry is removed once the task settles, so a later call starts fresh.
 *
 * Map mutation happens synchronously between awaits, which is what makes the
 * check-then-set in `run` atomic on the event loop.
 */
export class InFlightRegistry<T> {
  private readonly pending = new Map<string, Promise<T>>();

  run(key: string, task: () => Promise<T>): Promise<T> {
    const existing = this.pending.get(key);
    if (existing) return existing;

    const handle = task().finally(() => {
      if (this.pending.get(key) === handle) {
        this.pending.delete(key);
      }
    });
    this.pending.set(key, handle);
    return handle;
  }

  has(key: string): boolean {
    return this.pending.has(key);
  }

  get size(): number {
    return this.pending.size;
  }
}
