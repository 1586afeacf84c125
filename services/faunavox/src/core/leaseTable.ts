/**
 * Per-key async mutex. Admission and cancellation for an artifact run inside
 * `withLease` for its id, so they are strictly sequential per artifact while
 * distinct artifacts proceed in parallel.
 */
export class LeaseTable {
  private readonly tails = new Map<string, Promise<void>>();

  async withLease<T>(key: string, critical: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await critical();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

}
