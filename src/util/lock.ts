/**
 * Promise-chain mutex keyed by an arbitrary value. Work for the same key runs
 * strictly one after another; different keys never wait on each other.
 */
export class PerKeyLock<TKey> {
  private readonly chains = new Map<TKey, Promise<void>>();

  public async runExclusive<T>(key: TKey, fn: () => Promise<T>): Promise<T> {
    const prev = this.chains.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chain = prev.then(() => held);
    this.chains.set(key, chain);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      queueMicrotask(() => {
        if (this.chains.get(key) === chain) this.chains.delete(key);
      });
    }
  }
}
