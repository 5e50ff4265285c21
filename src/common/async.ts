/**
 * Runs async operations one at a time per key. Operations on different keys
 * run concurrently. A failed operation does not block the ones queued behind it.
 */
export class KeyedSerializer<K> {
  private readonly tails = new Map<K, Promise<void>>();

  run<T>(key: K, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(operation);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }
}

/**
 * Wait for `promise` for at most `ms`. Resolves `true` when it settled in time,
 * `false` when the bound elapsed first. Rejections propagate.
 */
export function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => resolve(false), ms);
    promise
      .then(() => { clearTimeout(timer); resolve(true); })
      .catch((err: unknown) => { clearTimeout(timer); reject(err); });
  });
}
