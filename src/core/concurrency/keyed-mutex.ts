/**
 * Keyed Mutex
 *
 * Serialises async work per key. Tasks submitted under the same key run one
 * after another in submission order; tasks under different keys run freely.
 * A failing task releases its slot like a successful one.
 *
 * Used for the per-effective-ID mutation queue of the repository facade, the
 * single-writer discipline of the local store (one fixed key), and the
 * one-reconciliation-at-a-time rule.
 *
 * @example
 * ```typescript
 * const mutex = new KeyedMutex();
 *
 * // These never interleave
 * const a = mutex.run('7:42', () => remote.delete(ref));
 * const b = mutex.run('7:42', () => remote.updateMastery(ref, update));
 * ```
 */

type LockQueue = Map<string, Promise<void>>;

export class KeyedMutex {
  private readonly locks: LockQueue = new Map();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.locks.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chained = prev.then(() => current);

    this.locks.set(key, chained);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.locks.get(key) === chained) {
        this.locks.delete(key);
      }
    }
  }

  /** Whether a task is running or queued under the key */
  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  /** Number of keys with running or queued work */
  get size(): number {
    return this.locks.size;
  }
}
