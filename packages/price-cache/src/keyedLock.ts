/**
 * Per-key mutual exclusion for async sections.
 *
 * Callers for the same key run one after another in arrival order; callers
 * for different keys never wait on each other. A rejected section releases
 * the key like a resolved one.
 *
 * @example
 * ```typescript
 * const lock = new KeyedLock()
 * await Promise.all([
 *   lock.run('AAPL', () => refresh('AAPL')),
 *   lock.run('AAPL', () => refresh('AAPL')), // starts after the first settles
 *   lock.run('MSFT', () => refresh('MSFT')), // runs concurrently
 * ])
 * ```
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>()

  async run<T>(key: string, section: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(section)
    const tail = result.then(
      () => undefined,
      () => undefined
    )
    this.tails.set(key, tail)

    try {
      return await result
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  /**
   * Number of keys with a running or queued section.
   */
  get activeKeys(): number {
    return this.tails.size
  }
}
