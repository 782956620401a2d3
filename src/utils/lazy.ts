/**
 * LazyHandle - initialize a shared resource once, on first use
 *
 * Concurrent first callers share the same in-flight promise. A failed
 * initialization stays memoized until reset(), so a broken backend is
 * reported the same way on every request instead of being retried.
 *
 * @module utils/lazy
 */

export class LazyHandle<T> {
  private pending: Promise<T> | null = null;
  private value: T | undefined;
  private initialized = false;

  constructor(
    private readonly name: string,
    private readonly init: () => Promise<T> | T,
    private readonly dispose?: (value: T) => Promise<void> | void
  ) {}

  get(): Promise<T> {
    if (!this.pending) {
      this.pending = Promise.resolve()
        .then(() => this.init())
        .then((value) => {
          this.value = value;
          this.initialized = true;
          console.error(`[LazyHandle] ${this.name} initialized`);
          return value;
        });
    }
    return this.pending;
  }

  /** True once init has resolved */
  isInitialized(): boolean {
    return this.initialized;
  }

  /** Forget a memoized value or failure without disposing it */
  reset(): void {
    this.pending = null;
    this.value = undefined;
    this.initialized = false;
  }

  /**
   * Dispose the value if init succeeded, then reset.
   * A handle that never initialized is a no-op.
   */
  async close(): Promise<void> {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    // Let an in-flight init settle so its resource is not leaked
    await pending.then(
      () => undefined,
      () => undefined
    );
    if (this.initialized && this.dispose && this.value !== undefined) {
      const value = this.value;
      this.reset();
      await this.dispose(value);
      return;
    }
    this.reset();
  }
}
