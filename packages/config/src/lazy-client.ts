/**
 * Builds a backend client on first use and keeps it for the life of the
 * process. A factory that throws leaves the holder uninitialized so the next
 * call tries again.
 */
export class LazyClient<T> {
  private instance: T | undefined;
  private initialized = false;

  constructor(private readonly factory: () => T) {}

  get(): T {
    if (!this.initialized || this.instance === undefined) {
      this.instance = this.factory();
      this.initialized = true;
    }
    return this.instance;
  }
}
