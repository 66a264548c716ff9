/**
 * A single-resolution completion handle: settled exactly once, readable
 * any number of times afterwards through {@link Deferred.promise}.
 */
export class Deferred<T> {
  readonly promise: Promise<T>;
  private resolveFn: (value: T) => void = noop;
  private rejectFn: (reason: unknown) => void = noop;
  private done = false;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolveFn = resolve;
      this.rejectFn = reject;
    });
  }

  /** Whether the handle has been resolved or rejected. */
  get settled(): boolean {
    return this.done;
  }

  /**
   * Resolve the handle.
   * @returns false if it was already settled; the first outcome stands.
   */
  resolve(value: T): boolean {
    if (this.done) return false;
    this.done = true;
    this.resolveFn(value);
    return true;
  }

  /**
   * Reject the handle.
   * @returns false if it was already settled; the first outcome stands.
   */
  reject(reason: unknown): boolean {
    if (this.done) return false;
    this.done = true;
    this.rejectFn(reason);
    return true;
  }
}

function noop(): void {}
