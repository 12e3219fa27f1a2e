export type SingleFlightState = 'uninitialized' | 'building' | 'ready';

/**
 * Lazily computes a value once. Callers arriving while the value is being built share the same
 * promise. A failed build leaves the state uninitialized so the next call builds again.
 */
export class SingleFlight<T> {
  #value: { current: T } | undefined;
  #pending: Promise<T> | undefined;

  get state(): SingleFlightState {
    if (this.#value) {
      return 'ready';
    }
    return this.#pending ? 'building' : 'uninitialized';
  }

  get(factory: () => Promise<T>): Promise<T> {
    if (this.#value) {
      return Promise.resolve(this.#value.current);
    }
    if (!this.#pending) {
      const pending = factory()
        .then((value) => {
          // A reset while building discards the result of that build.
          if (this.#pending === pending) {
            this.#value = { current: value };
          }
          return value;
        })
        .finally(() => {
          if (this.#pending === pending) {
            this.#pending = undefined;
          }
        });
      this.#pending = pending;
    }
    return this.#pending;
  }

  peek(): T | undefined {
    return this.#value?.current;
  }

  reset(): void {
    this.#value = undefined;
    this.#pending = undefined;
  }
}
