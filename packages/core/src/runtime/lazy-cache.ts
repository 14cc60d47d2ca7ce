import { debug } from "../shared/debug.js";

/**
 * Builds a value on first use and keeps it for the life of the process.
 *
 * Callers racing the first `get()` share one in-flight build and receive the
 * same value. A build that rejects is forgotten, so the next `get()` tries
 * again.
 */
export class LazyCache<T> {
  readonly #build: () => Promise<T>;
  #value: { readonly current: T } | undefined;
  #inflight: Promise<T> | undefined;

  constructor(build: () => T | Promise<T>) {
    this.#build = async () => build();
  }

  get(): Promise<T> {
    if (this.#value) {
      return Promise.resolve(this.#value.current);
    }
    this.#inflight ??= this.#load();
    return this.#inflight;
  }

  /** The built value, or undefined while nothing has been built. */
  peek(): T | undefined {
    return this.#value?.current;
  }

  async #load(): Promise<T> {
    const started = performance.now();
    try {
      const value = await this.#build();
      this.#value = { current: value };
      debug.hierarchy("cache.built", { ms: Math.round(performance.now() - started) });
      return value;
    } finally {
      this.#inflight = undefined;
    }
  }
}

/** Wraps `build` in a {@link LazyCache} and returns its `get`. */
export function createCachedProvider<T>(build: () => T | Promise<T>): () => Promise<T> {
  const cache = new LazyCache(build);
  return () => cache.get();
}
