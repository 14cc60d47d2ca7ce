import { debug } from "../shared/debug.js";

/** Raised inside a scheduled run when a newer schedule or a cancel supersedes it. */
export class DebounceCancelledError extends Error {
  override readonly name = "AbortError";

  constructor(readonly key: string) {
    super(`debounced run for '${key}' was cancelled`);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new DebounceCancelledError("unknown");
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new DebounceCancelledError("unknown"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Work run after the quiet period. Long runs should watch `signal`. */
export type DebouncedAction = (signal: AbortSignal) => void | Promise<void>;

export interface DebounceSchedulerOptions {
  /** Receives anything a run throws other than its own cancellation. */
  onError?: (key: string, error: unknown) => void;
}

interface ScheduledRun {
  readonly controller: AbortController;
  /** Settles once the run has finished or observed its cancellation. Never rejects. */
  readonly settled: Promise<void>;
}

/**
 * Per-key trailing debounce. Scheduling a key cancels the run already
 * installed for it (waiting until that run has stopped) before installing
 * the new one, so at most one run per key is ever in flight and runs for a
 * key start in schedule order. Keys are independent.
 */
export class DebounceScheduler {
  readonly #runs = new Map<string, ScheduledRun>();
  readonly #locks = new Map<string, Promise<void>>();
  readonly #onError: (key: string, error: unknown) => void;

  constructor(options: DebounceSchedulerOptions = {}) {
    this.#onError =
      options.onError ??
      ((key, error) => {
        debug.debounce("run.failed", { key, error: errorText(error) });
      });
  }

  /** Resolves once the new run is installed, not when it completes. */
  schedule(key: string, action: DebouncedAction, delayMs: number): Promise<void> {
    return this.#withLock(key, async () => {
      await this.#stop(key);
      const controller = new AbortController();
      const run: ScheduledRun = {
        controller,
        settled: this.#execute(key, action, delayMs, controller.signal).then(
          () => this.#release(key, run),
          (error: unknown) => {
            this.#release(key, run);
            if (isAbortError(error)) debug.debounce("cancelled", { key });
            else this.#report(key, error);
          },
        ),
      };
      this.#runs.set(key, run);
      debug.debounce("scheduled", { key, delayMs });
    });
  }

  /** Cancels the run for `key` and waits until it has stopped. No-op when none is installed. */
  cancel(key: string): Promise<void> {
    return this.#withLock(key, () => this.#stop(key));
  }

  async cancelAll(): Promise<void> {
    await Promise.all([...this.#runs.keys()].map((key) => this.cancel(key)));
  }

  /** Keys whose run has not finished yet. */
  pendingKeys(): string[] {
    return [...this.#runs.keys()];
  }

  /** Resolves when the run currently installed for `key` (if any) has finished. */
  async settled(key: string): Promise<void> {
    await this.#locks.get(key);
    await this.#runs.get(key)?.settled;
  }

  async #execute(key: string, action: DebouncedAction, delayMs: number, signal: AbortSignal): Promise<void> {
    await delay(delayMs, signal);
    signal.throwIfAborted();
    try {
      await action(signal);
    } catch (error) {
      if (signal.aborted && isAbortError(error)) throw error;
      this.#report(key, error);
      return;
    }
    debug.debounce("ran", { key });
  }

  /** `settled` must not reject, so a throwing `onError` falls back to the debug channel. */
  #report(key: string, error: unknown): void {
    try {
      this.#onError(key, error);
    } catch (handlerError) {
      debug.debounce("onError.failed", { key, error: errorText(error), handlerError: errorText(handlerError) });
    }
  }

  async #stop(key: string): Promise<void> {
    const run = this.#runs.get(key);
    if (!run) return;
    run.controller.abort(new DebounceCancelledError(key));
    await run.settled;
    this.#runs.delete(key);
  }

  #release(key: string, run: ScheduledRun): void {
    if (this.#runs.get(key) === run) this.#runs.delete(key);
  }

  async #withLock(key: string, critical: () => Promise<void>): Promise<void> {
    const previous = this.#locks.get(key) ?? Promise.resolve();
    const current = previous.then(critical);
    // The queue only orders sections; a failure reaches the caller through `current`.
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this.#locks.set(key, tail);
    try {
      await current;
    } finally {
      if (this.#locks.get(key) === tail) this.#locks.delete(key);
    }
  }
}
