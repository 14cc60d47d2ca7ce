import { describe, expect, test, vi } from "vitest";
import { DebounceCancelledError, DebounceScheduler, delay, isAbortError } from "@q2lsp/core";

describe("DebounceScheduler", () => {
  test("a newer schedule supersedes a pending one", async () => {
    const scheduler = new DebounceScheduler();
    const calls: string[] = [];

    void scheduler.schedule("doc", () => void calls.push("first"), 10);
    await scheduler.schedule("doc", () => void calls.push("second"), 10);
    await scheduler.settled("doc");

    expect(calls).toEqual(["second"]);
  });

  test("runs the action after the delay with a live signal", async () => {
    const scheduler = new DebounceScheduler();
    const action = vi.fn();

    await scheduler.schedule("doc", action, 5);
    expect(action).not.toHaveBeenCalled();
    expect(scheduler.pendingKeys()).toEqual(["doc"]);

    await scheduler.settled("doc");
    expect(action).toHaveBeenCalledTimes(1);
    expect(action.mock.calls[0]?.[0]).toBeInstanceOf(AbortSignal);
    expect(scheduler.pendingKeys()).toEqual([]);
  });

  test("cancel stops a pending run", async () => {
    const scheduler = new DebounceScheduler();
    const action = vi.fn();

    await scheduler.schedule("doc", action, 30);
    await scheduler.cancel("doc");
    await delay(60);

    expect(action).not.toHaveBeenCalled();
    expect(scheduler.pendingKeys()).toEqual([]);
  });

  test("cancel waits for a running action to observe the signal", async () => {
    const onError = vi.fn();
    const scheduler = new DebounceScheduler({ onError });
    const state = { started: false, finished: false };

    await scheduler.schedule(
      "doc",
      async (signal) => {
        state.started = true;
        await delay(50, signal);
        state.finished = true;
      },
      0,
    );
    await delay(15);
    expect(state.started).toBe(true);

    await scheduler.cancel("doc");
    expect(state.finished).toBe(false);
    expect(onError).not.toHaveBeenCalled();
  });

  test("errors go to onError and later runs still happen", async () => {
    const onError = vi.fn();
    const scheduler = new DebounceScheduler({ onError });
    const failure = new Error("boom");

    await scheduler.schedule(
      "doc",
      () => {
        throw failure;
      },
      0,
    );
    await scheduler.settled("doc");
    expect(onError).toHaveBeenCalledWith("doc", failure);

    const action = vi.fn();
    await scheduler.schedule("doc", action, 0);
    await scheduler.settled("doc");
    expect(action).toHaveBeenCalledTimes(1);
  });

  test("keys are independent", async () => {
    const scheduler = new DebounceScheduler();
    const a = vi.fn();
    const b = vi.fn();

    await scheduler.schedule("a", a, 10);
    await scheduler.schedule("b", b, 10);
    await scheduler.cancel("a");
    await scheduler.settled("b");

    expect(a).not.toHaveBeenCalled();
    expect(b).toHaveBeenCalledTimes(1);
  });

  test("cancelAll stops every key", async () => {
    const scheduler = new DebounceScheduler();
    const action = vi.fn();

    await scheduler.schedule("a", action, 20);
    await scheduler.schedule("b", action, 20);
    await scheduler.cancelAll();
    await delay(40);

    expect(action).not.toHaveBeenCalled();
    expect(scheduler.pendingKeys()).toEqual([]);
  });

  test("a throwing error handler does not break the key", async () => {
    const onError = vi.fn(() => {
      throw new Error("logger down");
    });
    const scheduler = new DebounceScheduler({ onError });

    await scheduler.schedule(
      "doc",
      () => {
        throw new Error("pass failed");
      },
      0,
    );
    await expect(scheduler.settled("doc")).resolves.toBeUndefined();
    expect(onError).toHaveBeenCalledTimes(1);

    const action = vi.fn();
    await scheduler.schedule("doc", action, 0);
    await scheduler.settled("doc");
    expect(action).toHaveBeenCalledTimes(1);
    await expect(scheduler.cancel("doc")).resolves.toBeUndefined();
  });

  test("cancel without a run is a no-op", async () => {
    await expect(new DebounceScheduler().cancel("missing")).resolves.toBeUndefined();
  });
});

describe("delay", () => {
  test("rejects with the abort reason", async () => {
    const controller = new AbortController();
    const pending = delay(1000, controller.signal);
    controller.abort(new DebounceCancelledError("doc"));

    await expect(pending).rejects.toBeInstanceOf(DebounceCancelledError);
  });

  test("rejects at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new DebounceCancelledError("doc"));

    await expect(delay(1000, controller.signal)).rejects.toThrow("debounced run for 'doc' was cancelled");
  });
});

test("isAbortError recognizes cancellations by name", () => {
  expect(isAbortError(new DebounceCancelledError("doc"))).toBe(true);
  expect(isAbortError(new Error("boom"))).toBe(false);
  expect(isAbortError("AbortError")).toBe(false);
});
