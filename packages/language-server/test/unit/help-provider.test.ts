import { describe, test, expect, vi } from "vitest";
import { createHelpProvider, sanitizeHelpText } from "@q2lsp/language-server/api";
import { mockLogger } from "../helpers/test-factories.js";

describe("sanitizeHelpText", () => {
  test("strips escapes and control characters and normalizes line ends", () => {
    const raw = "\u001b[1mUsage:\u001b[0m qiime\r\n  info\rdone\u0007\u007f\tx";

    expect(sanitizeHelpText(raw)).toBe("Usage: qiime\n  info\ndone\tx");
  });
});

describe("createHelpProvider", () => {
  test("runs the executable with --help and memoizes the result", async () => {
    const run = vi.fn(async () => "Usage: qiime info\r\n");
    const provider = createHelpProvider({ executable: "qiime", timeoutMs: 500, logger: mockLogger(), run });

    await expect(provider(["info"])).resolves.toBe("Usage: qiime info\n");
    await expect(provider(["info"])).resolves.toBe("Usage: qiime info\n");
    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith("qiime", ["info", "--help"], 500);
  });

  test("concurrent requests for one path share an invocation", async () => {
    const run = vi.fn(async () => "Usage: qiime info");
    const provider = createHelpProvider({ executable: "qiime", timeoutMs: 500, logger: mockLogger(), run });

    const [first, second] = await Promise.all([provider(["info"]), provider(["info"])]);

    expect(first).toBe("Usage: qiime info");
    expect(second).toBe("Usage: qiime info");
    expect(run).toHaveBeenCalledTimes(1);
  });

  test("asks the CLI itself for an empty path", async () => {
    const run = vi.fn(async () => "Usage: qiime");
    const provider = createHelpProvider({ executable: "qiime", timeoutMs: 500, logger: mockLogger(), run });

    await provider([]);

    expect(run).toHaveBeenCalledWith("qiime", ["--help"], 500);
  });

  test("paths that join to the same words are kept apart", async () => {
    const run = vi.fn(async (_exe: string, args: readonly string[]) => `help for ${args.length - 1} word(s)`);
    const provider = createHelpProvider({ executable: "qiime", timeoutMs: 500, logger: mockLogger(), run });

    await expect(provider(["feature-table summarize"])).resolves.toBe("help for 1 word(s)");
    await expect(provider(["feature-table", "summarize"])).resolves.toBe("help for 2 word(s)");
    expect(run).toHaveBeenCalledTimes(2);
  });

  test("drops the oldest path once the memo is full", async () => {
    const run = vi.fn(async () => "help");
    const provider = createHelpProvider({ executable: "qiime", timeoutMs: 500, logger: mockLogger(), run, memoLimit: 2 });

    await provider(["a"]);
    await provider(["b"]);
    await provider(["c"]);
    await provider(["b"]);
    expect(run).toHaveBeenCalledTimes(3);

    await provider(["a"]);
    expect(run).toHaveBeenCalledTimes(4);
  });

  test("blank output means no help", async () => {
    const provider = createHelpProvider({
      executable: "qiime",
      timeoutMs: 500,
      logger: mockLogger(),
      run: async () => " \n\u001b[0m\n",
    });

    await expect(provider(["info"])).resolves.toBeNull();
  });

  test("a failing invocation is logged once and remembered", async () => {
    const logger = mockLogger();
    const run = vi.fn(async (): Promise<string> => {
      throw new Error("spawn qiime ENOENT");
    });
    const provider = createHelpProvider({ executable: "qiime", timeoutMs: 500, logger, run });

    await expect(provider(["feature-table", "summarize"])).resolves.toBeNull();
    await expect(provider(["feature-table", "summarize"])).resolves.toBeNull();

    expect(run).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringContaining("[hover] 'qiime feature-table summarize --help' failed: "),
    );
  });
});
