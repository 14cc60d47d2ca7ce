import { describe, expect, test, vi } from "vitest";
import { commandPath, getHoverHelp, tokenizeShell } from "@q2lsp/core";
import { HIERARCHY } from "./fixtures.js";

const TEXT = "qiime feature-table summarize --i-table";

describe("getHoverHelp with a help provider", () => {
  const provider = vi.fn((path: readonly string[]) => `help: ${path.join(" ")}`);

  test.each([
    [2, []],
    [8, ["feature-table"]],
    [22, ["feature-table", "summarize"]],
  ])("offset %i asks for %j", (offset, path) => {
    provider.mockClear();

    expect(getHoverHelp(TEXT, offset, { helpProvider: provider })).toBe(`help: ${path.join(" ")}`);
    expect(provider).toHaveBeenCalledWith(path);
  });

  test("options have no hover", () => {
    provider.mockClear();

    expect(getHoverHelp(TEXT, 33, { helpProvider: provider })).toBeNull();
    expect(provider).not.toHaveBeenCalled();
  });

  test("whitespace between words has no hover", () => {
    expect(getHoverHelp("qiime  info", 6, { helpProvider: provider })).toBeNull();
  });

  test("text outside commands has no hover", () => {
    expect(getHoverHelp("echo hi", 1, { helpProvider: provider })).toBeNull();
  });

  test("is preferred over the hierarchy", () => {
    expect(getHoverHelp("qiime info", 8, { helpProvider: () => "from provider", hierarchy: HIERARCHY })).toBe(
      "from provider",
    );
  });

  test("passes a null result through", () => {
    expect(getHoverHelp("qiime info", 8, { helpProvider: () => null, hierarchy: HIERARCHY })).toBeNull();
  });

  test("honours a custom CLI name", () => {
    expect(getHoverHelp("q2 info", 4, { cliName: "q2", helpProvider: provider })).toBe("help: info");
  });
});

describe("getHoverHelp from hierarchy metadata", () => {
  const hover = (text: string, offset: number): string | null => getHoverHelp(text, offset, { hierarchy: HIERARCHY });

  test("the CLI name shows the root help", () => {
    expect(hover("qiime info", 2)).toBe("QIIME 2 command-line interface");
  });

  test("a builtin shows its short help", () => {
    expect(hover("qiime info", 8)).toBe("Display information about current deployment.");
  });

  test("a plugin shows its short description", () => {
    expect(hover(TEXT, 8)).toBe("Plugin for working with sample by feature tables.");
  });

  test("an action shows its description and epilog", () => {
    expect(hover(TEXT, 22)).toBe("Summarize table\n\nSee also: tabulate-seqs");
    expect(hover("qiime feature-table rarefy", 22)).toBe("Rarefy table");
  });

  test("unknown names have no hover", () => {
    expect(hover("qiime nope", 8)).toBeNull();
    expect(hover("qiime feature-table nope", 22)).toBeNull();
  });

  test("without any source there is no hover", () => {
    expect(getHoverHelp("qiime info", 8)).toBeNull();
  });
});

test("commandPath stops after the action", () => {
  const tokens = tokenizeShell("qiime feature-table summarize --i-table");

  expect(commandPath(tokens, 0)).toEqual([]);
  expect(commandPath(tokens, 2)).toEqual(["feature-table", "summarize"]);
  expect(commandPath(tokens, 3)).toBeNull();
  expect(commandPath(tokens, -1)).toBeNull();
  expect(commandPath(tokenizeShell("qiime"), 1)).toBeNull();
});
