import type { CommandHierarchy } from "../hierarchy/types.js";
import { normalizeContinuations } from "../parsing/continuations.js";
import { DEFAULT_CLI_NAME, splitCommands } from "../parsing/shell.js";
import type { DiagnosticIssue } from "./stages.js";
import { validateCommand } from "./validator.js";

export interface ValidateDocumentOptions {
  readonly cliName?: string;
}

/** Issues for every command in `text`, with offsets into `text` itself. */
export function validateDocument(
  text: string,
  hierarchy: CommandHierarchy,
  options: ValidateDocumentOptions = {},
): DiagnosticIssue[] {
  const { text: normalized, offsetMap } = normalizeContinuations(text);
  const commands = splitCommands(normalized, options.cliName ?? DEFAULT_CLI_NAME);

  return commands.flatMap((command) =>
    validateCommand(command, hierarchy).map((issue) => ({
      ...issue,
      ...offsetMap.spanToOriginal(issue.start, issue.end),
    })),
  );
}
