/** Stable diagnostic codes. Part of the wire contract; never rename. */
export const DiagnosticCode = {
  UnknownRoot: "unknown-root",
  UnknownAction: "unknown-action",
  UnknownSubcommand: "unknown-subcommand",
  UnknownOption: "unknown-option",
  MissingRequiredOption: "missing-required-option",
} as const;
export type DiagnosticCode = (typeof DiagnosticCode)[keyof typeof DiagnosticCode];

export const DIAGNOSTIC_NAMESPACE = "q2lsp";

/** `unknown-root` → `q2lsp/unknown-root`. */
export function namespacedCode(code: DiagnosticCode, namespace: string = DIAGNOSTIC_NAMESPACE): string {
  return `${namespace}/${code}`;
}

export type IssueSeverity = "error" | "warning";

export function issueSeverity(code: DiagnosticCode): IssueSeverity {
  return code === DiagnosticCode.MissingRequiredOption ? "error" : "warning";
}
