import { LEGACY_SIGNATURE_GROUPS } from "./keys.js";
import { getString, isJsonArray, isJsonObject } from "./nodes.js";
import { formatOptionLabel, optionPrefix, paramIsRequired, type KindPrefix } from "./options.js";
import type { JsonObject, JsonValue } from "./types.js";

export interface SignatureParam {
  readonly name: string;
  readonly prefix: KindPrefix;
  /** Rendered option label, e.g. `--i-table`. */
  readonly label: string;
  readonly required: boolean;
  readonly spec: JsonObject;
}

/**
 * Parameters of an action in declaration order. Accepts the flat list form
 * and the legacy `{ inputs, outputs, parameters, metadata }` mapping; entries
 * that are not objects or have no name are skipped.
 */
export function signatureParams(action: JsonObject): SignatureParam[] {
  const signature = Object.hasOwn(action, "signature") ? action["signature"] : undefined;
  if (isJsonArray(signature)) {
    return collect(signature);
  }
  if (isJsonObject(signature)) {
    const params: SignatureParam[] = [];
    for (const group of LEGACY_SIGNATURE_GROUPS) {
      const entries = Object.hasOwn(signature, group) ? signature[group] : undefined;
      if (isJsonArray(entries)) params.push(...collect(entries));
    }
    return params;
  }
  return [];
}

function collect(entries: readonly JsonValue[]): SignatureParam[] {
  const params: SignatureParam[] = [];
  for (const entry of entries) {
    if (!isJsonObject(entry)) continue;
    const name = getString(entry, "name");
    if (!name) continue;
    const prefix = optionPrefix(entry);
    params.push({
      name,
      prefix,
      label: formatOptionLabel(prefix, name),
      required: paramIsRequired(entry),
      spec: entry,
    });
  }
  return params;
}

export function optionLabels(action: JsonObject): string[] {
  return signatureParams(action).map((param) => param.label);
}

export function requiredOptionLabels(action: JsonObject): string[] {
  return signatureParams(action)
    .filter((param) => param.required)
    .map((param) => param.label);
}
