import { closeMatches } from "../shared/suggestions.js";

/** Most "Did you mean" candidates shown for one issue. */
export const SUGGESTION_LIMIT = 3;

/** Case-insensitive membership. */
export function isExactMatch(text: string, candidates: readonly string[]): boolean {
  const folded = text.toLowerCase();
  return candidates.some((candidate) => candidate.toLowerCase() === folded);
}

function prefixMatches(text: string, candidates: readonly string[]): string[] {
  const folded = text.toLowerCase();
  return candidates.filter((candidate) => {
    const lower = candidate.toLowerCase();
    return lower !== folded && lower.startsWith(folded);
  });
}

/**
 * Candidates for a mistyped `text`: case-insensitive prefix matches first,
 * in candidate order, then fuzzy matches best first. Deduplicated, never
 * the case-folded `text` itself.
 */
export function getSuggestions(
  text: string,
  candidates: readonly string[],
  limit: number = SUGGESTION_LIMIT,
): string[] {
  if (candidates.length === 0) {
    return [];
  }
  const folded = text.toLowerCase();
  const suggestions = new Set(prefixMatches(text, candidates));
  for (const match of closeMatches(text, candidates, { limit })) {
    if (match.toLowerCase() !== folded) suggestions.add(match);
  }
  return [...suggestions].slice(0, limit);
}

/** The only case-insensitive prefix match of `text`, if exactly one exists. */
export function uniquePrefixMatch(text: string, candidates: readonly string[]): string | undefined {
  const matches = prefixMatches(text, candidates);
  return matches.length === 1 ? matches[0] : undefined;
}

/** `" Did you mean 'a', 'b'?"`, or `""` without suggestions. */
export function formatDidYouMean(suggestions: readonly string[]): string {
  if (suggestions.length === 0) {
    return "";
  }
  return ` Did you mean ${suggestions.map((s) => `'${s}'`).join(", ")}?`;
}
