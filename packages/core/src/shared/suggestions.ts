/**
 * String similarity utilities for "Did you mean?" suggestions.
 *
 * Similarity is the Ratcliff/Obershelp ratio: twice the number of characters
 * in the matching blocks divided by the combined length. Matching blocks are
 * found by taking the longest common substring and recursing on the pieces to
 * its left and right.
 *
 * @example
 * similarityRatio("feature-table", "feature-tabel") // 0.923…
 * closeMatches("feature-tabel", ["feature-table", "diversity"]) // ["feature-table"]
 */

interface MatchBlock {
  a: number;
  b: number;
  size: number;
}

/**
 * Ratio in [0, 1]; 1 means identical. Two empty strings are identical.
 * Not symmetric in every case: `a` is scanned, `b` is indexed.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * countMatchingCharacters(a, b)) / total;
}

function countMatchingCharacters(a: string, b: string): number {
  const b2j = indexCharacters(b);
  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  for (let range = queue.pop(); range; range = queue.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const block = longestMatch(a, b2j, alo, ahi, blo, bhi);
    if (block.size === 0) continue;
    matched += block.size;
    if (alo < block.a && blo < block.b) {
      queue.push([alo, block.a, blo, block.b]);
    }
    if (block.a + block.size < ahi && block.b + block.size < bhi) {
      queue.push([block.a + block.size, ahi, block.b + block.size, bhi]);
    }
  }

  return matched;
}

function indexCharacters(text: string): Map<string, number[]> {
  const index = new Map<string, number[]>();
  for (let j = 0; j < text.length; j++) {
    const ch = text.charAt(j);
    const positions = index.get(ch);
    if (positions) positions.push(j);
    else index.set(ch, [j]);
  }
  return index;
}

/**
 * Longest block with a[i:i+size] === b[j:j+size] inside the given ranges.
 * Ties go to the earliest start in `a`, then the earliest start in `b`.
 */
function longestMatch(
  a: string,
  b2j: ReadonlyMap<string, readonly number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): MatchBlock {
  let best: MatchBlock = { a: alo, b: blo, size: 0 };
  let lengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a.charAt(i)) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const size = (lengths.get(j - 1) ?? 0) + 1;
      next.set(j, size);
      if (size > best.size) {
        best = { a: i - size + 1, b: j - size + 1, size };
      }
    }
    lengths = next;
  }

  return best;
}

export interface CloseMatchOptions {
  /** Maximum number of matches. Default: 3 */
  limit?: number;

  /** Minimum similarity ratio, in [0, 1]. Default: 0.6 */
  cutoff?: number;
}

/**
 * Candidates whose similarity to `word` reaches the cutoff, best first.
 * Equal scores order the lexicographically larger candidate first.
 * Comparison is case-sensitive.
 */
export function closeMatches(
  word: string,
  candidates: readonly string[],
  options: CloseMatchOptions = {},
): string[] {
  const { limit = 3, cutoff = 0.6 } = options;
  if (limit <= 0) return [];

  const scored: Array<{ value: string; score: number }> = [];
  for (const candidate of candidates) {
    const score = similarityRatio(candidate, word);
    if (score >= cutoff) {
      scored.push({ value: candidate, score });
    }
  }

  scored.sort((x, y) => {
    if (x.score !== y.score) return y.score - x.score;
    if (x.value === y.value) return 0;
    return x.value < y.value ? 1 : -1;
  });

  return scored.slice(0, limit).map((m) => m.value);
}
