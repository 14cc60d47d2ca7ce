/**
 * Line-continuation normalizer.
 *
 * Removes every backslash-newline pair (LF or CRLF) so a command split over several
 * physical lines reads as one logical line, and keeps a map from each
 * normalized position back to the original text.
 */

/**
 * `entries[i]` is the original offset of normalized position `i`. The map has
 * one entry per normalized character plus a trailing boundary equal to the
 * original length, and is non-decreasing.
 */
export class OffsetMap {
  readonly #entries: readonly number[];

  constructor(entries: readonly number[]) {
    if (entries.length === 0) {
      throw new RangeError("OffsetMap needs at least the trailing boundary entry");
    }
    this.#entries = entries;
  }

  /** Index of the trailing boundary, i.e. the normalized text length. */
  get length(): number {
    return this.#entries.length - 1;
  }

  get entries(): readonly number[] {
    return this.#entries;
  }

  /** @throws RangeError outside `[0, length]` */
  toOriginal(normalizedOffset: number): number {
    const original = Number.isInteger(normalizedOffset) ? this.#entries[normalizedOffset] : undefined;
    if (original === undefined) {
      throw new RangeError(`normalized offset ${normalizedOffset} outside [0, ${this.length}]`);
    }
    return original;
  }

  /**
   * Smallest normalized index whose original offset is at or after
   * `originalOffset`; offsets past the end land on the trailing boundary.
   */
  toNormalized(originalOffset: number): number {
    let lo = 0;
    let hi = this.#entries.length - 1;
    if ((this.#entries[hi] ?? 0) < originalOffset) return hi;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if ((this.#entries[mid] ?? 0) >= originalOffset) hi = mid;
      else lo = mid + 1;
    }
    return lo;
  }

  /**
   * Maps a normalized `[start, end)` span back. A non-empty span ends just
   * after its last character, so it never covers a removed continuation that
   * follows it.
   */
  spanToOriginal(start: number, end: number): { start: number; end: number } {
    const originalStart = this.toOriginal(start);
    if (end <= start) {
      return { start: originalStart, end: originalStart };
    }
    return { start: originalStart, end: this.toOriginal(end - 1) + 1 };
  }
}

export interface NormalizedText {
  readonly text: string;
  readonly offsetMap: OffsetMap;
}

export function normalizeContinuations(text: string): NormalizedText {
  const kept: string[] = [];
  const entries: number[] = [];
  let i = 0;

  while (i < text.length) {
    if (text.charCodeAt(i) === 92 /* \ */) {
      const next = text.charCodeAt(i + 1);
      if (next === 10 /* LF */) {
        i += 2;
        continue;
      }
      if (next === 13 /* CR */ && text.charCodeAt(i + 2) === 10 /* LF */) {
        i += 3;
        continue;
      }
    }
    kept.push(text.charAt(i));
    entries.push(i);
    i += 1;
  }
  entries.push(text.length);

  return { text: kept.join(""), offsetMap: new OffsetMap(entries) };
}
