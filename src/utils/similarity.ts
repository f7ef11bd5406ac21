/**
 * Character-sequence similarity compatible with the classic "gestalt pattern matching"
 * ratio: `2 * M / (len(a) + len(b))`, where M is the number of characters in the matching
 * blocks found by recursively taking the longest common substring.
 */
export class SequenceMatcher {
  private readonly b2j = new Map<string, number[]>();
  private matches: number | null = null;

  constructor(
    private readonly a: string,
    private readonly b: string
  ) {
    for (let j = 0; j < b.length; j += 1) {
      const indices = this.b2j.get(b[j]);
      if (indices) {
        indices.push(j);
      } else {
        this.b2j.set(b[j], [j]);
      }
    }
  }

  private findLongestMatch(alo: number, ahi: number, blo: number, bhi: number): [number, number, number] {
    let bestI = alo;
    let bestJ = blo;
    let bestSize = 0;
    let j2len = new Map<number, number>();

    for (let i = alo; i < ahi; i += 1) {
      const next = new Map<number, number>();
      for (const j of this.b2j.get(this.a[i]) ?? []) {
        if (j < blo) continue;
        if (j >= bhi) break;
        const size = (j2len.get(j - 1) ?? 0) + 1;
        next.set(j, size);
        if (size > bestSize) {
          bestI = i - size + 1;
          bestJ = j - size + 1;
          bestSize = size;
        }
      }
      j2len = next;
    }
    return [bestI, bestJ, bestSize];
  }

  private matchingCharacters(): number {
    if (this.matches !== null) return this.matches;

    let total = 0;
    const queue: Array<[number, number, number, number]> = [[0, this.a.length, 0, this.b.length]];
    while (queue.length > 0) {
      const next = queue.pop();
      if (!next) break;
      const [alo, ahi, blo, bhi] = next;
      const [i, j, size] = this.findLongestMatch(alo, ahi, blo, bhi);
      if (size === 0) continue;
      total += size;
      if (alo < i && blo < j) queue.push([alo, i, blo, j]);
      if (i + size < ahi && j + size < bhi) queue.push([i + size, ahi, j + size, bhi]);
    }
    this.matches = total;
    return total;
  }

  ratio(): number {
    return score(this.matchingCharacters(), this.a.length + this.b.length);
  }

  /** Upper bound on `ratio()` from shared character counts, ignoring order. */
  quickRatio(): number {
    const available = new Map<string, number>();
    for (const char of this.b) available.set(char, (available.get(char) ?? 0) + 1);

    let shared = 0;
    for (const char of this.a) {
      const count = available.get(char) ?? 0;
      if (count > 0) {
        available.set(char, count - 1);
        shared += 1;
      }
    }
    return score(shared, this.a.length + this.b.length);
  }

  /** Upper bound on `ratio()` from lengths alone. */
  realQuickRatio(): number {
    return score(Math.min(this.a.length, this.b.length), this.a.length + this.b.length);
  }
}

function score(matches: number, length: number): number {
  return length > 0 ? (2 * matches) / length : 1;
}

/** Full ratio, or `null` when any of the cheaper upper bounds already falls below `cutoff`. */
export function similarityAbove(candidate: string, query: string, cutoff: number): number | null {
  const matcher = new SequenceMatcher(candidate, query);
  if (matcher.realQuickRatio() < cutoff || matcher.quickRatio() < cutoff) return null;
  const ratio = matcher.ratio();
  return ratio >= cutoff ? ratio : null;
}
