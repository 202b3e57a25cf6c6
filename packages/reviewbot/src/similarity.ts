/**
 * Longest-matching-block similarity (Ratcliff/Obershelp).
 *
 * `sequenceRatio(a, b)` returns 2·M / (|a| + |b|) where M is the number of
 * characters covered by matching blocks, found by repeatedly taking the
 * longest common substring and recursing on both sides of it.
 * Characters of `b` that occur in more than 1% of a 200+ character `b` are
 * "popular" and never seed a match, though they can still extend one.
 */

// ── Matching blocks ────────────────────────────────────────────

type Match = [aStart: number, bStart: number, size: number];

function indexPositions(b: string): Map<string, number[]> {
  const b2j = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b.charAt(j);
    const list = b2j.get(ch);
    if (list) list.push(j);
    else b2j.set(ch, [j]);
  }

  if (b.length >= 200) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [ch, list] of b2j) {
      if (list.length > limit) b2j.delete(ch);
    }
  }

  return b2j;
}

function findLongestMatch(
  a: string,
  b: string,
  b2j: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
): Match {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;
  let j2len = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a.charAt(i)) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    j2len = next;
  }

  // Popular characters never seed a match but may still extend one
  while (bestI > aLo && bestJ > bLo && a.charAt(bestI - 1) === b.charAt(bestJ - 1)) {
    bestI--;
    bestJ--;
    bestSize++;
  }
  while (
    bestI + bestSize < aHi &&
    bestJ + bestSize < bHi &&
    a.charAt(bestI + bestSize) === b.charAt(bestJ + bestSize)
  ) {
    bestSize++;
  }

  return [bestI, bestJ, bestSize];
}

/** Total number of characters covered by matching blocks. */
export function matchingCharacters(a: string, b: string): number {
  const b2j = indexPositions(b);
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const [i, j, k] = findLongestMatch(a, b, b2j, aLo, aHi, bLo, bHi);
    if (k === 0) continue;

    matched += k;
    if (aLo < i && bLo < j) queue.push([aLo, i, bLo, j]);
    if (i + k < aHi && j + k < bHi) queue.push([i + k, aHi, j + k, bHi]);
  }

  return matched;
}

// ── Ratios ─────────────────────────────────────────────────────

/** Similarity in [0, 1]; two empty strings are identical. */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}

/** Sequence ratio after sorting whitespace-separated tokens, so word order is ignored. */
export function tokenSortRatio(a: string, b: string): number {
  const sortTokens = (s: string) => s.split(/\s+/).filter(Boolean).sort().join(' ');
  return sequenceRatio(sortTokens(a), sortTokens(b));
}
