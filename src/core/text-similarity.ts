/**
 * String similarity primitives shared by the text and semantic comparators.
 */

interface Block {
  aStart: number;
  bStart: number;
  size: number;
}

/**
 * Longest common substring of a[aLo..aHi) and b[bLo..bHi).
 * Ties resolve to the earliest start in `a`, then in `b`.
 */
function longestMatch(a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number): Block {
  let best: Block = { aStart: aLo, bStart: bLo, size: 0 };
  let prev = new Array<number>(bHi - bLo + 1).fill(0);

  for (let i = aLo; i < aHi; i++) {
    const row = new Array<number>(bHi - bLo + 1).fill(0);
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const k = j - bLo + 1;
      row[k] = prev[k - 1] + 1;
      if (row[k] > best.size) {
        best = { aStart: i - row[k] + 1, bStart: j - row[k] + 1, size: row[k] };
      }
    }
    prev = row;
  }

  return best;
}

/**
 * Total size of the matching blocks found by recursively splitting around
 * the longest common substring (Ratcliff/Obershelp).
 */
function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [aLo, aHi, bLo, bHi] = next;
    const block = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (block.size === 0) continue;

    total += block.size;
    if (aLo < block.aStart && bLo < block.bStart) {
      queue.push([aLo, block.aStart, bLo, block.bStart]);
    }
    const aEnd = block.aStart + block.size;
    const bEnd = block.bStart + block.size;
    if (aEnd < aHi && bEnd < bHi) {
      queue.push([aEnd, aHi, bEnd, bHi]);
    }
  }

  return total;
}

/**
 * Ratcliff/Obershelp similarity in [0, 1].
 *
 * Block selection depends on argument order when several substrings tie,
 * so both orders are evaluated and the larger ratio is returned.
 */
export function sequenceRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  const matches = Math.max(matchingCharacters(a, b), matchingCharacters(b, a));
  return (2 * matches) / total;
}

function lcsLength(a: string, b: string): number {
  if (!a.length || !b.length) return 0;
  let prev = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const row = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      row[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], row[j - 1]);
    }
    prev = row;
  }
  return prev[b.length];
}

/**
 * Case-insensitive indel ratio `2·LCS / (|a| + |b|)`, rounded to two decimals.
 * Two empty strings are identical; one empty string scores 0.
 */
export function labelRatio(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (!left.length && !right.length) return 1;
  if (!left.length || !right.length) return 0;
  const ratio = (2 * lcsLength(left, right)) / (left.length + right.length);
  return Math.round(ratio * 100) / 100;
}

export function jaccard<T>(a: Iterable<T>, b: Iterable<T>): number {
  const setA = new Set(a);
  const setB = new Set(b);
  const union = new Set([...setA, ...setB]);
  if (union.size === 0) return 0;
  let intersection = 0;
  for (const item of setA) {
    if (setB.has(item)) intersection++;
  }
  return intersection / union.size;
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}
