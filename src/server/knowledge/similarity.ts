/**
 * Text similarity used by the knowledge-base search.
 */

const WORD = /[\p{L}\p{N}_]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD) ?? [];
}

// Long second strings ignore characters that make up more than 1% of them (plus one).
const POPULAR_MIN_LENGTH = 200;

type Block = { aStart: number; bStart: number; length: number };

/** Positions of every character of `b`, without the popular ones. */
function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const list = positions.get(b[j]);
    if (list) list.push(j);
    else positions.set(b[j], [j]);
  }

  if (b.length >= POPULAR_MIN_LENGTH) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [ch, list] of positions) {
      if (list.length > limit) positions.delete(ch);
    }
  }
  return positions;
}

function longestMatch(
  a: string,
  b: string,
  positions: Map<string, number[]>,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): Block {
  const best: Block = { aStart: aLo, bStart: bLo, length: 0 };
  // runs.get(j) = length of the match ending at a[i - 1], b[j]
  let runs = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const length = (runs.get(j - 1) ?? 0) + 1;
      next.set(j, length);
      if (length > best.length) {
        best.aStart = i - length + 1;
        best.bStart = j - length + 1;
        best.length = length;
      }
    }
    runs = next;
  }

  // popular characters never start a match, but they extend one
  while (best.aStart > aLo && best.bStart > bLo && a[best.aStart - 1] === b[best.bStart - 1]) {
    best.aStart--;
    best.bStart--;
    best.length++;
  }
  while (
    best.aStart + best.length < aHi &&
    best.bStart + best.length < bHi &&
    a[best.aStart + best.length] === b[best.bStart + best.length]
  ) {
    best.length++;
  }
  return best;
}

function matchingCharacters(a: string, b: string): number {
  const positions = indexPositions(b);
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  let total = 0;

  for (let range = pending.pop(); range; range = pending.pop()) {
    const [aLo, aHi, bLo, bHi] = range;
    const block = longestMatch(a, b, positions, aLo, aHi, bLo, bHi);
    if (block.length === 0) continue;

    total += block.length;
    if (aLo < block.aStart && bLo < block.bStart) pending.push([aLo, block.aStart, bLo, block.bStart]);
    const aEnd = block.aStart + block.length;
    const bEnd = block.bStart + block.length;
    if (aEnd < aHi && bEnd < bHi) pending.push([aEnd, aHi, bEnd, bHi]);
  }
  return total;
}

/**
 * Ratcliff/Obershelp ratio, 2*M / (|a| + |b|), case-insensitive.
 * Two empty strings are identical (1.0). When `text2` has 200 or more
 * characters, its popular characters cannot start a matching block.
 */
export function similarityRatio(text1: string, text2: string): number {
  const a = text1.toLowerCase();
  const b = text2.toLowerCase();
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}

/** Share of problem tokens that occur inside any keyword. */
export function keywordMatch(problemTokens: string[], keywords: string[]): number {
  if (keywords.length === 0 || problemTokens.length === 0) return 0;
  const hits = problemTokens.filter((token) => keywords.some((kw) => kw.includes(token))).length;
  return hits / problemTokens.length;
}

/** Best ratio between the problem and any symptom longer than 5 characters. */
export function symptomMatch(problem: string, symptoms: string[]): number {
  const scores = symptoms.filter((s) => s.length > 5).map((s) => similarityRatio(problem, s));
  return scores.length > 0 ? Math.max(...scores) : 0;
}

/** Share of distinct problem tokens present in the content. */
export function tokenCoverage(content: string, problemTokens: string[]): number {
  const distinct = Array.from(new Set(problemTokens));
  if (distinct.length === 0) return 0;
  const lower = content.toLowerCase();
  return distinct.filter((t) => lower.includes(t)).length / distinct.length;
}
