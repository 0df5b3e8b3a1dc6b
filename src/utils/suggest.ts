type MatchingBlock = { a: number; b: number; size: number };

function longestMatch(
  a: string,
  b: string,
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): MatchingBlock {
  let best: MatchingBlock = { a: alo, b: blo, size: 0 };
  let lengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (lengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) best = { a: i - k + 1, b: j - k + 1, size: k };
    }
    lengths = next;
  }
  return best;
}

/**
 * Ratcliff/Obershelp 相似度：2 * 匹配字符数 / 两串总长度，取值 [0, 1]。
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;

  const b2j = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const list = b2j.get(b[j]);
    if (list) list.push(j);
    else b2j.set(b[j], [j]);
  }

  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  for (;;) {
    const range = queue.pop();
    if (!range) break;
    const [alo, ahi, blo, bhi] = range;
    const m = longestMatch(a, b, b2j, alo, ahi, blo, bhi);
    if (m.size === 0) continue;
    matched += m.size;
    if (alo < m.a && blo < m.b) queue.push([alo, m.a, blo, m.b]);
    if (m.a + m.size < ahi && m.b + m.size < bhi) queue.push([m.a + m.size, ahi, m.b + m.size, bhi]);
  }

  return (2 * matched) / total;
}

export const SUGGESTION_LIMIT = 3;
export const SUGGESTION_CUTOFF = 0.5;

/**
 * 最多 3 个近似名称（忽略大小写，按相似度降序）；
 * 一个都没有时退回到子串包含匹配。
 */
export function suggestAgentNames(query: string, candidates: string[]): string[] {
  if (!candidates.length) return [];
  const q = String(query ?? "").toLowerCase();

  // 比例不对称：候选在前，查询在后
  const scored = candidates
    .map((name) => ({ name, key: name.toLowerCase() }))
    .map((c) => ({ ...c, score: similarityRatio(c.key, q) }))
    .filter((c) => c.score >= SUGGESTION_CUTOFF)
    .sort((x, y) => y.score - x.score || (x.key < y.key ? 1 : x.key > y.key ? -1 : 0))
    .slice(0, SUGGESTION_LIMIT)
    .map((c) => c.name);
  if (scored.length) return scored;

  return candidates.filter((name) => name.toLowerCase().includes(q)).slice(0, SUGGESTION_LIMIT);
}
