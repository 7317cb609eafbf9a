import type { RankingEntry } from './types.js';

/**
 * Give every roster name a unique id. The first occurrence keeps its name;
 * later repeats become `Name_1`, `Name_2`, … skipping ids already taken.
 */
export function assignIds(names: readonly string[]): string[] {
  const taken = new Set<string>(names);
  const seen = new Set<string>();
  const counters = new Map<string, number>();

  return names.map((name) => {
    if (!seen.has(name)) {
      seen.add(name);
      return name;
    }

    let n = counters.get(name) ?? 0;
    let id: string;
    do {
      n++;
      id = `${name}_${n}`;
    } while (taken.has(id));

    counters.set(name, n);
    taken.add(id);
    return id;
  });
}

/** Descending by score. Ties keep the order of `ids`. */
export function rankScores(ids: readonly string[], scores: ReadonlyMap<string, number>): RankingEntry[] {
  return ids
    .map((name) => ({ name, score: scores.get(name) ?? 0 }))
    .sort((x, y) => y.score - x.score)
    .map((entry, i) => ({ rank: i + 1, ...entry }));
}
