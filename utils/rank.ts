export type RankedSymbol = { symbol: string; score: number };

type ScoreTable = ReadonlyMap<string, number> | Readonly<Record<string, number>>;

function isMap(scores: ScoreTable): scores is ReadonlyMap<string, number> {
  return scores instanceof Map;
}

/** Highest score first; equal scores keep their input order. */
export function rankScores(scores: ScoreTable, topN: number): RankedSymbol[] {
  const entries: Array<[string, number]> = isMap(scores)
    ? [...scores.entries()]
    : Object.entries(scores);
  return entries
    .map(([symbol, score]) => ({ symbol, score }))
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, topN));
}
