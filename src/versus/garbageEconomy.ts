import type { BlockCost, VersusConfig } from "../presets/schema";

export type ScoreTables = Pick<
  VersusConfig,
  "matchSizeScores" | "comboBonusScores" | "chainBonusScores"
>;

export type BlockShape = { width: number; height: number };

/** Table entry at `index`; indices past the end read the last entry. */
export function lookupClamped(table: readonly number[], index: number) {
  if (table.length === 0 || index < 0) return 0;
  return table[Math.min(Math.floor(index), table.length - 1)];
}

/**
 * Attack score of a finished combo: every match's size score, plus the
 * bonus for the number of cascade steps and the bonus for the deepest chain.
 */
export function calculateAttackScore(
  tables: ScoreTables,
  matchSizes: readonly number[],
  combo: number,
  maxChain: number
) {
  let score = 0;
  for (const size of matchSizes) score += lookupClamped(tables.matchSizeScores, size);
  score += lookupClamped(tables.comboBonusScores, combo);
  score += lookupClamped(tables.chainBonusScores, maxChain);
  return score;
}

/**
 * Greedy packing: buys as many of the most expensive affordable shape as
 * possible, then moves to the next cheaper one. Shapes with cost 0 are
 * disabled. Whatever is left at the end is discarded.
 */
export function convertScoreToBlocks(costs: readonly BlockCost[], score: number): BlockShape[] {
  const blocks: BlockShape[] = [];
  let remaining = Math.max(0, Math.floor(score));
  const byCost = costs.filter((c) => c.cost > 0).sort((a, b) => b.cost - a.cost);
  for (const c of byCost) {
    while (remaining >= c.cost) {
      blocks.push({ width: c.width, height: c.height });
      remaining -= c.cost;
    }
  }
  return blocks;
}

/** Total cost of a packing, for checking it against the score that bought it. */
export function packedCost(costs: readonly BlockCost[], blocks: readonly BlockShape[]) {
  let total = 0;
  for (const b of blocks) {
    const c = costs.find((k) => k.cost > 0 && k.width === b.width && k.height === b.height);
    if (c) total += c.cost;
  }
  return total;
}
