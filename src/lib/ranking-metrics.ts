/**
 * Ranking metrics — Top-K accuracy, MRR and precision@5 over case results.
 *
 * Each case is reduced to a per-position score grid: 1.0 where a coded
 * family matched, the raw similarity where the semantic family scored, max
 * over every GDX. A position "hits" when its score reaches the threshold.
 * Pure function of its inputs.
 */

import type { CaseResult, RankingMetrics } from "@/types/evaluation";
import { mean, ratio, round } from "@/lib/format";

export const TOP_K_VALUES = [1, 2, 3, 4, 5] as const;

export const DEFAULT_MATCH_THRESHOLD = 0.8;

const PRECISION_DEPTH = 5;

/** Unified per-position match score for one case (index = position - 1). */
export function caseScoreGrid(result: CaseResult): number[] {
  const grid: number[] = result.ddxList.map(() => 0);
  const raise = (position: number, score: number) => {
    const i = position - 1;
    if (i >= 0 && i < grid.length && score > grid[i]) grid[i] = score;
  };
  for (const { outcome } of result.trace) {
    for (const attempt of outcome.attempts) {
      if (attempt.family === "semantic") {
        for (const s of attempt.semantic?.scores ?? []) raise(s.position, s.score);
      } else if (attempt.status === "SUCCESS" && attempt.match) {
        raise(attempt.match.position, 1);
      }
    }
  }
  return grid;
}

/** 1-based rank of the first position at or above `threshold`, or null. */
export function firstHitRank(grid: readonly number[], threshold: number): number | null {
  const i = grid.findIndex((s) => s >= threshold);
  return i === -1 ? null : i + 1;
}

export function precisionAt(grid: readonly number[], threshold: number, depth = PRECISION_DEPTH): number {
  return grid.slice(0, depth).filter((s) => s >= threshold).length / depth;
}

export function computeRankingMetrics(
  results: readonly CaseResult[],
  threshold: number = DEFAULT_MATCH_THRESHOLD,
): RankingMetrics {
  const hits: Record<number, number> = {};
  for (const k of TOP_K_VALUES) hits[k] = 0;
  const reciprocal: number[] = [];
  const precision: number[] = [];

  for (const r of results) {
    // errored cases count as misses
    const grid = r.error ? [] : caseScoreGrid(r);
    const rank = firstHitRank(grid, threshold);
    for (const k of TOP_K_VALUES) {
      if (rank !== null && rank <= k) hits[k]++;
    }
    reciprocal.push(rank === null ? 0 : 1 / rank);
    precision.push(precisionAt(grid, threshold));
  }

  const topK: Record<number, number> = {};
  for (const k of TOP_K_VALUES) topK[k] = ratio(hits[k], results.length);

  return {
    totalCases: results.length,
    threshold,
    topK,
    meanReciprocalRank: round(mean(reciprocal)),
    averagePrecisionAt5: round(mean(precision)),
  };
}
