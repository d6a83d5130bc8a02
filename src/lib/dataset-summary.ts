/**
 * Dataset Summary — aggregate statistics over a run's case results.
 *
 * All sections are pure functions of the result list, so a saved
 * evaluation_details.json can be re-summarized with a different threshold.
 */

import { CODE_SYSTEMS } from "@/types/diagnosis";
import type { CodeSystem } from "@/types/diagnosis";
import type { CaseResult, MatchMethod } from "@/types/evaluation";
import type {
  ChapterBreakdown,
  ChapterStats,
  DatasetProfile,
  DatasetSummary,
  FailureBreakdown,
  MatchStats,
  SeverityProfile,
} from "@/types/summary";
import { hasAnyCode } from "@/lib/diagnosis-accessors";
import { mean, positionLabel, ratio, round } from "@/lib/format";
import { DEFAULT_MATCH_THRESHOLD, caseScoreGrid, computeRankingMetrics } from "@/lib/ranking-metrics";
import chapterNames from "@/data/icd10-chapters.json";

const ICD10_CHAPTERS: Readonly<Record<string, string>> = chapterNames;

// ─── Match statistics ────────────────────────────────────

export function computeMatchStats(results: readonly CaseResult[]): MatchStats {
  const positionDistribution: Record<string, number> = {};
  const methodCounts: Partial<Record<MatchMethod, number>> = {};
  const positions: number[] = [];
  let errored = 0;

  for (const r of results) {
    if (r.error) {
      errored++;
      continue;
    }
    if (!r.resolution) continue;
    const { position, method } = r.resolution;
    positions.push(position);
    const label = positionLabel(position);
    positionDistribution[label] = (positionDistribution[label] ?? 0) + 1;
    methodCounts[method] = (methodCounts[method] ?? 0) + 1;
  }

  const matched = positions.length;
  return {
    totalCases: results.length,
    matched,
    unmatched: results.length - matched - errored,
    errored,
    positionDistribution: sortByPosition(positionDistribution),
    methodCounts,
    averagePosition: round(mean(positions), 3),
    successPercentage: results.length ? round((matched / results.length) * 100, 2) : 0,
  };
}

function sortByPosition(dist: Record<string, number>): Record<string, number> {
  const entries = Object.entries(dist).sort(([a], [b]) => Number(a.slice(1)) - Number(b.slice(1)));
  return Object.fromEntries(entries);
}

export function computeMethodStats(results: readonly CaseResult[]): Partial<Record<MatchMethod, MatchStats>> {
  const groups = new Map<MatchMethod, CaseResult[]>();
  for (const r of results) {
    if (r.error || !r.resolution) continue;
    const list = groups.get(r.resolution.method) ?? [];
    list.push(r);
    groups.set(r.resolution.method, list);
  }
  const out: Partial<Record<MatchMethod, MatchStats>> = {};
  for (const [method, list] of groups) out[method] = computeMatchStats(list);
  return out;
}

// ─── Severity ────────────────────────────────────────────

export function computeSeverityProfile(results: readonly CaseResult[]): SeverityProfile {
  const finals: number[] = [];
  const optimist: number[] = [];
  const pessimist: number[] = [];
  let neutral = 0;

  for (const r of results) {
    const sev = r.severity;
    if (!sev) continue;
    finals.push(sev.finalScore);
    if (sev.optimist.n > 0) optimist.push(sev.optimist.score);
    if (sev.pessimist.n > 0) pessimist.push(sev.pessimist.score);
    if (sev.optimist.n === 0 && sev.pessimist.n === 0) neutral++;
  }

  const n = finals.length;
  return {
    evaluatedCases: n,
    meanFinalScore: round(mean(finals)),
    optimistCaseRate: ratio(optimist.length, n),
    pessimistCaseRate: ratio(pessimist.length, n),
    neutralCaseRate: ratio(neutral, n),
    meanOptimistScore: round(mean(optimist)),
    meanPessimistScore: round(mean(pessimist)),
  };
}

// ─── ICD-10 chapters ─────────────────────────────────────

/** Winning GDX's first ICD-10 code, else the first GDX's. */
export function chapterOf(result: CaseResult): string | null {
  const candidates = [result.resolution?.gdx, result.gdxList[0]];
  for (const gdx of candidates) {
    const code = gdx?.medicalCodes.icd10[0];
    if (!code) continue;
    const letter = code[0].toUpperCase();
    if (letter in ICD10_CHAPTERS) return letter;
  }
  return null;
}

export function computeChapterBreakdown(results: readonly CaseResult[]): ChapterBreakdown {
  const scores = new Map<string, number[]>();
  for (const r of results) {
    const chapter = chapterOf(r);
    if (!chapter) continue;
    const best = r.error ? 0 : Math.max(0, ...caseScoreGrid(r));
    const list = scores.get(chapter) ?? [];
    list.push(best);
    scores.set(chapter, list);
  }

  let total = 0;
  for (const list of scores.values()) total += list.length;

  const chapters: Record<string, ChapterStats> = {};
  for (const chapter of [...scores.keys()].sort()) {
    const list = scores.get(chapter) ?? [];
    chapters[chapter] = {
      name: ICD10_CHAPTERS[chapter],
      count: list.length,
      percentage: total ? round((list.length / total) * 100, 2) : 0,
      meanBestScore: round(mean(list)),
    };
  }

  const pick = (better: (a: ChapterStats, b: ChapterStats) => boolean): string | null => {
    let key: string | null = null;
    for (const [k, stats] of Object.entries(chapters)) {
      if (key === null || better(stats, chapters[key])) key = k;
    }
    return key;
  };

  return {
    totalCasesWithIcd10: total,
    chapters,
    mostCommonChapter: pick((a, b) => a.count > b.count),
    bestPerformingChapter: pick((a, b) => a.meanBestScore > b.meanBestScore),
    worstPerformingChapter: pick((a, b) => a.meanBestScore < b.meanBestScore),
  };
}

// ─── Dataset profile ─────────────────────────────────────

export function computeDatasetProfile(results: readonly CaseResult[]): DatasetProfile {
  const casesBySource: Record<string, number> = {};
  const gdxCounts: number[] = [];
  const coverage: Record<CodeSystem, number> = { icd10: 0, snomed: 0, omim: 0, orpha: 0 };
  let totalGdx = 0;
  let totalDdx = 0;
  let ddxWithoutCodes = 0;
  let parseErrors = 0;

  for (const r of results) {
    const source = r.caseId.charAt(0).toUpperCase();
    if (source) casesBySource[source] = (casesBySource[source] ?? 0) + 1;
    gdxCounts.push(r.gdxList.length);
    totalGdx += r.gdxList.length;
    for (const gdx of r.gdxList) {
      for (const s of CODE_SYSTEMS) {
        if (gdx.medicalCodes[s].length > 0) coverage[s]++;
      }
    }
    totalDdx += r.ddxList.length;
    ddxWithoutCodes += r.ddxList.filter((d) => !hasAnyCode(d.medicalCodes)).length;
    if (r.parseError) parseErrors++;
  }

  for (const s of CODE_SYSTEMS) coverage[s] = ratio(coverage[s], totalGdx);

  return {
    totalCases: results.length,
    casesBySource,
    meanGdxPerCase: round(mean(gdxCounts)),
    maxGdxPerCase: gdxCounts.length ? Math.max(...gdxCounts) : 0,
    singleGdxRate: ratio(gdxCounts.filter((n) => n === 1).length, gdxCounts.length),
    gdxCodeCoverage: coverage,
    totalDdx,
    meanDdxPerCase: ratio(totalDdx, results.length),
    ddxWithoutCodesRate: ratio(ddxWithoutCodes, totalDdx),
    parseErrorRate: ratio(parseErrors, results.length),
  };
}

// ─── Failures ────────────────────────────────────────────

export function computeFailureBreakdown(results: readonly CaseResult[]): FailureBreakdown {
  const oracleFailures: Record<string, number> = {};
  const erroredCases: string[] = [];
  let cleanNoMatch = 0;
  let noMatchWithOracleErrors = 0;

  for (const r of results) {
    if (r.error) {
      erroredCases.push(r.caseId);
      continue;
    }
    let sawOracleError = false;
    for (const { outcome } of r.trace) {
      for (const a of outcome.attempts) {
        if (a.error !== undefined) {
          sawOracleError = true;
          oracleFailures[a.family] = (oracleFailures[a.family] ?? 0) + 1;
        }
        if (a.judgeError !== undefined) {
          sawOracleError = true;
          oracleFailures.judge = (oracleFailures.judge ?? 0) + 1;
        }
      }
    }
    if (!r.resolution) {
      if (sawOracleError) noMatchWithOracleErrors++;
      else cleanNoMatch++;
    }
  }

  return { erroredCases, oracleFailures, cleanNoMatch, noMatchWithOracleErrors };
}

// ─── Entry point ─────────────────────────────────────────

export function summarizeDataset(
  results: readonly CaseResult[],
  threshold: number = DEFAULT_MATCH_THRESHOLD,
): DatasetSummary {
  return {
    global: computeMatchStats(results),
    byMethod: computeMethodStats(results),
    ranking: computeRankingMetrics(results, threshold),
    severity: computeSeverityProfile(results),
    icd10Chapters: computeChapterBreakdown(results),
    dataset: computeDatasetProfile(results),
    failures: computeFailureBreakdown(results),
  };
}
