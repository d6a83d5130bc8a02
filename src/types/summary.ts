/**
 * Dataset-level summary shapes.
 */

import type { CodeSystem } from "@/types/diagnosis";
import type { MatchMethod, RankingMetrics } from "@/types/evaluation";

export interface MatchStats {
  totalCases: number;
  matched: number;
  unmatched: number;
  /** Cases that could not be evaluated; excluded from `unmatched`. */
  errored: number;
  /** `P1`, `P2`, ... → count. */
  positionDistribution: Record<string, number>;
  methodCounts: Partial<Record<MatchMethod, number>>;
  /** 3 dp; 0 when nothing matched. */
  averagePosition: number;
  /** Percentage, 2 dp. */
  successPercentage: number;
}

export interface SeverityProfile {
  evaluatedCases: number;
  meanFinalScore: number;
  /** Share of cases with at least one less-severe DDX. */
  optimistCaseRate: number;
  pessimistCaseRate: number;
  /** Share of cases with neither bucket populated. */
  neutralCaseRate: number;
  meanOptimistScore: number;
  meanPessimistScore: number;
}

export interface ChapterStats {
  name: string;
  count: number;
  /** Percentage of cases with an ICD-10 code, 2 dp. */
  percentage: number;
  meanBestScore: number;
}

export interface ChapterBreakdown {
  totalCasesWithIcd10: number;
  chapters: Record<string, ChapterStats>;
  mostCommonChapter: string | null;
  bestPerformingChapter: string | null;
  worstPerformingChapter: string | null;
}

export interface DatasetProfile {
  totalCases: number;
  /** First character of the case id → count. */
  casesBySource: Record<string, number>;
  meanGdxPerCase: number;
  maxGdxPerCase: number;
  singleGdxRate: number;
  gdxCodeCoverage: Record<CodeSystem, number>;
  totalDdx: number;
  meanDdxPerCase: number;
  ddxWithoutCodesRate: number;
  parseErrorRate: number;
}

export interface FailureBreakdown {
  /** Cases whose evaluation threw. */
  erroredCases: string[];
  /** Family attempts that failed on an oracle error, by family; judge call failures under `judge`. */
  oracleFailures: Record<string, number>;
  /** Cases resolved to no match with no oracle error anywhere in the trace. */
  cleanNoMatch: number;
  /** No-match cases where some oracle call failed. */
  noMatchWithOracleErrors: number;
}

export interface DatasetSummary {
  global: MatchStats;
  byMethod: Partial<Record<MatchMethod, MatchStats>>;
  ranking: RankingMetrics;
  severity: SeverityProfile;
  icd10Chapters: ChapterBreakdown;
  dataset: DatasetProfile;
  failures: FailureBreakdown;
}
