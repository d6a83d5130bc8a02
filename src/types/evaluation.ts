/**
 * Match-resolution, severity and ranking result types.
 */

import type { Diagnosis, SeverityLabel } from "@/types/diagnosis";

// ─── Match outcome ───────────────────────────────────────

export type MatchMethod =
  | "SNOMED_MATCH"
  | "ICD10_EXACT"
  | "ICD10_CHILD"
  | "ICD10_PARENT"
  | "ICD10_SIBLING"
  | "OMIM_MATCH"
  | "ORPHA_MATCH"
  | "BERT_AUTOCONFIRM"
  | "BERT_MATCH"
  | "LLM_JUDGMENT";

export type MatchFamily = "snomed" | "icd10" | "other_codes" | "semantic";

/** Resolver families in evaluation order. */
export const MATCH_FAMILIES: readonly MatchFamily[] = ["snomed", "icd10", "other_codes", "semantic"];

export type AttemptStatus = "SUCCESS" | "FAILED" | "SKIPPED";

export interface FamilyMatch {
  method: MatchMethod;
  /** 1-based DDX position. */
  position: number;
  /** Code, code pair (`A -> B`, `A <-> B`) or similarity score. */
  value: string;
}

export interface SimilarityScore {
  position: number;
  score: number;
}

export interface SemanticDetails {
  scores: SimilarityScore[];
  best: SimilarityScore | null;
  /** Judge's 1-based answer; 0 = none; null = judge not consulted. */
  judgePosition: number | null;
}

export interface FamilyAttempt {
  family: MatchFamily;
  status: AttemptStatus;
  /** Human-readable justification, or the raw error text on oracle failure. */
  details: string;
  match?: FamilyMatch;
  semantic?: SemanticDetails;
  error?: string;
  /** Judge call failure (service error, not an unusable answer). */
  judgeError?: string;
}

export type MatchStatus = "SUCCESS" | "FAILED";

export interface MatchOutcome {
  status: MatchStatus;
  method?: MatchMethod;
  matchedPosition?: number;
  matchedValue?: string;
  /** One entry per family, always in `MATCH_FAMILIES` order. */
  attempts: FamilyAttempt[];
}

// ─── Case result ─────────────────────────────────────────

export interface GdxTrace {
  /** 1-based index in the case's GDX list. */
  gdxIndex: number;
  gdx: Diagnosis;
  outcome: MatchOutcome;
}

export interface FinalResolution {
  position: number;
  method: MatchMethod;
  value: string;
  gdxIndex: number;
  gdx: Diagnosis;
  ddx: Diagnosis;
}

export interface CaseResult {
  caseId: string;
  gdxList: Diagnosis[];
  ddxList: Diagnosis[];
  trace: GdxTrace[];
  /** null = REJECTED (no GDX matched). */
  resolution: FinalResolution | null;
  severity?: SeverityResult | null;
  /** Set when the case could not be evaluated at all. */
  error?: string;
  /** Set when the generated DDX response could not be decoded. */
  parseError?: string;
}

// ─── Severity ────────────────────────────────────────────

export interface SeverityBucket {
  n: number;
  score: number;
}

export interface DdxSeverityScore {
  name: string;
  severity: SeverityLabel;
  distance: number;
  score: number;
}

export interface SeverityResult {
  finalScore: number;
  optimist: SeverityBucket;
  pessimist: SeverityBucket;
  neutral: number;
  gdx: { name: string; severity: SeverityLabel };
  ddx: DdxSeverityScore[];
}

// ─── Ranking ─────────────────────────────────────────────

export interface RankingMetrics {
  totalCases: number;
  threshold: number;
  /** Keyed by K = 1..5. */
  topK: Record<number, number>;
  meanReciprocalRank: number;
  averagePrecisionAt5: number;
}
