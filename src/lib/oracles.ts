/**
 * Collaborator interfaces consumed by the match resolver.
 * Every call is treated as fallible I/O.
 */

import type { MedicalCodes } from "@/types/diagnosis";

/** ICD-10 hierarchy. */
export interface CodeOracle {
  /** Ancestors ordered immediate parent first, root last. Unknown code → []. */
  parents(code: string): Promise<string[]>;
  /** Direct children. */
  children(code: string): Promise<Set<string>>;
  /**
   * Codes sharing the immediate parent (excluding `code`).
   * Empty when that parent is a chapter or range grouping.
   */
  siblings(code: string): Promise<Set<string>>;
}

/** Semantic similarity in [0,1]. */
export interface SimilarityOracle {
  score(textA: string, textB: string, signal?: AbortSignal): Promise<number>;
}

/** LLM tie-breaker. Returns a 1-based index into `candidates`, or 0 for none. */
export interface Judge {
  rank(referenceText: string, candidates: string[], signal?: AbortSignal): Promise<number>;
}

export interface ExtractedCodes {
  normalizedText: string;
  medicalCodes: MedicalCodes;
}

/** Upstream code attribution; the resolver never calls it. */
export interface CodeExtractor {
  extract(text: string): Promise<ExtractedCodes>;
  /** Several texts in one service call; keyed by input text. */
  extractBatch(texts: string[]): Promise<Map<string, ExtractedCodes>>;
}
