/**
 * Match Resolver — decides whether, and at which DDX position, a ground-truth
 * diagnosis is matched by a ranked differential.
 *
 * Families run in strict order and the first success short-circuits the rest
 * (later oracles are not called; their trace entry reads SKIPPED):
 *   1. SNOMED exact identity
 *   2. ICD-10 relationship: per GDX code → EXACT, CHILD, PARENT*, SIBLING*
 *   3. OMIM / ORPHA exact identity
 *   4. Semantic similarity, autoconfirm or judge tie-break
 *
 * Inside a family the leftmost (lowest) DDX position wins.
 *
 * Family 3 outranks the weak ICD-10 relationships: when family 2 succeeds only
 * via PARENT or SIBLING, family 3 is still checked and an OMIM/ORPHA hit
 * replaces it. EXACT and CHILD are never displaced.
 */

import type { Diagnosis } from "@/types/diagnosis";
import type {
  FamilyAttempt,
  FamilyMatch,
  MatchFamily,
  MatchMethod,
  MatchOutcome,
  SemanticDetails,
  SimilarityScore,
} from "@/types/evaluation";
import { MATCH_FAMILIES } from "@/types/evaluation";
import type { CodeOracle, Judge, SimilarityOracle } from "@/lib/oracles";
import { ConfigurationError, JudgeFailure, errorMessage } from "@/lib/errors";
import { diagnosisText } from "@/lib/diagnosis-accessors";
import { positionLabel, round } from "@/lib/format";

// ─── Options ─────────────────────────────────────────────

export interface ResolverOptions {
  /** Minimum similarity for a semantic match to count (default 0.80). */
  acceptanceThreshold: number;
  /** Similarity at which the judge is skipped (default 0.90). */
  autoconfirmThreshold: number;
  enableParentSearch: boolean;
  enableSiblingSearch: boolean;
  /** Number of leading DDX shown to the judge (default 5). */
  judgeCandidateLimit: number;
}

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  acceptanceThreshold: 0.8,
  autoconfirmThreshold: 0.9,
  enableParentSearch: true,
  enableSiblingSearch: true,
  judgeCandidateLimit: 5,
};

export function validateResolverOptions(options: ResolverOptions): void {
  const issues: string[] = [];
  const { acceptanceThreshold: acc, autoconfirmThreshold: auto } = options;
  if (!(acc >= 0 && acc <= 1)) issues.push(`acceptance_threshold ${acc} outside [0,1]`);
  if (!(auto >= 0 && auto <= 1)) issues.push(`autoconfirm_threshold ${auto} outside [0,1]`);
  if (acc > auto) issues.push(`acceptance_threshold ${acc} > autoconfirm_threshold ${auto}`);
  if (!Number.isInteger(options.judgeCandidateLimit) || options.judgeCandidateLimit < 1) {
    issues.push(`judge_candidate_limit must be a positive integer`);
  }
  if (issues.length) throw new ConfigurationError("Invalid resolver options", issues);
}

export interface ResolverDeps {
  codes: CodeOracle;
  similarity: SimilarityOracle;
  judge: Judge;
}

// ─── Trace helpers ───────────────────────────────────────

function skipped(family: MatchFamily, details: string): FamilyAttempt {
  return { family, status: "SKIPPED", details };
}

function success(family: MatchFamily, match: FamilyMatch, details: string): FamilyAttempt {
  return { family, status: "SUCCESS", details, match };
}

function failed(family: MatchFamily, details: string, err?: unknown): FamilyAttempt {
  return err === undefined
    ? { family, status: "FAILED", details }
    : { family, status: "FAILED", details, error: errorMessage(err) };
}

// ─── Family 1: SNOMED ────────────────────────────────────

export function matchSnomed(gdx: Diagnosis, ddxList: Diagnosis[]): FamilyAttempt {
  const gdxCodes = gdx.medicalCodes.snomed;
  if (gdxCodes.length === 0) return skipped("snomed", "GDX has no SNOMED codes");

  for (let i = 0; i < ddxList.length; i++) {
    const ddxCodes = ddxList[i].medicalCodes.snomed;
    for (const code of gdxCodes) {
      if (ddxCodes.includes(code)) {
        const position = i + 1;
        return success(
          "snomed",
          { method: "SNOMED_MATCH", position, value: code },
          `Found match with DDX at ${positionLabel(position)} (code: ${code})`,
        );
      }
    }
  }
  return failed("snomed", `No SNOMED code from GDX list [${gdxCodes.join(", ")}] found in any DDX`);
}

// ─── Family 2: ICD-10 relationship ───────────────────────

type Icd10Relation = "ICD10_EXACT" | "ICD10_CHILD" | "ICD10_PARENT" | "ICD10_SIBLING";

const RELATION_ARROW: Record<Icd10Relation, string> = {
  ICD10_EXACT: "==",
  ICD10_CHILD: "->",
  ICD10_PARENT: "->",
  ICD10_SIBLING: "<->",
};

/** Memoizes oracle lookups for one family run. */
function memoize<T>(fn: (code: string) => Promise<T>): (code: string) => Promise<T> {
  const cache = new Map<string, Promise<T>>();
  return (code) => {
    let hit = cache.get(code);
    if (!hit) {
      hit = fn(code);
      cache.set(code, hit);
    }
    return hit;
  };
}

export async function matchIcd10(
  gdx: Diagnosis,
  ddxList: Diagnosis[],
  codes: CodeOracle,
  options: Pick<ResolverOptions, "enableParentSearch" | "enableSiblingSearch">,
): Promise<FamilyAttempt> {
  const gdxCodes = gdx.medicalCodes.icd10;
  if (gdxCodes.length === 0) return skipped("icd10", "GDX has no ICD-10 codes");

  const parentsOf = memoize((code) => codes.parents(code));
  const siblingsOf = memoize((code) => codes.siblings(code));

  const relations: [Icd10Relation, (gdxCode: string, ddxCode: string) => Promise<boolean>][] = [
    ["ICD10_EXACT", async (g, d) => g === d],
    // DDX more specific: GDX code is one of its ancestors
    ["ICD10_CHILD", async (g, d) => (await parentsOf(d)).includes(g)],
  ];
  if (options.enableParentSearch) {
    relations.push(["ICD10_PARENT", async (g, d) => (await parentsOf(g)).includes(d)]);
  }
  if (options.enableSiblingSearch) {
    relations.push(["ICD10_SIBLING", async (g, d) => (await siblingsOf(g)).has(d)]);
  }

  try {
    for (const gdxCode of gdxCodes) {
      for (const [method, test] of relations) {
        for (let i = 0; i < ddxList.length; i++) {
          for (const ddxCode of ddxList[i].medicalCodes.icd10) {
            if (await test(gdxCode, ddxCode)) {
              const position = i + 1;
              const value = method === "ICD10_EXACT" ? gdxCode : `${gdxCode} ${RELATION_ARROW[method]} ${ddxCode}`;
              return success(
                "icd10",
                { method, position, value },
                `Found ${method} match with DDX at ${positionLabel(position)} (${value})`,
              );
            }
          }
        }
      }
    }
  } catch (err) {
    return failed("icd10", `ICD-10 taxonomy lookup failed: ${errorMessage(err)}`, err);
  }
  return failed("icd10", `No ICD-10 relationship match found for GDX codes [${gdxCodes.join(", ")}]`);
}

function isWeakIcd10(attempt: FamilyAttempt): boolean {
  const m = attempt.match?.method;
  return m === "ICD10_PARENT" || m === "ICD10_SIBLING";
}

// ─── Family 3: OMIM / ORPHA ──────────────────────────────

const OTHER_SYSTEMS: ["omim" | "orpha", MatchMethod][] = [
  ["omim", "OMIM_MATCH"],
  ["orpha", "ORPHA_MATCH"],
];

export function matchOtherCodes(gdx: Diagnosis, ddxList: Diagnosis[]): FamilyAttempt {
  const { omim, orpha } = gdx.medicalCodes;
  if (omim.length === 0 && orpha.length === 0) return skipped("other_codes", "GDX has no OMIM/ORPHA codes");

  for (let i = 0; i < ddxList.length; i++) {
    for (const [system, method] of OTHER_SYSTEMS) {
      const ddxCodes = new Set(ddxList[i].medicalCodes[system]);
      const shared = gdx.medicalCodes[system].find((c) => ddxCodes.has(c));
      if (shared !== undefined) {
        const position = i + 1;
        return success(
          "other_codes",
          { method, position, value: shared },
          `Found ${system.toUpperCase()} match with DDX at ${positionLabel(position)} (code: ${shared})`,
        );
      }
    }
  }
  return failed("other_codes", "No OMIM/ORPHA code shared with any DDX");
}

// ─── Family 4: semantic similarity ───────────────────────

function textPairings(gdx: Diagnosis, ddx: Diagnosis): [string, string][] {
  const out: [string, string][] = [];
  const seen = new Set<string>();
  for (const a of [gdx.name, gdx.normalizedText]) {
    for (const b of [ddx.name, ddx.normalizedText]) {
      const key = `${a}\u0000${b}`;
      if (seen.has(key)) continue;
      seen.add(key);
      out.push([a, b]);
    }
  }
  return out;
}

/** Per-position maximum over the name/normalized pairings; each unique pair queried once. */
export async function scorePositions(
  gdx: Diagnosis,
  ddxList: Diagnosis[],
  similarity: SimilarityOracle,
  signal?: AbortSignal,
): Promise<SimilarityScore[]> {
  const pairScores = new Map<string, number>();
  const scores: SimilarityScore[] = [];
  for (let i = 0; i < ddxList.length; i++) {
    let max = 0;
    for (const [a, b] of textPairings(gdx, ddxList[i])) {
      const key = `${a}\u0000${b}`;
      let s = pairScores.get(key);
      if (s === undefined) {
        s = await similarity.score(a, b, signal);
        pairScores.set(key, s);
      }
      if (s > max) max = s;
    }
    scores.push({ position: i + 1, score: max });
  }
  return scores;
}

function bestScore(scores: SimilarityScore[]): SimilarityScore | null {
  let best: SimilarityScore | null = null;
  for (const s of scores) {
    // strict: earlier position keeps ties; zero never counts as a best
    if (s.score > (best?.score ?? 0)) best = s;
  }
  return best;
}

function fmt(score: number): string {
  return score.toFixed(3);
}

export async function matchSemantic(
  gdx: Diagnosis,
  ddxList: Diagnosis[],
  similarity: SimilarityOracle,
  judge: Judge,
  options: Pick<ResolverOptions, "acceptanceThreshold" | "autoconfirmThreshold" | "judgeCandidateLimit">,
  signal?: AbortSignal,
): Promise<FamilyAttempt> {
  if (ddxList.length === 0) return failed("semantic", "No DDX candidates to compare");

  const { acceptanceThreshold: acc, autoconfirmThreshold: auto } = options;
  const semantic: SemanticDetails = { scores: [], best: null, judgePosition: null };
  const notes: string[] = [];
  let oracleError: unknown;
  let judgeError: string | undefined;

  try {
    semantic.scores = await scorePositions(gdx, ddxList, similarity, signal);
    semantic.best = bestScore(semantic.scores);
  } catch (err) {
    signal?.throwIfAborted();
    // judge does not depend on the similarity oracle; keep going
    oracleError = err;
    notes.push(`Similarity oracle error: ${errorMessage(err)}`);
  }

  const best = semantic.best;
  const attempt = (status: "SUCCESS" | "FAILED", details: string, match?: FamilyMatch): FamilyAttempt => {
    const full = [...notes, details].join(" ");
    const out: FamilyAttempt = { family: "semantic", status, details: full, semantic };
    if (match) out.match = match;
    if (oracleError !== undefined) out.error = errorMessage(oracleError);
    if (judgeError !== undefined) out.judgeError = judgeError;
    return out;
  };
  const scoreAt = (position: number) => semantic.scores.find((s) => s.position === position)?.score ?? 0;

  if (best && best.score >= auto) {
    return attempt(
      "SUCCESS",
      `BERT score ${fmt(best.score)} >= autoconfirm threshold ${auto}. Judge skipped.`,
      { method: "BERT_AUTOCONFIRM", position: best.position, value: String(round(best.score)) },
    );
  }

  signal?.throwIfAborted();
  const candidates = ddxList.slice(0, options.judgeCandidateLimit).map(diagnosisText);
  let judgePosition = 0;
  try {
    const answer = await judge.rank(diagnosisText(gdx), candidates, signal);
    if (Number.isInteger(answer) && answer >= 0 && answer <= candidates.length) {
      judgePosition = answer;
    } else {
      notes.push(`Judge answer ${answer} out of range; treated as none.`);
    }
  } catch (err) {
    signal?.throwIfAborted();
    // an answer that came back unusable is not an outage
    if (!(err instanceof JudgeFailure) || err.rawResponse === null) judgeError = errorMessage(err);
    notes.push(`Judge error: ${errorMessage(err)}; treated as none.`);
  }
  semantic.judgePosition = judgePosition;

  const accepted = best !== null && best.score >= acc;
  const bestLabel = best ? `${positionLabel(best.position)} (score: ${fmt(best.score)})` : "none";

  if (accepted && judgePosition > 0 && best.position <= judgePosition) {
    return attempt(
      "SUCCESS",
      `BERT result at ${bestLabel} is at or before judge choice ${positionLabel(judgePosition)} and >= acceptance threshold ${acc}.`,
      { method: "BERT_MATCH", position: best.position, value: String(round(best.score)) },
    );
  }
  if (judgePosition > 0) {
    const why = accepted
      ? `is before BERT's ${bestLabel}`
      : `rescued a BERT best of ${best ? fmt(best.score) : "none"} below acceptance threshold ${acc}`;
    return attempt(
      "SUCCESS",
      `Judge choice ${positionLabel(judgePosition)} ${why}.`,
      { method: "LLM_JUDGMENT", position: judgePosition, value: String(round(scoreAt(judgePosition))) },
    );
  }
  if (accepted) {
    return attempt(
      "SUCCESS",
      `BERT result at ${bestLabel} >= acceptance threshold ${acc}; judge found none.`,
      { method: "BERT_MATCH", position: best.position, value: String(round(best.score)) },
    );
  }
  return attempt("FAILED", `Both BERT (best: ${best ? fmt(best.score) : "none"}) and judge found no acceptable match.`);
}

// ─── Cascade ─────────────────────────────────────────────

function finish(attempts: Partial<Record<MatchFamily, FamilyAttempt>>, winner: FamilyAttempt | null): MatchOutcome {
  const reason = winner ? `${winner.match?.method} match found first` : "";
  const ordered = MATCH_FAMILIES.map((f) => attempts[f] ?? skipped(f, reason));
  if (!winner?.match) return { status: "FAILED", attempts: ordered };
  return {
    status: "SUCCESS",
    method: winner.match.method,
    matchedPosition: winner.match.position,
    matchedValue: winner.match.value,
    attempts: ordered,
  };
}

export async function resolveMatch(
  gdx: Diagnosis,
  ddxList: Diagnosis[],
  deps: ResolverDeps,
  options: ResolverOptions = DEFAULT_RESOLVER_OPTIONS,
  signal?: AbortSignal,
): Promise<MatchOutcome> {
  signal?.throwIfAborted();
  const attempts: Partial<Record<MatchFamily, FamilyAttempt>> = {};

  const snomed = matchSnomed(gdx, ddxList);
  attempts.snomed = snomed;
  if (snomed.status === "SUCCESS") return finish(attempts, snomed);

  const icd10 = await matchIcd10(gdx, ddxList, deps.codes, options);
  attempts.icd10 = icd10;
  if (icd10.status === "SUCCESS" && !isWeakIcd10(icd10)) return finish(attempts, icd10);

  const other = matchOtherCodes(gdx, ddxList);
  attempts.other_codes = other;
  if (other.status === "SUCCESS") {
    if (icd10.status === "SUCCESS") {
      attempts.icd10 = { ...icd10, details: `${icd10.details}; superseded by exact ${other.match?.method}` };
    }
    return finish(attempts, other);
  }
  if (icd10.status === "SUCCESS") return finish(attempts, icd10);

  signal?.throwIfAborted();
  const semantic = await matchSemantic(gdx, ddxList, deps.similarity, deps.judge, options, signal);
  attempts.semantic = semantic;
  return finish(attempts, semantic.status === "SUCCESS" ? semantic : null);
}

export interface MatchResolver {
  resolve(gdx: Diagnosis, ddxList: Diagnosis[], signal?: AbortSignal): Promise<MatchOutcome>;
  readonly options: ResolverOptions;
}

export function createMatchResolver(deps: ResolverDeps, options: ResolverOptions = DEFAULT_RESOLVER_OPTIONS): MatchResolver {
  validateResolverOptions(options);
  return {
    options,
    resolve: (gdx, ddxList, signal) => resolveMatch(gdx, ddxList, deps, options, signal),
  };
}
