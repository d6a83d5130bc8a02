/**
 * Evaluation Pipeline — dataset-level orchestration.
 *
 *   0. optional DDX generation (pool) and code labelling (batched)
 *   1. match resolution for every case (pool)
 *   2. severity labels for every unique DDX text (batched)
 *   3. severity distance per case, then the dataset summary
 *
 * An abort during any pooled stage keeps the cases completed so far; later
 * network stages are skipped and the partial run is still summarized.
 */

import type { Case, Diagnosis, SeverityLabel } from "@/types/diagnosis";
import { DEFAULT_SEVERITY } from "@/types/diagnosis";
import type { CaseResult } from "@/types/evaluation";
import type { DatasetSummary } from "@/types/summary";
import type { CaseEvaluator } from "@/lib/case-evaluator";
import type { DdxGenerator } from "@/lib/ddx-generator";
import type { CodeLabeler } from "@/lib/code-labeler";
import type { SeverityAssigner } from "@/lib/severity-assigner";
import type { Logger } from "@/lib/logger";
import { silentLogger } from "@/lib/logger";
import { diagnosisText } from "@/lib/diagnosis-accessors";
import { scoreSeverity, severityValue } from "@/lib/severity-scorer";
import { summarizeDataset } from "@/lib/dataset-summary";
import { DEFAULT_MATCH_THRESHOLD } from "@/lib/ranking-metrics";
import { runPool } from "@/lib/worker-pool";

export interface PipelineDeps {
  evaluator: CaseEvaluator;
  generator?: DdxGenerator;
  labeler?: CodeLabeler;
  severity?: SeverityAssigner;
  logger?: Logger;
}

export interface PipelineOptions {
  concurrency: number;
  matchThreshold?: number;
  signal?: AbortSignal;
}

export interface PipelineRun {
  results: CaseResult[];
  summary: DatasetSummary;
  totalCases: number;
  cancelled: boolean;
}

interface PreparedCase {
  case: Case;
  parseError?: string;
}

function compact<T>(values: (T | undefined)[]): T[] {
  return values.filter((v): v is T => v !== undefined);
}

// ─── Stage 0 ─────────────────────────────────────────────

async function generateDdx(
  cases: Case[],
  generator: DdxGenerator,
  options: PipelineOptions,
  logger: Logger,
): Promise<{ prepared: PreparedCase[]; cancelled: boolean }> {
  logger.info(`Generating DDX for ${cases.length} cases`);
  const outcome = await runPool(
    cases,
    async (c, _index, signal): Promise<PreparedCase> => {
      const generated = await generator.generate(c.caseId, c.caseDescription, signal);
      const prepared: PreparedCase = { case: { ...c, ddxList: generated.ddxList } };
      if (generated.parseError) prepared.parseError = generated.parseError;
      return prepared;
    },
    { concurrency: options.concurrency, signal: options.signal },
  );
  return { prepared: compact(outcome.results), cancelled: outcome.cancelled };
}

// ─── Stage 3 ─────────────────────────────────────────────

/** Winning GDX, else the most severe GDX (first on ties), else none. */
export function severityReference(result: CaseResult): Diagnosis | null {
  if (result.resolution) return result.resolution.gdx;
  let ref: Diagnosis | null = null;
  for (const gdx of result.gdxList) {
    if (ref === null || severityValue(gdx.severity) > severityValue(ref.severity)) ref = gdx;
  }
  return ref;
}

export function applySeverity(result: CaseResult, lookup: (text: string) => SeverityLabel): CaseResult {
  const gdx = severityReference(result);
  if (!gdx || result.ddxList.length === 0) return { ...result, severity: null };
  const ddx = result.ddxList.map((d) => ({ name: d.name, severity: d.severity ?? lookup(diagnosisText(d)) }));
  return { ...result, severity: scoreSeverity(ddx, { name: gdx.name, severity: gdx.severity ?? DEFAULT_SEVERITY }) };
}

// ─── Entry point ─────────────────────────────────────────

export async function runEvaluation(cases: Case[], deps: PipelineDeps, options: PipelineOptions): Promise<PipelineRun> {
  const logger = deps.logger ?? silentLogger;
  const threshold = options.matchThreshold ?? DEFAULT_MATCH_THRESHOLD;
  let cancelled = false;

  let prepared: PreparedCase[] = cases.map((c) => ({ case: c }));
  if (deps.generator) {
    const generated = await generateDdx(cases, deps.generator, options, logger);
    prepared = generated.prepared;
    cancelled = generated.cancelled;
  }

  if (deps.labeler && !cancelled && prepared.length > 0) {
    const labelled = await deps.labeler.label(prepared.map((p) => p.case));
    prepared = prepared.map((p, i) => ({ ...p, case: labelled[i] }));
  }

  // Phase 1
  let results: CaseResult[] = [];
  if (!cancelled) {
    logger.info(`Phase 1: resolving matches for ${prepared.length} cases`);
    const total = prepared.length;
    const outcome = await runPool(
      prepared,
      async (p, index, signal): Promise<CaseResult> => {
        const result = await deps.evaluator.evaluate(p.case, { index: index + 1, total }, signal);
        return p.parseError ? { ...result, parseError: p.parseError } : result;
      },
      { concurrency: options.concurrency, signal: options.signal },
    );
    results = compact(outcome.results);
    cancelled = outcome.cancelled;
    if (cancelled) logger.warn(`Interrupted: keeping ${results.length} of ${total} completed cases`);
  }

  // Phase 2 + 3
  if (deps.severity && !cancelled) {
    const assigner = deps.severity;
    const texts = results.flatMap((r) => r.ddxList.filter((d) => !d.severity).map(diagnosisText));
    logger.info(`Phase 2: assigning severities`);
    await assigner.assign(texts);
    logger.info(`Phase 3: scoring severity for ${results.length} cases`);
    results = results.map((r) => applySeverity(r, (text) => assigner.get(text)));
  }

  const summary = summarizeDataset(results, threshold);
  logger.info(
    `Done: ${summary.global.matched}/${summary.global.totalCases} matched, ` +
      `${summary.global.errored} errored, top-1 ${summary.ranking.topK[1]}`,
  );
  return { results, summary, totalCases: cases.length, cancelled };
}
