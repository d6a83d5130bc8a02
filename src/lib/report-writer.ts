/**
 * Run outputs — evaluation_details.json, summary.json and the config echo,
 * written under `<output_dir>/<timestamp>/`.
 *
 * Case records are snake_case; GDX/DDX details are maps keyed by diagnosis
 * name in list order. `readEvaluationDetails` restores CaseResults from a
 * saved file so a run can be re-summarized.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import type { Diagnosis } from "@/types/diagnosis";
import type {
  CaseResult,
  FamilyAttempt,
  FinalResolution,
  GdxTrace,
  SeverityResult,
} from "@/types/evaluation";
import type { DatasetSummary } from "@/types/summary";
import { ConfigurationError, errorMessage } from "@/lib/errors";
import { makeDiagnosis } from "@/lib/diagnosis-accessors";
import { isSeverityLabel } from "@/lib/severity-scorer";
import { round } from "@/lib/format";

// ─── Serialization ───────────────────────────────────────

function detailsMap(list: Diagnosis[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const d of list) {
    out[d.name] = { normalized_text: d.normalizedText, medical_codes: d.medicalCodes, severity: d.severity };
  }
  return out;
}

function attemptRecord(a: FamilyAttempt): Record<string, unknown> {
  const out: Record<string, unknown> = { family: a.family, status: a.status, details: a.details };
  if (a.match) out.match = { method: a.match.method, position: a.match.position, value: a.match.value };
  if (a.semantic) {
    out.semantic = {
      scores: a.semantic.scores.map((s) => ({ position: s.position, score: round(s.score) })),
      best: a.semantic.best ? { position: a.semantic.best.position, score: round(a.semantic.best.score) } : null,
      judge_position: a.semantic.judgePosition,
    };
  }
  if (a.error !== undefined) out.error = a.error;
  if (a.judgeError !== undefined) out.judge_error = a.judgeError;
  return out;
}

function traceRecord(t: GdxTrace): Record<string, unknown> {
  return {
    gdx_index: t.gdxIndex,
    gdx_name: t.gdx.name,
    status: t.outcome.status,
    method: t.outcome.method ?? null,
    matched_position: t.outcome.matchedPosition ?? null,
    matched_value: t.outcome.matchedValue ?? null,
    attempts: t.outcome.attempts.map(attemptRecord),
  };
}

function resolutionRecord(r: FinalResolution | null): Record<string, unknown> | null {
  if (!r) return null;
  return {
    position: r.position,
    method: r.method,
    value: r.value,
    gdx_index: r.gdxIndex,
    gdx_name: r.gdx.name,
    ddx_name: r.ddx.name,
  };
}

function severityRecord(s: SeverityResult | null | undefined): Record<string, unknown> | null {
  if (!s) return null;
  return {
    final_score: s.finalScore,
    optimist: s.optimist,
    pessimist: s.pessimist,
    neutral: s.neutral,
    gdx: s.gdx,
    ddx_list: s.ddx,
  };
}

export function caseRecord(r: CaseResult): Record<string, unknown> {
  return {
    case_id: r.caseId,
    gdx_details: detailsMap(r.gdxList),
    ddx_details: detailsMap(r.ddxList),
    eval_details: {
      best_match_found: r.resolution !== null,
      final_resolution: resolutionRecord(r.resolution),
      evaluation_trace: r.trace.map(traceRecord),
      severity_evaluation: severityRecord(r.severity),
      error: r.error ?? null,
      parse_error: r.parseError ?? null,
    },
  };
}

const SNAKE_CANDIDATE = /^[a-z][a-zA-Z0-9]*$/;

/** camelCase keys → snake_case; keys not starting lowercase (P1, BERT_MATCH, A) stay. */
export function toSnakeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(toSnakeKeys);
  if (typeof value !== "object" || value === null) return value;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    const key = SNAKE_CANDIDATE.test(k) ? k.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase() : k;
    out[key] = toSnakeKeys(v);
  }
  return out;
}

// ─── Reading a saved run ─────────────────────────────────

const codesSchema = z.object({
  icd10: z.array(z.string()).default([]),
  snomed: z.array(z.string()).default([]),
  omim: z.array(z.string()).default([]),
  orpha: z.array(z.string()).default([]),
});

const detailSchema = z.object({
  normalized_text: z.string().nullish(),
  medical_codes: codesSchema.default({}),
  severity: z.string().nullish(),
});

const methodSchema = z.enum([
  "SNOMED_MATCH",
  "ICD10_EXACT",
  "ICD10_CHILD",
  "ICD10_PARENT",
  "ICD10_SIBLING",
  "OMIM_MATCH",
  "ORPHA_MATCH",
  "BERT_AUTOCONFIRM",
  "BERT_MATCH",
  "LLM_JUDGMENT",
] as const);

const scoreSchema = z.object({ position: z.number().int(), score: z.number() });

const attemptSchema = z.object({
  family: z.enum(["snomed", "icd10", "other_codes", "semantic"]),
  status: z.enum(["SUCCESS", "FAILED", "SKIPPED"]),
  details: z.string(),
  match: z.object({ method: methodSchema, position: z.number().int(), value: z.string() }).optional(),
  semantic: z
    .object({ scores: z.array(scoreSchema), best: scoreSchema.nullable(), judge_position: z.number().int().nullable() })
    .optional(),
  error: z.string().optional(),
  judge_error: z.string().optional(),
});

const bucketSchema = z.object({ n: z.number().int(), score: z.number() });

const recordSchema = z.object({
  case_id: z.string(),
  gdx_details: z.record(detailSchema),
  ddx_details: z.record(detailSchema),
  eval_details: z.object({
    final_resolution: z
      .object({ position: z.number().int(), method: methodSchema, value: z.string(), gdx_index: z.number().int() })
      .nullable(),
    evaluation_trace: z.array(
      z.object({
        gdx_index: z.number().int(),
        status: z.enum(["SUCCESS", "FAILED"]),
        method: methodSchema.nullable(),
        matched_position: z.number().int().nullable(),
        matched_value: z.string().nullable(),
        attempts: z.array(attemptSchema),
      }),
    ),
    severity_evaluation: z
      .object({
        final_score: z.number(),
        optimist: bucketSchema,
        pessimist: bucketSchema,
        neutral: z.number().int(),
        gdx: z.object({ name: z.string(), severity: z.string() }),
        ddx_list: z.array(z.object({ name: z.string(), severity: z.string(), distance: z.number(), score: z.number() })),
      })
      .nullable(),
    error: z.string().nullable().default(null),
    parse_error: z.string().nullable().default(null),
  }),
});

type CaseRecord = z.infer<typeof recordSchema>;

function restoreList(map: Record<string, z.infer<typeof detailSchema>>): Diagnosis[] {
  return Object.entries(map).map(([name, d]) => {
    const sev = d.severity;
    return makeDiagnosis({
      name,
      normalizedText: d.normalized_text,
      medicalCodes: d.medical_codes,
      severity: isSeverityLabel(sev) ? sev : null,
    });
  });
}

function restoreSeverity(s: CaseRecord["eval_details"]["severity_evaluation"]): SeverityResult | null {
  if (!s) return null;
  const label = (v: string) => (isSeverityLabel(v) ? v : "S5");
  return {
    finalScore: s.final_score,
    optimist: s.optimist,
    pessimist: s.pessimist,
    neutral: s.neutral,
    gdx: { name: s.gdx.name, severity: label(s.gdx.severity) },
    ddx: s.ddx_list.map((d) => ({ ...d, severity: label(d.severity) })),
  };
}

export function restoreCaseResult(record: CaseRecord): CaseResult {
  const gdxList = restoreList(record.gdx_details);
  const ddxList = restoreList(record.ddx_details);
  const ev = record.eval_details;

  const trace: GdxTrace[] = [];
  for (const t of ev.evaluation_trace) {
    const gdx = gdxList[t.gdx_index - 1];
    if (!gdx) continue;
    trace.push({
      gdxIndex: t.gdx_index,
      gdx,
      outcome: {
        status: t.status,
        method: t.method ?? undefined,
        matchedPosition: t.matched_position ?? undefined,
        matchedValue: t.matched_value ?? undefined,
        attempts: t.attempts.map(({ semantic, judge_error, ...a }) => ({
          ...a,
          semantic: semantic
            ? { scores: semantic.scores, best: semantic.best, judgePosition: semantic.judge_position }
            : undefined,
          judgeError: judge_error,
        })),
      },
    });
  }

  let resolution: FinalResolution | null = null;
  const fr = ev.final_resolution;
  const gdx = fr ? gdxList[fr.gdx_index - 1] : undefined;
  const ddx = fr ? ddxList[fr.position - 1] : undefined;
  if (fr && gdx && ddx) {
    resolution = { position: fr.position, method: fr.method, value: fr.value, gdxIndex: fr.gdx_index, gdx, ddx };
  }

  const result: CaseResult = {
    caseId: record.case_id,
    gdxList,
    ddxList,
    trace,
    resolution,
    severity: restoreSeverity(ev.severity_evaluation),
  };
  if (ev.error) result.error = ev.error;
  if (ev.parse_error) result.parseError = ev.parse_error;
  return result;
}

export async function readEvaluationDetails(path: string): Promise<CaseResult[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read evaluation details ${path}: ${errorMessage(err)}`);
  }
  const parsed = z.array(recordSchema).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Malformed evaluation details ${path}`,
      parsed.error.issues.slice(0, 5).map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  return parsed.data.map(restoreCaseResult);
}

// ─── Writing a run ───────────────────────────────────────

/** `2026-10-18T09:05:03.120Z` → `20261018_090503`. */
export function runTimestamp(date: Date = new Date()): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, "")}_${iso.slice(11, 19).replace(/:/g, "")}`;
}

export interface RunReport {
  results: readonly CaseResult[];
  summary: DatasetSummary;
  metadata: Record<string, unknown>;
  config: unknown;
}

export interface WrittenRun {
  dir: string;
  detailsPath: string;
  summaryPath: string;
  configPath: string;
}

export function summaryDocument(report: Pick<RunReport, "summary" | "metadata">): unknown {
  return toSnakeKeys({ metadata: report.metadata, ...report.summary });
}

export async function writeRun(outputDir: string, report: RunReport, date: Date = new Date()): Promise<WrittenRun> {
  const dir = join(outputDir, runTimestamp(date));
  await mkdir(dir, { recursive: true });
  const written: WrittenRun = {
    dir,
    detailsPath: join(dir, "evaluation_details.json"),
    summaryPath: join(dir, "summary.json"),
    configPath: join(dir, "config.yaml"),
  };
  await writeFile(written.detailsPath, JSON.stringify(report.results.map(caseRecord), null, 2), "utf8");
  await writeFile(written.summaryPath, JSON.stringify(summaryDocument(report), null, 2), "utf8");
  await writeFile(written.configPath, yaml.dump(report.config), "utf8");
  return written;
}
