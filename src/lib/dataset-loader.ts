/**
 * Dataset loading — JSON case files → Case[].
 *
 * Accepted layouts:
 *   [case, ...]                    flat array
 *   { category: [case, ...], ... } grouped; categories concatenated in order
 *
 * Per case: GDX from `diagnoses: [{ name, ... }]` or `gdx_details: { name: {...} }`;
 * DDX from `ddx_details: { name: {...} }` (key order = position) or `ddx: [...]`.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { Case, Diagnosis, SeverityLabel } from "@/types/diagnosis";
import { CODE_SYSTEMS } from "@/types/diagnosis";
import type { CodeSystem } from "@/types/diagnosis";
import type { Logger } from "@/lib/logger";
import { silentLogger } from "@/lib/logger";
import { ConfigurationError, MalformedInputError, errorMessage } from "@/lib/errors";
import { makeDiagnosis } from "@/lib/diagnosis-accessors";
import { isSeverityLabel } from "@/lib/severity-scorer";

// ─── Schemas ─────────────────────────────────────────────

const codeListSchema = z
  .union([z.array(z.union([z.string(), z.number()])), z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? [] : Array.isArray(v) ? v.map(String) : [String(v)]));

const codesSchema = z
  .object({
    icd10: codeListSchema,
    snomed: codeListSchema,
    omim: codeListSchema,
    orpha: codeListSchema,
  })
  .partial()
  .passthrough();

const detailsSchema = z
  .object({
    name: z.string().optional(),
    normalized_text: z.string().nullish(),
    medical_codes: codesSchema.nullish(),
    severity: z.string().nullish(),
  })
  .passthrough();

type DiagnosisDetails = z.infer<typeof detailsSchema>;

const caseSchema = z
  .object({
    case_id: z.union([z.string(), z.number()]).optional(),
    id: z.union([z.string(), z.number()]).optional(),
    case: z.string().optional(),
    description: z.string().optional(),
    case_description: z.string().optional(),
    patient_description: z.string().optional(),
    diagnoses: z.array(z.unknown()).optional(),
    gdx_details: z.record(z.unknown()).optional(),
    ddx_details: z.record(z.unknown()).optional(),
    ddx: z.array(z.unknown()).optional(),
  })
  .passthrough();

type RawCase = z.infer<typeof caseSchema>;

const DESCRIPTION_FIELDS = ["case", "description", "case_description", "patient_description"] as const;

// ─── Diagnosis entries ───────────────────────────────────

function toDiagnosis(entry: unknown, fallbackName?: string): Diagnosis {
  if (typeof entry === "string") {
    if (!entry.trim()) throw new MalformedInputError("empty diagnosis string");
    return makeDiagnosis({ name: entry });
  }
  const parsed = detailsSchema.safeParse(entry ?? {});
  if (!parsed.success) throw new MalformedInputError(`invalid diagnosis entry: ${parsed.error.issues[0]?.message}`);
  const d: DiagnosisDetails = parsed.data;
  const name = (d.name ?? fallbackName ?? "").trim();
  if (!name) throw new MalformedInputError("diagnosis without a name");

  const codes: Partial<Record<CodeSystem, string[]>> = {};
  for (const s of CODE_SYSTEMS) {
    const list = d.medical_codes?.[s];
    if (list) codes[s] = list;
  }
  const sev = d.severity?.trim();
  const severity: SeverityLabel | null = isSeverityLabel(sev) ? sev : null;
  return makeDiagnosis({ name, normalizedText: d.normalized_text, medicalCodes: codes, severity });
}

function collect(entries: [unknown, string | undefined][], where: string, logger: Logger): Diagnosis[] {
  const out: Diagnosis[] = [];
  entries.forEach(([entry, key], i) => {
    try {
      out.push(toDiagnosis(entry, key));
    } catch (err) {
      if (!(err instanceof MalformedInputError)) throw err;
      logger.warn(`Skipping ${where} entry ${i + 1}: ${err.message}`);
    }
  });
  return out;
}

function mapEntries(map: Record<string, unknown>): [unknown, string][] {
  return Object.entries(map).map(([name, details]) => [details, name]);
}

// ─── Cases ───────────────────────────────────────────────

function caseDescription(raw: RawCase): string {
  for (const field of DESCRIPTION_FIELDS) {
    const v = raw[field];
    if (v?.trim()) return v;
  }
  return "";
}

export function parseCase(entry: unknown, index: number, logger: Logger = silentLogger): Case {
  const parsed = caseSchema.safeParse(entry);
  if (!parsed.success) throw new MalformedInputError(`case ${index + 1} is not a case object`);
  const raw = parsed.data;
  const caseId = String(raw.case_id ?? raw.id ?? `case_${index + 1}`);

  const gdxEntries: [unknown, string | undefined][] = raw.diagnoses
    ? raw.diagnoses.map((d) => [d, undefined])
    : mapEntries(raw.gdx_details ?? {});
  const ddxEntries: [unknown, string | undefined][] = raw.ddx_details
    ? mapEntries(raw.ddx_details)
    : (raw.ddx ?? []).map((d) => [d, undefined]);

  return {
    caseId,
    caseDescription: caseDescription(raw),
    gdxList: collect(gdxEntries, `case ${caseId} GDX`, logger),
    ddxList: collect(ddxEntries, `case ${caseId} DDX`, logger),
  };
}

export function parseDataset(raw: unknown, logger: Logger = silentLogger): Case[] {
  let entries: unknown[];
  if (Array.isArray(raw)) {
    entries = raw;
  } else if (typeof raw === "object" && raw !== null) {
    entries = Object.values(raw).flatMap((group): unknown[] => (Array.isArray(group) ? group : []));
  } else {
    throw new ConfigurationError("Dataset must be a JSON array of cases or an object of case arrays");
  }

  const cases: Case[] = [];
  entries.forEach((entry, i) => {
    try {
      cases.push(parseCase(entry, i, logger));
    } catch (err) {
      if (!(err instanceof MalformedInputError)) throw err;
      logger.warn(`Skipping dataset entry ${i + 1}: ${err.message}`);
    }
  });
  return cases;
}

export async function loadDataset(path: string, logger: Logger = silentLogger): Promise<Case[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read dataset at ${path}: ${errorMessage(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Dataset at ${path} is not valid JSON: ${errorMessage(err)}`);
  }
  const cases = parseDataset(raw, logger);
  logger.info(`Loaded ${cases.length} cases from ${path}`);
  return cases;
}
