/**
 * Code extraction — Azure AI Language "Text Analytics for Health".
 *
 * Submits an analyze-text job, polls the operation until it settles, and maps
 * entity links to coding systems by data-source name. The first entity's
 * normalized name becomes the diagnosis' normalized text.
 */

import { z } from "zod";
import type { CodeSystem, MedicalCodes } from "@/types/diagnosis";
import type { CodeExtractor, ExtractedCodes } from "@/lib/oracles";
import type { CallPolicy, Sleep } from "@/lib/retry";
import { guardedCall } from "@/lib/retry";
import { HttpError, OracleFailure } from "@/lib/errors";
import { emptyCodes, uniqueCodes } from "@/lib/diagnosis-accessors";

export const TA4H_API_VERSION = "2023-04-01";

/** Service limit on documents per healthcare job. */
export const TA4H_MAX_DOCUMENTS = 5;

// ─── Response schemas ────────────────────────────────────

const linkSchema = z.object({ dataSource: z.string(), id: z.string() });

const entitySchema = z.object({
  text: z.string(),
  category: z.string().optional(),
  name: z.string().optional(),
  links: z.array(linkSchema).optional(),
});

const documentSchema = z.object({ id: z.string(), entities: z.array(entitySchema) });

const jobSchema = z.object({
  status: z.string(),
  errors: z.array(z.object({ message: z.string().optional() }).passthrough()).optional(),
  tasks: z
    .object({
      items: z
        .array(
          z.object({
            results: z
              .object({
                documents: z.array(documentSchema).default([]),
                errors: z.array(z.object({ id: z.string() }).passthrough()).default([]),
              })
              .optional(),
          }),
        )
        .default([]),
    })
    .optional(),
});

export type Ta4hEntity = z.infer<typeof entitySchema>;
export type Ta4hJob = z.infer<typeof jobSchema>;

// ─── Mapping ─────────────────────────────────────────────

const SOURCE_PATTERNS: [CodeSystem, string[]][] = [
  ["icd10", ["icd10", "icd-10"]],
  ["snomed", ["snomed", "sct"]],
  ["omim", ["omim"]],
  ["orpha", ["orpha"]],
];

export function codeSystemFor(dataSource: string): CodeSystem | null {
  const name = dataSource.toLowerCase();
  for (const [system, needles] of SOURCE_PATTERNS) {
    if (needles.some((n) => name.includes(n))) return system;
  }
  return null;
}

export function codesFromEntities(text: string, entities: Ta4hEntity[]): ExtractedCodes {
  const collected: Record<CodeSystem, string[]> = emptyCodes();
  for (const entity of entities) {
    for (const link of entity.links ?? []) {
      const system = codeSystemFor(link.dataSource);
      if (system) collected[system].push(link.id);
    }
  }
  const medicalCodes: MedicalCodes = {
    icd10: uniqueCodes(collected.icd10),
    snomed: uniqueCodes(collected.snomed),
    omim: uniqueCodes(collected.omim),
    orpha: uniqueCodes(collected.orpha),
  };
  const first = entities[0];
  return { normalizedText: first?.name?.trim() || text, medicalCodes };
}

// ─── Adapter ─────────────────────────────────────────────

export interface Ta4hConfig {
  endpoint: string;
  apiKey: string;
  language?: string;
  pollIntervalMs?: number;
  /** Poll attempts before the job is abandoned. */
  maxPolls?: number;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function createTa4hExtractor(config: Ta4hConfig, policy: CallPolicy): CodeExtractor {
  const base = config.endpoint.replace(/\/+$/, "");
  const pollIntervalMs = config.pollIntervalMs ?? 1000;
  const maxPolls = config.maxPolls ?? 120;
  const sleep = policy.sleep ?? defaultSleep;
  const headers = { "Content-Type": "application/json", "Ocp-Apim-Subscription-Key": config.apiKey };

  const submit = (texts: string[]) =>
    guardedCall(
      "ta4h:submit",
      async (signal) => {
        const res = await fetch(`${base}/language/analyze-text/jobs?api-version=${TA4H_API_VERSION}`, {
          method: "POST",
          headers,
          signal,
          body: JSON.stringify({
            analysisInput: {
              documents: texts.map((text, i) => ({ id: String(i), language: config.language ?? "en", text })),
            },
            tasks: [{ kind: "Healthcare", parameters: { modelVersion: "latest" } }],
          }),
        });
        if (!res.ok) throw new HttpError(res.status, `Text Analytics submit failed: ${res.status} ${res.statusText}`);
        const location = res.headers.get("operation-location");
        if (!location) throw new OracleFailure("ta4h", "job accepted without an operation-location header");
        return location;
      },
      policy,
    );

  const poll = (location: string) =>
    guardedCall(
      "ta4h:poll",
      async (signal) => {
        const res = await fetch(location, { headers, signal });
        if (!res.ok) throw new HttpError(res.status, `Text Analytics poll failed: ${res.status} ${res.statusText}`);
        const parsed = jobSchema.safeParse(await res.json());
        if (!parsed.success) throw new OracleFailure("ta4h", `unexpected job payload: ${parsed.error.message}`);
        return parsed.data;
      },
      policy,
    );

  const runJob = async (texts: string[]): Promise<Ta4hJob> => {
    const location = await submit(texts);
    for (let i = 0; i < maxPolls; i++) {
      const job = await poll(location);
      if (job.status === "succeeded") return job;
      if (job.status === "failed" || job.status === "cancelled") {
        const reason = job.errors?.map((e) => e.message).join("; ") || job.status;
        throw new OracleFailure("ta4h", `job ${job.status}: ${reason}`);
      }
      await sleep(pollIntervalMs);
    }
    throw new OracleFailure("ta4h", `job did not finish after ${maxPolls} polls`);
  };

  const extractBatch = async (texts: string[]): Promise<Map<string, ExtractedCodes>> => {
    if (texts.length > TA4H_MAX_DOCUMENTS) {
      throw new OracleFailure("ta4h", `at most ${TA4H_MAX_DOCUMENTS} documents per job, got ${texts.length}`);
    }
    const out = new Map<string, ExtractedCodes>();
    if (texts.length === 0) return out;
    const job = await runJob(texts);
    const documents = job.tasks?.items[0]?.results?.documents ?? [];
    const byId = new Map(documents.map((d) => [d.id, d]));
    texts.forEach((text, i) => {
      const doc = byId.get(String(i));
      // per-document errors yield empty codes
      out.set(text, doc ? codesFromEntities(text, doc.entities) : { normalizedText: text, medicalCodes: emptyCodes() });
    });
    return out;
  };

  return {
    extractBatch,
    async extract(text) {
      const result = (await extractBatch([text])).get(text);
      return result ?? { normalizedText: text, medicalCodes: emptyCodes() };
    },
  };
}
