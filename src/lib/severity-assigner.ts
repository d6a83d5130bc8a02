/**
 * Severity assignment — batched LLM labelling of unique diagnosis texts.
 *
 * Runs once over every unique text before per-case severity scoring. Results
 * land in a write-once cache; texts the model skips or labels badly get S5.
 */

import type { SeverityLabel } from "@/types/diagnosis";
import { DEFAULT_SEVERITY } from "@/types/diagnosis";
import type { GenerateOptions, JsonSchema, LlmClient } from "@/lib/llm-client";
import type { Logger } from "@/lib/logger";
import { silentLogger } from "@/lib/logger";
import { errorMessage } from "@/lib/errors";
import { isSeverityLabel } from "@/lib/severity-scorer";

export const SEVERITY_ITEM_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    diagnosis: { type: "string", description: "The medical diagnosis being evaluated" },
    severity: { type: "string", pattern: "^S(10|[0-9])$", description: "Severity score from S0 to S10" },
  },
  required: ["diagnosis", "severity"],
  additionalProperties: false,
};

export const DEFAULT_SEVERITY_BATCH_SIZE = 50;

export interface SeverityAssignerOptions {
  prompt: string;
  batchSize?: number;
  generate?: GenerateOptions;
}

export interface SeverityAssigner {
  /** Labels every text not yet cached. Never throws on LLM failure. */
  assign(texts: Iterable<string>): Promise<Map<string, SeverityLabel>>;
  /** Cached label, S5 when unknown. */
  get(text: string): SeverityLabel;
  has(text: string): boolean;
  readonly size: number;
}

function readItem(item: unknown): [string, unknown] | null {
  if (typeof item !== "object" || item === null) return null;
  const diagnosis: unknown = Reflect.get(item, "diagnosis");
  if (typeof diagnosis !== "string") return null;
  const severity: unknown = Reflect.get(item, "severity");
  return [diagnosis, typeof severity === "string" ? severity.trim() : severity];
}

export function createSeverityAssigner(
  llm: LlmClient,
  options: SeverityAssignerOptions,
  logger: Logger = silentLogger,
): SeverityAssigner {
  const batchSize = options.batchSize ?? DEFAULT_SEVERITY_BATCH_SIZE;
  const cache = new Map<string, SeverityLabel>();

  const runBatch = async (batch: string[], label: string) => {
    const assigned = new Map<string, SeverityLabel>();
    try {
      const results = await llm.generateBatch(
        options.prompt,
        batch.map((diagnosis) => ({ diagnosis })),
        SEVERITY_ITEM_SCHEMA,
        options.generate,
      );
      logger.info(`${label}: ${results.length} of ${batch.length} severities returned`);
      for (const item of results) {
        const entry = readItem(item);
        if (!entry) continue;
        const [diagnosis, severity] = entry;
        if (isSeverityLabel(severity)) {
          assigned.set(diagnosis, severity);
        } else {
          logger.warn(`Invalid severity format for ${diagnosis}: ${String(severity)}`);
          assigned.set(diagnosis, DEFAULT_SEVERITY);
        }
      }
    } catch (err) {
      logger.error(`${label} failed, defaulting to ${DEFAULT_SEVERITY}`, { error: errorMessage(err) });
    }
    for (const text of batch) {
      if (!assigned.has(text)) {
        logger.warn(`No severity returned for ${text}; using ${DEFAULT_SEVERITY}`);
        assigned.set(text, DEFAULT_SEVERITY);
      }
    }
    return assigned;
  };

  return {
    get size() {
      return cache.size;
    },
    has: (text) => cache.has(text),
    get: (text) => cache.get(text) ?? DEFAULT_SEVERITY,
    async assign(texts) {
      const pending = [...new Set(texts)].filter((t) => t && !cache.has(t));
      const total = Math.ceil(pending.length / batchSize);
      if (pending.length) logger.info(`Assigning severities to ${pending.length} unique diagnoses`);
      for (let i = 0; i < pending.length; i += batchSize) {
        const batch = pending.slice(i, i + batchSize);
        const assigned = await runBatch(batch, `Batch ${i / batchSize + 1}/${total}`);
        for (const [text, sev] of assigned) {
          // write-once; the model may echo texts from another batch
          if (!cache.has(text)) cache.set(text, sev);
        }
      }
      return new Map(cache);
    },
  };
}
