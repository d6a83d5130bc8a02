/**
 * Code labelling — attaches extracted codes to uncoded DDX across a dataset.
 *
 * Unique names are sent to the extractor in service-sized batches; a failed
 * batch leaves its texts with empty codes and the run continues.
 */

import type { Case, Diagnosis } from "@/types/diagnosis";
import type { CodeExtractor, ExtractedCodes } from "@/lib/oracles";
import type { Logger } from "@/lib/logger";
import { silentLogger } from "@/lib/logger";
import { errorMessage } from "@/lib/errors";
import { emptyCodes, hasAnyCode } from "@/lib/diagnosis-accessors";
import { TA4H_MAX_DOCUMENTS } from "@/lib/code-extractor";

export interface CodeLabeler {
  label(cases: Case[]): Promise<Case[]>;
  /** Extraction results so far, keyed by DDX name. */
  readonly cache: ReadonlyMap<string, ExtractedCodes>;
}

export function collectUnlabeledNames(cases: readonly Case[]): string[] {
  const names = new Set<string>();
  for (const c of cases) {
    for (const ddx of c.ddxList) {
      if (!hasAnyCode(ddx.medicalCodes)) names.add(ddx.name);
    }
  }
  return [...names];
}

function applyCodes(ddx: Diagnosis, extracted: ExtractedCodes | undefined): Diagnosis {
  if (!extracted || hasAnyCode(ddx.medicalCodes)) return ddx;
  const normalizedText = ddx.normalizedText !== ddx.name ? ddx.normalizedText : extracted.normalizedText || ddx.name;
  return { ...ddx, normalizedText, medicalCodes: extracted.medicalCodes };
}

export function createCodeLabeler(
  extractor: CodeExtractor,
  logger: Logger = silentLogger,
  batchSize: number = TA4H_MAX_DOCUMENTS,
): CodeLabeler {
  const cache = new Map<string, ExtractedCodes>();

  return {
    cache,
    async label(cases) {
      const pending = collectUnlabeledNames(cases).filter((n) => !cache.has(n));
      const total = Math.ceil(pending.length / batchSize);
      logger.info(`Found ${pending.length} unique DDX terms to label`);

      for (let i = 0; i < pending.length; i += batchSize) {
        const batch = pending.slice(i, i + batchSize);
        const tag = `[${i / batchSize + 1}/${total}]`;
        try {
          const results = await extractor.extractBatch(batch);
          for (const text of batch) {
            cache.set(text, results.get(text) ?? { normalizedText: text, medicalCodes: emptyCodes() });
          }
          logger.debug(`${tag} labelled ${batch.length} DDX terms`);
        } catch (err) {
          logger.warn(`${tag} code extraction failed; leaving ${batch.length} terms uncoded`, {
            error: errorMessage(err),
          });
          for (const text of batch) cache.set(text, { normalizedText: text, medicalCodes: emptyCodes() });
        }
      }

      return cases.map((c) => ({ ...c, ddxList: c.ddxList.map((d) => applyCodes(d, cache.get(d.name))) }));
    },
  };
}
