/**
 * DDX generation — asks the model under test for a ranked differential.
 */

import type { Diagnosis } from "@/types/diagnosis";
import type { GenerateOptions, JsonSchema, LlmClient } from "@/lib/llm-client";
import type { Logger } from "@/lib/logger";
import { silentLogger } from "@/lib/logger";
import { errorMessage } from "@/lib/errors";
import { makeDiagnosis } from "@/lib/diagnosis-accessors";
import { parseDdxResponse } from "@/lib/ddx-response-parser";

export const CASE_PLACEHOLDER = "{case_description}";

export function fillPrompt(template: string, caseDescription: string): string {
  return template.split(CASE_PLACEHOLDER).join(caseDescription);
}

export interface GeneratedDdx {
  ddxList: Diagnosis[];
  raw: string | null;
  parseError?: string;
}

export interface DdxGeneratorOptions {
  template: string;
  /** Constrains the response when the model supports structured output. */
  schema?: JsonSchema;
  generate?: GenerateOptions;
}

export interface DdxGenerator {
  generate(caseId: string, caseDescription: string, signal?: AbortSignal): Promise<GeneratedDdx>;
}

export function createDdxGenerator(
  llm: LlmClient,
  options: DdxGeneratorOptions,
  logger: Logger = silentLogger,
): DdxGenerator {
  return {
    async generate(caseId, caseDescription, signal) {
      const prompt = fillPrompt(options.template, caseDescription);
      const generate = { ...options.generate, signal };
      let raw: string;
      try {
        raw = options.schema
          ? JSON.stringify(await llm.generateStructured(prompt, options.schema, generate))
          : await llm.generate(prompt, generate);
      } catch (err) {
        if (signal?.aborted) throw err;
        logger.error(`DDX generation failed for case ${caseId}`, { error: errorMessage(err) });
        return { ddxList: [], raw: null, parseError: `generation failed: ${errorMessage(err)}` };
      }

      const parsed = parseDdxResponse(raw);
      if (!parsed.ok) {
        logger.warn(`Could not decode DDX for case ${caseId}: ${parsed.error.message}`);
        return { ddxList: [], raw, parseError: parsed.error.message };
      }
      logger.debug(`Decoded ${parsed.value.diagnoses.length} DDX for case ${caseId}`, { shape: parsed.value.shape });
      return { ddxList: parsed.value.diagnoses.map((name) => makeDiagnosis({ name })), raw };
    },
  };
}
