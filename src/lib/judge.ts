/**
 * LLM tie-breaker: which candidate is most clinically interchangeable with
 * the reference diagnosis? Answers a 1-based index or 0.
 */

import type { Judge } from "@/lib/oracles";
import type { GenerateOptions, LlmClient } from "@/lib/llm-client";
import { JudgeFailure, errorMessage } from "@/lib/errors";

export function buildJudgePrompt(referenceText: string, candidates: string[]): string {
  const options = candidates.map((text, i) => `${i + 1}. ${text}`).join("\n");
  const n = candidates.length;
  return `You are a medical expert evaluating diagnostic similarity.

Reference diagnosis: ${referenceText}

Differential diagnosis options:
${options}

Which of the ${n} differential diagnosis options is most clinically similar or interchangeable with the reference diagnosis? Consider:
- Clinical presentation overlap
- Pathophysiology similarity
- Treatment approach similarity
- Differential diagnosis overlap

Respond with ONLY the number (1-${n}) of the most similar option. If none are clinically similar, respond with "0".

Answer:`;
}

/** Strict: the whole answer must be one integer in [0, candidateCount]. */
export function parseJudgeAnswer(raw: string, candidateCount: number): number {
  const text = raw.trim().replace(/^["'`]+|["'`.]+$/g, "");
  if (!/^\d+$/.test(text)) throw new JudgeFailure(`unparseable judge answer "${raw.trim()}"`, raw);
  const n = Number(text);
  if (n > candidateCount) throw new JudgeFailure(`judge answer ${n} exceeds ${candidateCount} candidates`, raw);
  return n;
}

export const DEFAULT_JUDGE_OPTIONS: GenerateOptions = { maxTokens: 10, temperature: 0.1 };

export function createLlmJudge(llm: LlmClient, options: GenerateOptions = DEFAULT_JUDGE_OPTIONS): Judge {
  return {
    async rank(referenceText, candidates, signal) {
      if (candidates.length === 0) return 0;
      let raw: string;
      try {
        raw = await llm.generate(buildJudgePrompt(referenceText, candidates), { ...options, signal });
      } catch (err) {
        throw new JudgeFailure(`judge call failed: ${errorMessage(err)}`, null, { cause: err });
      }
      return parseJudgeAnswer(raw, candidates.length);
    },
  };
}
