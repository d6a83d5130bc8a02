/**
 * LLM client — Azure OpenAI chat completions through the `openai` SDK.
 *
 * Structured output uses `json_schema` response formats. Batch mode appends
 * the items as JSON to the prompt and wraps the item schema in
 * `{ results: [item] }`; the caller gets the `results` array back.
 */

import { AzureOpenAI } from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import type { CallPolicy } from "@/lib/retry";
import { guardedCall } from "@/lib/retry";
import { OracleFailure } from "@/lib/errors";

export type JsonSchema = Record<string, unknown>;

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
  /** Cancels the call, including pending retries. */
  signal?: AbortSignal;
}

export interface LlmClient {
  /** Free-text completion. */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
  /** Completion constrained to `schema`, parsed. */
  generateStructured(prompt: string, schema: JsonSchema, options?: GenerateOptions): Promise<unknown>;
  /** One call over many items; returns the per-item results array. */
  generateBatch(
    prompt: string,
    items: Record<string, unknown>[],
    itemSchema: JsonSchema,
    options?: GenerateOptions,
  ): Promise<unknown[]>;
}

// ─── Batch helpers ───────────────────────────────────────

export function buildBatchPrompt(prompt: string, items: Record<string, unknown>[]): string {
  return (
    `${prompt}\n\nProcess the following items:\n${JSON.stringify(items, null, 2)}\n\n` +
    `Return the results in a JSON object with a 'results' array containing the processed items.`
  );
}

export function wrapBatchSchema(itemSchema: JsonSchema): JsonSchema {
  return {
    type: "object",
    properties: {
      results: { type: "array", items: itemSchema },
    },
    required: ["results"],
    additionalProperties: false,
  };
}

export function unwrapBatchResults(parsed: unknown): unknown[] {
  if (Array.isArray(parsed)) return parsed;
  if (typeof parsed === "object" && parsed !== null) {
    const results: unknown = Reflect.get(parsed, "results");
    if (Array.isArray(results)) return results;
  }
  throw new OracleFailure("llm", "batch response has no 'results' array");
}

// ─── Azure OpenAI ────────────────────────────────────────

export interface AzureLlmConfig {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  deployment: string;
  /** Reasoning models take an effort level instead of temperature. */
  reasoningEffort?: "low" | "medium" | "high";
  defaults?: GenerateOptions;
}

export function createAzureLlmClient(config: AzureLlmConfig, policy: CallPolicy): LlmClient {
  const client = new AzureOpenAI({
    endpoint: config.endpoint,
    apiKey: config.apiKey,
    apiVersion: config.apiVersion,
    deployment: config.deployment,
    // retries and timeouts are applied by guardedCall
    maxRetries: 0,
  });

  const complete = async (prompt: string, schema: JsonSchema | null, options: GenerateOptions = {}) => {
    const { signal, ...opts } = { ...config.defaults, ...options };
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: config.deployment,
      messages: [{ role: "user", content: prompt }],
    };
    if (config.reasoningEffort) {
      params.reasoning_effort = config.reasoningEffort;
      if (opts.maxTokens !== undefined) params.max_completion_tokens = opts.maxTokens;
    } else {
      if (opts.temperature !== undefined) params.temperature = opts.temperature;
      if (opts.maxTokens !== undefined) params.max_tokens = opts.maxTokens;
    }
    if (schema) {
      params.response_format = {
        type: "json_schema",
        json_schema: { name: "structured_output", schema, strict: true },
      };
    }

    const res = await guardedCall(
      `llm:${config.deployment}`,
      (callSignal) => client.chat.completions.create(params, { signal: callSignal }),
      policy,
      signal,
    );
    const content = res.choices[0]?.message?.content;
    if (typeof content !== "string") {
      throw new OracleFailure("llm", `empty completion from ${config.deployment}`);
    }
    return content;
  };

  const parseJson = (content: string): unknown => {
    try {
      return JSON.parse(content);
    } catch (err) {
      throw new OracleFailure("llm", `model returned non-JSON despite schema: ${content.slice(0, 120)}`, { cause: err });
    }
  };

  return {
    generate: (prompt, options) => complete(prompt, null, options),
    async generateStructured(prompt, schema, options) {
      return parseJson(await complete(prompt, schema, options));
    },
    async generateBatch(prompt, items, itemSchema, options) {
      const content = await complete(buildBatchPrompt(prompt, items), wrapBatchSchema(itemSchema), options);
      return unwrapBatchResults(parseJson(content));
    },
  };
}
