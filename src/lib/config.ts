/**
 * Experiment configuration — YAML file + environment credentials.
 *
 * Any problem here is a ConfigurationError: fatal at startup, never mid-run.
 * Relative paths resolve against the config file's directory.
 */

import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import type { ResolverOptions } from "@/lib/match-resolver";
import { DEFAULT_RESOLVER_OPTIONS, validateResolverOptions } from "@/lib/match-resolver";
import type { RetryPolicy } from "@/lib/retry";
import { DEFAULT_RETRY_POLICY } from "@/lib/retry";
import type { LogLevel } from "@/lib/logger";
import { LOG_LEVELS } from "@/lib/logger";
import { ConfigurationError, errorMessage } from "@/lib/errors";
import { DEFAULT_MATCH_THRESHOLD } from "@/lib/ranking-metrics";
import { DEFAULT_SEVERITY_BATCH_SIZE } from "@/lib/severity-assigner";

// ─── Schema ──────────────────────────────────────────────

const unit = z.number().min(0).max(1);

const generationSchema = {
  model: z.string().min(1),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  reasoning_effort: z.enum(["low", "medium", "high"]).optional(),
};

const configSchema = z.object({
  experiment_name: z.string().default("Unnamed Experiment"),
  experiment_description: z.string().default(""),
  dataset_path: z.string({ required_error: "dataset_path is required" }).min(1),
  output_dir: z.string().default("output"),
  concurrency: z.number().int().positive().default(3),
  timeout_ms: z.number().int().positive().default(180_000),
  log_level: z.enum(LOG_LEVELS).default("info"),
  evaluator: z
    .object({
      acceptance_threshold: unit.default(DEFAULT_RESOLVER_OPTIONS.acceptanceThreshold),
      autoconfirm_threshold: unit.default(DEFAULT_RESOLVER_OPTIONS.autoconfirmThreshold),
      enable_icd10_parent_search: z.boolean().default(DEFAULT_RESOLVER_OPTIONS.enableParentSearch),
      enable_icd10_sibling_search: z.boolean().default(DEFAULT_RESOLVER_OPTIONS.enableSiblingSearch),
      judge_candidate_limit: z.number().int().positive().default(DEFAULT_RESOLVER_OPTIONS.judgeCandidateLimit),
    })
    .default({}),
  metrics: z.object({ match_threshold: unit.default(DEFAULT_MATCH_THRESHOLD) }).default({}),
  severity: z
    .object({
      enabled: z.boolean().default(true),
      batch_size: z.number().int().positive().default(DEFAULT_SEVERITY_BATCH_SIZE),
      prompt_path: z.string().default("prompts/severity.txt"),
      ...generationSchema,
      model: generationSchema.model.optional(),
    })
    .default({}),
  emulator: z
    .object({
      enabled: z.boolean().default(false),
      prompt_path: z.string().default("prompts/ddx-generation.txt"),
      ...generationSchema,
      model: generationSchema.model.optional(),
    })
    .default({}),
  labeler: z.object({ enabled: z.boolean().default(false) }).default({}),
  icd10: z.object({ taxonomy_path: z.string().nullish() }).default({}),
  similarity: z
    .object({
      provider: z.enum(["embedding", "http"]).default("embedding"),
      model: z.string().default("text-embedding-3-small"),
      endpoint: z.string().url().optional(),
    })
    .default({}),
  judge: z
    .object({
      model: z.string().min(1).optional(),
      max_tokens: z.number().int().positive().default(10),
      temperature: z.number().min(0).max(2).default(0.1),
      reasoning_effort: z.enum(["low", "medium", "high"]).optional(),
    })
    .default({}),
  retry: z
    .object({
      max_attempts: z.number().int().positive().default(DEFAULT_RETRY_POLICY.maxAttempts),
      base_delay_ms: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.baseDelayMs),
      max_delay_ms: z.number().int().nonnegative().default(DEFAULT_RETRY_POLICY.maxDelayMs),
    })
    .default({}),
});

export type RawExperimentConfig = z.input<typeof configSchema>;

// ─── Resolved config ─────────────────────────────────────

export interface GenerationConfig {
  model: string;
  maxTokens?: number;
  temperature?: number;
  reasoningEffort?: "low" | "medium" | "high";
}

export interface ExperimentConfig {
  experimentName: string;
  experimentDescription: string;
  datasetPath: string;
  outputDir: string;
  concurrency: number;
  timeoutMs: number;
  logLevel: LogLevel;
  resolver: ResolverOptions;
  matchThreshold: number;
  severity: { enabled: boolean; batchSize: number; promptPath: string; generation: GenerationConfig | null };
  emulator: { enabled: boolean; promptPath: string; generation: GenerationConfig | null };
  labelerEnabled: boolean;
  taxonomyPath: string | null;
  similarity: { provider: "embedding" | "http"; model: string; endpoint: string | null };
  judge: GenerationConfig;
  retry: RetryPolicy;
  /** The validated file contents, echoed into the run summary. */
  raw: z.output<typeof configSchema>;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
}

function generation(
  section: { model?: string; max_tokens?: number; temperature?: number; reasoning_effort?: "low" | "medium" | "high" },
): GenerationConfig | null {
  if (!section.model) return null;
  return {
    model: section.model,
    maxTokens: section.max_tokens,
    temperature: section.temperature,
    reasoningEffort: section.reasoning_effort,
  };
}

export function parseConfig(input: unknown, baseDir: string = process.cwd()): ExperimentConfig {
  const parsed = configSchema.safeParse(input ?? {});
  if (!parsed.success) throw new ConfigurationError("Invalid experiment configuration", formatIssues(parsed.error));
  const c = parsed.data;
  const path = (p: string) => (isAbsolute(p) ? p : resolve(baseDir, p));

  const resolver: ResolverOptions = {
    acceptanceThreshold: c.evaluator.acceptance_threshold,
    autoconfirmThreshold: c.evaluator.autoconfirm_threshold,
    enableParentSearch: c.evaluator.enable_icd10_parent_search,
    enableSiblingSearch: c.evaluator.enable_icd10_sibling_search,
    judgeCandidateLimit: c.evaluator.judge_candidate_limit,
  };
  validateResolverOptions(resolver);

  const issues: string[] = [];
  if (c.similarity.provider === "http" && !c.similarity.endpoint) {
    issues.push("similarity.endpoint is required when provider is http");
  }
  if (c.emulator.enabled && !c.emulator.model) issues.push("emulator.model is required when the emulator is enabled");
  if (c.retry.base_delay_ms > c.retry.max_delay_ms) issues.push("retry.base_delay_ms exceeds retry.max_delay_ms");
  const judge = generation(c.judge);
  if (!judge) issues.push("judge.model is required");
  if (!judge || issues.length) throw new ConfigurationError("Invalid experiment configuration", issues);

  return {
    experimentName: c.experiment_name,
    experimentDescription: c.experiment_description,
    datasetPath: path(c.dataset_path),
    outputDir: path(c.output_dir),
    concurrency: c.concurrency,
    timeoutMs: c.timeout_ms,
    logLevel: c.log_level,
    resolver,
    matchThreshold: c.metrics.match_threshold,
    severity: {
      enabled: c.severity.enabled,
      batchSize: c.severity.batch_size,
      promptPath: path(c.severity.prompt_path),
      // severity labelling falls back to the judge deployment
      generation: generation({ ...c.severity, model: c.severity.model ?? judge.model }),
    },
    emulator: {
      enabled: c.emulator.enabled,
      promptPath: path(c.emulator.prompt_path),
      generation: generation(c.emulator),
    },
    labelerEnabled: c.labeler.enabled,
    taxonomyPath: c.icd10.taxonomy_path ? path(c.icd10.taxonomy_path) : null,
    similarity: { provider: c.similarity.provider, model: c.similarity.model, endpoint: c.similarity.endpoint ?? null },
    judge,
    retry: {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: c.retry.max_attempts,
      baseDelayMs: c.retry.base_delay_ms,
      maxDelayMs: c.retry.max_delay_ms,
    },
    raw: c,
  };
}

export async function loadConfig(configPath: string): Promise<ExperimentConfig> {
  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read config ${configPath}: ${errorMessage(err)}`);
  }
  let doc: unknown;
  try {
    doc = yaml.load(text);
  } catch (err) {
    throw new ConfigurationError(`Config ${configPath} is not valid YAML: ${errorMessage(err)}`);
  }
  return parseConfig(doc, dirname(resolve(configPath)));
}

// ─── Credentials ─────────────────────────────────────────

export interface Credentials {
  azureOpenAi: { endpoint: string; apiKey: string; apiVersion: string } | null;
  azureLanguage: { endpoint: string; apiKey: string } | null;
  similarityApiKey: string | null;
  openAiApiKey: string | null;
}

export const DEFAULT_AZURE_API_VERSION = "2024-10-21";

type Env = Record<string, string | undefined>;

export function readCredentials(env: Env = process.env): Credentials {
  const get = (key: string) => env[key]?.trim() || null;
  const endpoint = get("AZURE_OPENAI_ENDPOINT");
  const apiKey = get("AZURE_OPENAI_API_KEY");
  const langEndpoint = get("AZURE_LANGUAGE_ENDPOINT");
  const langKey = get("AZURE_LANGUAGE_KEY");
  return {
    azureOpenAi:
      endpoint && apiKey
        ? { endpoint, apiKey, apiVersion: get("AZURE_OPENAI_API_VERSION") ?? DEFAULT_AZURE_API_VERSION }
        : null,
    azureLanguage: langEndpoint && langKey ? { endpoint: langEndpoint, apiKey: langKey } : null,
    similarityApiKey: get("SIMILARITY_API_KEY"),
    openAiApiKey: get("OPENAI_API_KEY"),
  };
}

/** Every enabled adapter must have its credentials before the run starts. */
export function assertCredentials(config: ExperimentConfig, creds: Credentials): void {
  const issues: string[] = [];
  // the judge always runs on Azure OpenAI
  if (!creds.azureOpenAi) {
    issues.push("AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_API_KEY are required");
  }
  if (config.similarity.provider === "embedding" && !creds.azureOpenAi && !creds.openAiApiKey) {
    issues.push("embedding similarity needs AZURE_OPENAI_* or OPENAI_API_KEY");
  }
  if (config.labelerEnabled && !creds.azureLanguage) {
    issues.push("AZURE_LANGUAGE_ENDPOINT and AZURE_LANGUAGE_KEY are required when the labeler is enabled");
  }
  if (issues.length) throw new ConfigurationError("Missing credentials", issues);
}
