/**
 * Experiment wiring — resolved config + credentials → pipeline collaborators.
 */

import { readFile } from "node:fs/promises";
import type { ExperimentConfig, Credentials, GenerationConfig } from "@/lib/config";
import { assertCredentials } from "@/lib/config";
import type { PipelineDeps } from "@/lib/evaluation-pipeline";
import type { LlmClient } from "@/lib/llm-client";
import { createAzureLlmClient } from "@/lib/llm-client";
import type { Logger } from "@/lib/logger";
import type { CallPolicy } from "@/lib/retry";
import type { SimilarityOracle } from "@/lib/oracles";
import {
  createEmbeddingSimilarityOracle,
  createHttpSimilarityOracle,
  createOpenAiEmbedFn,
  withSimilarityCache,
} from "@/lib/similarity";
import { emptyCodeOracle, loadIcd10Taxonomy } from "@/lib/icd10-taxonomy";
import { createLlmJudge } from "@/lib/judge";
import { createMatchResolver } from "@/lib/match-resolver";
import { createCaseEvaluator } from "@/lib/case-evaluator";
import { createDdxGenerator } from "@/lib/ddx-generator";
import { createTa4hExtractor } from "@/lib/code-extractor";
import { createCodeLabeler } from "@/lib/code-labeler";
import { createSeverityAssigner } from "@/lib/severity-assigner";
import { ConfigurationError, errorMessage } from "@/lib/errors";

async function readPrompt(path: string, what: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${what} prompt at ${path}: ${errorMessage(err)}`);
  }
}

function generateOptions(g: GenerationConfig) {
  return { maxTokens: g.maxTokens, temperature: g.temperature };
}

export async function buildPipelineDeps(
  config: ExperimentConfig,
  creds: Credentials,
  logger: Logger,
): Promise<PipelineDeps> {
  assertCredentials(config, creds);
  const azure = creds.azureOpenAi;
  if (!azure) throw new ConfigurationError("Azure OpenAI credentials are required");

  const policy = (tag: string): CallPolicy => ({
    retry: config.retry,
    timeoutMs: config.timeoutMs,
    logger: logger.child(tag),
  });

  const llmFor = (g: GenerationConfig, tag: string): LlmClient =>
    createAzureLlmClient(
      { ...azure, deployment: g.model, reasoningEffort: g.reasoningEffort, defaults: generateOptions(g) },
      policy(tag),
    );

  let similarity: SimilarityOracle;
  if (config.similarity.provider === "http") {
    if (!config.similarity.endpoint) throw new ConfigurationError("similarity.endpoint is required");
    similarity = createHttpSimilarityOracle(
      { endpoint: config.similarity.endpoint, apiKey: creds.similarityApiKey ?? undefined },
      policy("Similarity"),
    );
  } else {
    const embed = creds.openAiApiKey
      ? createOpenAiEmbedFn({ model: config.similarity.model, apiKey: creds.openAiApiKey })
      : createOpenAiEmbedFn({
          model: config.similarity.model,
          apiKey: azure.apiKey,
          azureEndpoint: azure.endpoint,
          apiVersion: azure.apiVersion,
        });
    similarity = createEmbeddingSimilarityOracle(embed, policy("Similarity"));
  }

  const codes = config.taxonomyPath ? await loadIcd10Taxonomy(config.taxonomyPath) : emptyCodeOracle;
  if (!config.taxonomyPath) logger.warn("No ICD-10 taxonomy configured; hierarchy relations will not match");

  const resolver = createMatchResolver(
    {
      codes,
      similarity: withSimilarityCache(similarity),
      judge: createLlmJudge(llmFor(config.judge, "Judge"), generateOptions(config.judge)),
    },
    config.resolver,
  );

  const deps: PipelineDeps = {
    evaluator: createCaseEvaluator(resolver, logger.child("Evaluator")),
    logger: logger.child("Pipeline"),
  };

  const emulator = config.emulator.generation;
  if (config.emulator.enabled && emulator) {
    deps.generator = createDdxGenerator(
      llmFor(emulator, "Emulator"),
      { template: await readPrompt(config.emulator.promptPath, "DDX generation") },
      logger.child("Emulator"),
    );
  }

  if (config.labelerEnabled && creds.azureLanguage) {
    deps.labeler = createCodeLabeler(createTa4hExtractor(creds.azureLanguage, policy("Labeler")), logger.child("Labeler"));
  }

  const severity = config.severity.generation;
  if (config.severity.enabled && severity) {
    deps.severity = createSeverityAssigner(
      llmFor(severity, "Severity"),
      { prompt: await readPrompt(config.severity.promptPath, "severity"), batchSize: config.severity.batchSize },
      logger.child("Severity"),
    );
  }

  return deps;
}
