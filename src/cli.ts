#!/usr/bin/env -S npx tsx
/**
 * ddx-eval — evaluate a model's differential diagnoses against ground truth.
 *
 * Usage:
 *   ddx-eval evaluate --config <file.yaml> [--limit N]
 *   ddx-eval summarize <evaluation_details.json> [--threshold T]
 */

import "dotenv/config";
import { parseArgs } from "node:util";
import { loadConfig, readCredentials } from "@/lib/config";
import { loadDataset } from "@/lib/dataset-loader";
import { buildPipelineDeps } from "@/lib/experiment";
import { runEvaluation } from "@/lib/evaluation-pipeline";
import { readEvaluationDetails, summaryDocument, writeRun } from "@/lib/report-writer";
import { summarizeDataset } from "@/lib/dataset-summary";
import { DEFAULT_MATCH_THRESHOLD } from "@/lib/ranking-metrics";
import { createLogger } from "@/lib/logger";
import { ConfigurationError, EvaluationError, errorMessage } from "@/lib/errors";

const USAGE = `Usage:
  ddx-eval evaluate --config <file.yaml> [--limit N]
  ddx-eval summarize <evaluation_details.json> [--threshold T]`;

function positiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new ConfigurationError(`${flag} must be a positive integer`);
  return n;
}

async function evaluate(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: { config: { type: "string", short: "c" }, limit: { type: "string" } },
  });
  if (!values.config) throw new ConfigurationError("--config is required");
  const limit = positiveInt(values.limit, "--limit");

  const config = await loadConfig(values.config);
  const logger = createLogger("ddx-eval", config.logLevel);
  logger.info(`Experiment: ${config.experimentName}`);

  const deps = await buildPipelineDeps(config, readCredentials(), logger);
  const all = await loadDataset(config.datasetPath, logger.child("Dataset"));
  const cases = limit ? all.slice(0, limit) : all;

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn("Interrupt received; cancelling pending cases");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  const startedAt = new Date();
  const run = await runEvaluation(cases, deps, {
    concurrency: config.concurrency,
    matchThreshold: config.matchThreshold,
    signal: controller.signal,
  }).finally(() => process.removeListener("SIGINT", onSigint));

  const written = await writeRun(
    config.outputDir,
    {
      results: run.results,
      summary: run.summary,
      metadata: {
        experimentName: config.experimentName,
        experimentDescription: config.experimentDescription,
        datasetPath: config.datasetPath,
        startedAt: startedAt.toISOString(),
        finishedAt: new Date().toISOString(),
        casesRequested: run.totalCases,
        casesCompleted: run.results.length,
        cancelled: run.cancelled,
        configuration: config.raw,
      },
      config: config.raw,
    },
    startedAt,
  );
  logger.info(`Results written to ${written.dir}`);
  return run.cancelled ? 130 : 0;
}

async function summarize(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: { threshold: { type: "string", short: "t" } },
    allowPositionals: true,
  });
  const path = positionals[0];
  if (!path) throw new ConfigurationError("summarize needs an evaluation_details.json path");
  const threshold = values.threshold === undefined ? DEFAULT_MATCH_THRESHOLD : Number(values.threshold);
  if (!(threshold >= 0 && threshold <= 1)) throw new ConfigurationError("--threshold must be within [0,1]");

  const results = await readEvaluationDetails(path);
  const summary = summarizeDataset(results, threshold);
  console.log(JSON.stringify(summaryDocument({ summary, metadata: { source: path, threshold } }), null, 2));
  return 0;
}

async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;
  switch (command) {
    case "evaluate":
      return evaluate(rest);
    case "summarize":
      return summarize(rest);
    default:
      console.error(USAGE);
      return 2;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const fatal = createLogger("ddx-eval");
    if (err instanceof EvaluationError) fatal.error(`${err.name}: ${err.message}`);
    else fatal.error(errorMessage(err), { stack: err instanceof Error ? err.stack : undefined });
    process.exitCode = 1;
  },
);
