/**
 * Error taxonomy for the evaluation harness.
 *
 *   oracle_failure     code/similarity/extractor call failed → that sub-attempt FAILS
 *   judge_failure      judge call failed or answered garbage → judge position 0
 *   malformed_input    diagnosis without a usable name → entry skipped
 *   configuration      bad thresholds / missing keys → fatal at startup
 */

export type EvaluationErrorKind =
  | "oracle_failure"
  | "judge_failure"
  | "malformed_input"
  | "configuration";

export class EvaluationError extends Error {
  readonly kind: EvaluationErrorKind;

  constructor(kind: EvaluationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class OracleFailure extends EvaluationError {
  readonly oracle: string;

  constructor(oracle: string, message: string, options?: { cause?: unknown }) {
    super("oracle_failure", `${oracle}: ${message}`, options);
    this.oracle = oracle;
  }
}

export class JudgeFailure extends EvaluationError {
  readonly rawResponse: string | null;

  constructor(message: string, rawResponse: string | null = null, options?: { cause?: unknown }) {
    super("judge_failure", message, options);
    this.rawResponse = rawResponse;
  }
}

export class MalformedInputError extends EvaluationError {
  constructor(message: string) {
    super("malformed_input", message);
  }
}

export class ConfigurationError extends EvaluationError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("configuration", issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

/** HTTP-level failure from an adapter; carries the status for retry decisions. */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
